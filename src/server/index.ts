// ToolServer implementation with MCP tools

import { Server } from '@modelcontextprotocol/sdk/server/index.js'
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js'
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js'
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  type Tool,
} from '@modelcontextprotocol/sdk/types.js'
import { DatabaseService, type SqlConnector } from '../database/index.js'
import { Dispatcher } from '../dispatcher/index.js'
import { RagClient, type RagClientConfig } from '../rag-client/index.js'
import type { ToolCallResponse, ToolServerConfig } from './types.js'

export type { ToolCallResponse, ToolServerConfig } from './types.js'

/**
 * Injection points used in place of the real backends
 */
export interface ToolServerOptions {
  /** Connection factory handed to DatabaseService */
  connector?: SqlConnector
}

// ============================================
// ToolServer Class
// ============================================

/**
 * MCP server exposing the database and RAG tools
 *
 * Responsibilities:
 * - MCP handler registration (tools/list, tools/call)
 * - Service construction and lifetime (one DB handle, one RAG client per process)
 * - Forwarding every call to the Dispatcher
 */
export class ToolServer {
  private readonly server: Server
  private readonly database: DatabaseService
  private readonly rag: RagClient
  private readonly dispatcher: Dispatcher
  private readonly databaseConfigured: boolean

  constructor(config: ToolServerConfig, options: ToolServerOptions = {}) {
    this.server = new Server(
      { name: 'rag-db-mcp-server', version: '0.1.0' },
      { capabilities: { tools: {} } }
    )

    // Only pass optional settings if they are defined
    const databaseConfig: ConstructorParameters<typeof DatabaseService>[0] = {
      connectionString: config.databaseUrl,
    }
    if (config.dbConnectTimeout !== undefined) {
      databaseConfig.connectTimeout = config.dbConnectTimeout
    }
    if (options.connector !== undefined) {
      databaseConfig.connector = options.connector
    }
    this.database = new DatabaseService(databaseConfig)
    this.databaseConfigured = Boolean(config.databaseUrl)

    const ragConfig: RagClientConfig = {
      baseUrl: config.ragApiUrl,
      apiKey: config.ragApiKey,
    }
    if (config.ragAskTimeoutMs !== undefined) {
      ragConfig.askTimeoutMs = config.ragAskTimeoutMs
    }
    if (config.ragUploadTimeoutMs !== undefined) {
      ragConfig.uploadTimeoutMs = config.ragUploadTimeoutMs
    }
    if (config.ragListTimeoutMs !== undefined) {
      ragConfig.listTimeoutMs = config.ragListTimeoutMs
    }
    this.rag = new RagClient(ragConfig)

    this.dispatcher = new Dispatcher({ database: this.database, rag: this.rag })

    this.setupHandlers()
  }

  /**
   * Set up MCP handlers
   */
  private setupHandlers(): void {
    this.server.setRequestHandler(ListToolsRequestSchema, async () => ({
      tools: this.handleListTools(),
    }))

    this.server.setRequestHandler(CallToolRequestSchema, async (request) =>
      this.handleCallTool(request.params.name, request.params.arguments)
    )
  }

  /**
   * Open the database connection and check that it answers.
   * An unreachable database is reported, not fatal: the handle reconnects lazily.
   */
  async initialize(): Promise<void> {
    if (!this.databaseConfigured) {
      console.error('DATABASE_URL not set - database tools will report errors')
    } else {
      // ping() opens the handle
      const ping = await this.database.ping()
      if (!ping.ok) {
        console.error(`Database not reachable at startup: ${ping.message}`)
      }
    }
    console.error('ToolServer initialized')
  }

  /**
   * tools/list handler
   */
  handleListTools(): Tool[] {
    return this.dispatcher.listTools()
  }

  /**
   * tools/call handler
   */
  async handleCallTool(name: string, args?: unknown): Promise<ToolCallResponse> {
    const result = await this.dispatcher.dispatch(name, args)
    return {
      content: [{ type: 'text', text: result.text }],
      isError: result.isError,
    }
  }

  /**
   * Attach to an arbitrary transport
   */
  async connect(transport: Transport): Promise<void> {
    await this.server.connect(transport)
  }

  /**
   * Start the server on stdio
   */
  async run(): Promise<void> {
    await this.connect(new StdioServerTransport())
    console.error('ToolServer running on stdio transport')
  }

  /**
   * Close the transport and release the database connection
   */
  async close(): Promise<void> {
    await this.server.close()
    await this.database.close()
    console.error('ToolServer stopped')
  }
}
