// MCP Server entry point
import { ToolServer, type ToolServerConfig } from './server/index.js'

// ============================================
// Environment Variable Parsers
// ============================================

/**
 * Parse a positive integer from an environment variable
 */
function parsePositiveInt(name: string, value: string | undefined): number | undefined {
  if (!value) return undefined
  const parsed = Number.parseInt(value, 10)
  if (Number.isNaN(parsed) || parsed < 1) {
    console.error(`Invalid ${name} value: "${value}". Expected positive integer. Ignoring.`)
    return undefined
  }
  return parsed
}

/**
 * Build the server configuration from the environment
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ToolServerConfig {
  const config: ToolServerConfig = {
    databaseUrl: env['DATABASE_URL'] || undefined,
    ragApiUrl: env['RAG_API_URL'] || 'http://localhost:8000',
    ragApiKey: env['RAG_API_KEY'] || '',
  }

  // Add optional settings only if defined
  const dbConnectTimeout = parsePositiveInt('DB_CONNECT_TIMEOUT', env['DB_CONNECT_TIMEOUT'])
  const askTimeout = parsePositiveInt('RAG_ASK_TIMEOUT_MS', env['RAG_ASK_TIMEOUT_MS'])
  const uploadTimeout = parsePositiveInt('RAG_UPLOAD_TIMEOUT_MS', env['RAG_UPLOAD_TIMEOUT_MS'])
  const listTimeout = parsePositiveInt('RAG_LIST_TIMEOUT_MS', env['RAG_LIST_TIMEOUT_MS'])
  if (dbConnectTimeout !== undefined) {
    config.dbConnectTimeout = dbConnectTimeout
  }
  if (askTimeout !== undefined) {
    config.ragAskTimeoutMs = askTimeout
  }
  if (uploadTimeout !== undefined) {
    config.ragUploadTimeoutMs = uploadTimeout
  }
  if (listTimeout !== undefined) {
    config.ragListTimeoutMs = listTimeout
  }

  return config
}

/**
 * Configuration as logged at startup (credentials masked)
 */
export function describeConfig(config: ToolServerConfig): Record<string, unknown> {
  return {
    ...config,
    databaseUrl: config.databaseUrl ? config.databaseUrl.replace(/\/\/[^@/]*@/, '//***@') : null,
    ragApiKey: config.ragApiKey ? '***' : '(not set)',
  }
}

// ============================================
// Server Startup
// ============================================

/**
 * Start the MCP server and close it on SIGINT/SIGTERM
 */
export async function startServer(): Promise<void> {
  try {
    const config = loadConfig()

    console.error('Starting RAG/DB MCP Server...')
    console.error('Configuration:', describeConfig(config))

    const server = new ToolServer(config)
    await server.initialize()
    await server.run()

    const shutdown = (signal: string): void => {
      console.error(`Received ${signal}, shutting down...`)
      server
        .close()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          console.error('Shutdown failed:', error)
          process.exit(1)
        })
    }
    process.once('SIGINT', () => shutdown('SIGINT'))
    process.once('SIGTERM', () => shutdown('SIGTERM'))

    console.error('RAG/DB MCP Server started successfully')
  } catch (error) {
    console.error('Failed to start RAG/DB MCP Server:', error)
    process.exit(1)
  }
}
