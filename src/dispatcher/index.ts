// Dispatcher: routes a tool call to one service operation and renders the outcome as text

import type { Tool } from '@modelcontextprotocol/sdk/types.js'
import type { DatabaseService } from '../database/index.js'
import { formatErrorMessage } from '../error-utils.js'
import {
  formatDocumentList,
  formatError,
  formatRagAnswer,
  formatRows,
  formatUploadResult,
} from '../formatters/index.js'
import type { RagClient, UploadMetadata } from '../rag-client/index.js'
import { type Result, err, ok, rejectionOf } from '../result.js'
import {
  validateDocumentId,
  validateFilePath,
  validateLimit,
  validateQuestion,
  validateSqlQuery,
} from '../validators/index.js'
import { type ToolCall, parseToolCall, toArgumentBag } from './arguments.js'
import { isToolName, toolDefinitions } from './tool-definitions.js'

export type { ArgumentBag, ToolCall } from './arguments.js'
export { TOOL_NAMES, type ToolName, toolDefinitions } from './tool-definitions.js'

// ============================================
// Type Definitions
// ============================================

/** Database operations the dispatcher routes to */
export type DatabaseOperations = Pick<DatabaseService, 'executeSelect' | 'getDocuments' | 'getUser'>

/** RAG operations the dispatcher routes to */
export type RagOperations = Pick<RagClient, 'ask' | 'list' | 'upload' | 'getDocument'>

/**
 * Backing services, constructed once per process and injected here
 */
export interface DispatcherServices {
  database: DatabaseOperations
  rag: RagOperations
}

/**
 * Text produced for one call; `isError` is set for error envelopes
 */
export interface DispatchResult {
  text: string
  isError: boolean
}

const DEFAULT_DOCUMENT_LIMIT = 10
const AUDIT_PREVIEW_LENGTH = 200

// ============================================
// Dispatcher Class
// ============================================

/**
 * Tool registry and dispatcher
 *
 * Every call ends in exactly one text result. Failures at any stage
 * (unknown tool, missing argument, rejected input, service failure) are
 * rendered as `Error executing <tool>: [<kind>] <message>` and never thrown.
 */
export class Dispatcher {
  private readonly database: DatabaseOperations
  private readonly rag: RagOperations

  constructor(services: DispatcherServices) {
    this.database = services.database
    this.rag = services.rag
  }

  /**
   * Tool definitions for `tools/list`
   */
  listTools(): Tool[] {
    return toolDefinitions
  }

  /**
   * Validate, route, and format one tool call
   */
  async dispatch(toolName: string, rawArguments?: unknown): Promise<DispatchResult> {
    let result: Result<string>
    try {
      result = await this.run(toolName, rawArguments)
    } catch (error) {
      result = err('ServiceError', formatErrorMessage(error))
    }

    if (result.ok) {
      logToolUsage(toolName, rawArguments, result.value)
      return { text: result.value, isError: false }
    }

    const text = formatError(result.kind, result.message, toolName)
    console.error(text)
    logToolUsage(toolName, rawArguments, '', result.message)
    return { text, isError: true }
  }

  private async run(toolName: string, rawArguments: unknown): Promise<Result<string>> {
    if (!isToolName(toolName)) {
      return err('UnknownTool', `Unknown tool: ${toolName}`)
    }

    const bag = toArgumentBag(rawArguments)
    if (!bag.ok) {
      return bag
    }

    const call = parseToolCall(toolName, bag.value)
    if (!call.ok) {
      return call
    }

    return await this.execute(call.value)
  }

  private async execute(call: ToolCall): Promise<Result<string>> {
    switch (call.tool) {
      case 'query_database': {
        const rejection = rejectionOf(validateSqlQuery(call.args.query))
        if (rejection) return rejection

        const rows = await this.database.executeSelect(call.args.query)
        if (!rows.ok) return rows
        return ok(
          `Query executed successfully. Found ${rows.value.length} rows.\n\n${formatRows(rows.value)}`
        )
      }

      case 'get_documents_from_db': {
        const limit = call.args.limit ?? DEFAULT_DOCUMENT_LIMIT
        const rejection = rejectionOf(validateLimit(limit))
        if (rejection) return rejection

        const rows = await this.database.getDocuments(limit, call.args.user_id)
        if (!rows.ok) return rows
        return ok(`Found ${rows.value.length} documents:\n\n${formatRows(rows.value)}`)
      }

      case 'get_user_info': {
        const userId = call.args.user_id
        if (userId.trim().length === 0) {
          return err('InvalidInput', 'user_id must be a non-empty string')
        }

        const user = await this.database.getUser(userId)
        if (!user.ok) return user
        if (user.value === null) {
          return ok(`User not found: ${userId}`)
        }
        return ok(`User information:\n\n${formatRows([user.value])}`)
      }

      case 'ask_rag': {
        const { question, document_id: documentId } = call.args
        const rejection =
          rejectionOf(validateQuestion(question)) ??
          (documentId !== undefined ? rejectionOf(validateDocumentId(documentId)) : null)
        if (rejection) return rejection

        const answer = await this.rag.ask(question, documentId)
        if (!answer.ok) return answer
        return ok(formatRagAnswer(answer.value))
      }

      case 'list_documents': {
        const documents = await this.rag.list()
        if (!documents.ok) return documents
        return ok(formatDocumentList(documents.value))
      }

      case 'upload_pdf': {
        const { file_path: filePath, title, description } = call.args
        const rejection = rejectionOf(validateFilePath(filePath, ['.pdf']))
        if (rejection) return rejection

        const metadata: UploadMetadata = {}
        if (title) metadata.title = title
        if (description) metadata.description = description

        const upload = await this.rag.upload(filePath, metadata)
        if (!upload.ok) return upload
        return ok(formatUploadResult(upload.value, filePath))
      }

      case 'get_document': {
        const documentId = call.args.document_id
        const rejection = rejectionOf(validateDocumentId(documentId))
        if (rejection) return rejection

        const document = await this.rag.getDocument(documentId)
        if (!document.ok) return document
        if (document.value === null) {
          return ok(`Document not found: ${documentId}`)
        }
        return ok(formatDocumentList([document.value]))
      }
    }
  }
}

// ============================================
// Audit logging
// ============================================

/**
 * One JSON line per call on stderr
 */
function logToolUsage(tool: string, args: unknown, resultText: string, error?: string): void {
  const entry = {
    timestamp: new Date().toISOString(),
    tool,
    arguments: args ?? {},
    success: error === undefined,
    error: error ?? null,
    resultPreview: resultText ? resultText.slice(0, AUDIT_PREVIEW_LENGTH) : null,
  }
  console.error(`Tool used: ${JSON.stringify(entry)}`)
}
