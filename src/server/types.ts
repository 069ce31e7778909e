// Type definitions for ToolServer

/**
 * ToolServer configuration
 */
export interface ToolServerConfig {
  /** PostgreSQL connection string (database tools fail with ServiceError when absent) */
  databaseUrl: string | undefined
  /** Database connect timeout in seconds */
  dbConnectTimeout?: number
  /** RAG service base URL */
  ragApiUrl: string
  /** RAG bearer credential (may be empty) */
  ragApiKey: string
  /** Timeout for ask_rag requests in ms */
  ragAskTimeoutMs?: number
  /** Timeout for upload_pdf requests in ms */
  ragUploadTimeoutMs?: number
  /** Timeout for list_documents / get_document requests in ms */
  ragListTimeoutMs?: number
}

/**
 * MCP tools/call response body
 */
export interface ToolCallResponse {
  [key: string]: unknown
  content: [{ type: 'text'; text: string }]
  isError: boolean
}
