// Type definitions for the RAG HTTP client

/**
 * RagClient configuration
 */
export interface RagClientConfig {
  /** Base URL of the RAG service (trailing slash is stripped) */
  baseUrl: string
  /** Bearer credential; an empty key is allowed but logged */
  apiKey: string
  /** Timeout for POST /query in ms (default 30s) */
  askTimeoutMs?: number
  /** Timeout for POST /api/upload in ms (default 60s) */
  uploadTimeoutMs?: number
  /** Timeout for GET /api/documents and /api/documents/{id} in ms (default 10s) */
  listTimeoutMs?: number
}

/**
 * One retrieved passage backing an answer
 */
export interface RagSource {
  /** Page number (or label) of the passage */
  page?: number | string
  /** Similarity between 0 and 1 */
  similarity?: number
  /** Passage text */
  text: string
}

/**
 * Answer returned by POST /query
 */
export interface RagAnswer {
  answer: string
  sources: RagSource[]
  confidence?: string
}

/**
 * Document entry from GET /api/documents
 */
export interface DocumentSummary {
  id?: string
  title?: string
  createdAt?: string
  description?: string
  /** Page count as reported by the service */
  pageCount?: number | string
}

/**
 * Response of POST /api/upload
 */
export interface UploadResult {
  documentId?: string
  status?: string
  title?: string
  /** Chunk count as reported by the service */
  chunksCreated?: number | string
}

/**
 * Optional metadata sent alongside an uploaded file
 */
export interface UploadMetadata {
  title?: string
  description?: string
}
