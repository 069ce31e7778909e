// RagClient: HTTP access to the remote RAG service

import { openAsBlob } from 'node:fs'
import { access } from 'node:fs/promises'
import { basename } from 'node:path'
import { z } from 'zod'
import { formatErrorMessage, isTimeoutError } from '../error-utils.js'
import { type Err, type Result, err, ok, rejectionOf } from '../result.js'
import { validateQuestion } from '../validators/index.js'
import type {
  DocumentSummary,
  RagAnswer,
  RagClientConfig,
  RagSource,
  UploadMetadata,
  UploadResult,
} from './types.js'

export type {
  DocumentSummary,
  RagAnswer,
  RagClientConfig,
  RagSource,
  UploadMetadata,
  UploadResult,
} from './types.js'

// ============================================
// Constants
// ============================================

const DEFAULT_ASK_TIMEOUT_MS = 30_000
const DEFAULT_UPLOAD_TIMEOUT_MS = 60_000
const DEFAULT_LIST_TIMEOUT_MS = 10_000

// ============================================
// Response schemas
// ============================================

const sourceSchema = z.union([
  z.string(),
  z
    .object({
      page: z.union([z.number(), z.string()]).nullish(),
      similarity: z.number().nullish(),
      text: z.string().nullish(),
    })
    .passthrough(),
])

const askResponseSchema = z
  .object({
    answer: z.string().nullish(),
    sources: z.array(sourceSchema).nullish(),
    // Older deployments return the passages under "context"
    context: z.array(sourceSchema).nullish(),
    confidence: z.union([z.string(), z.number()]).nullish(),
  })
  .passthrough()

// Display-only fields: any scalar is rendered as-is
const scalarSchema = z.union([z.string(), z.number()])

const documentSchema = z
  .object({
    id: scalarSchema.nullish(),
    title: scalarSchema.nullish(),
    created_at: scalarSchema.nullish(),
    description: scalarSchema.nullish(),
    page_count: scalarSchema.nullish(),
  })
  .passthrough()

const documentListSchema = z.union([
  z.array(documentSchema),
  z.object({ documents: z.array(documentSchema) }).passthrough(),
])

const uploadResponseSchema = z
  .object({
    document_id: scalarSchema.nullish(),
    status: scalarSchema.nullish(),
    title: scalarSchema.nullish(),
    chunks_created: scalarSchema.nullish(),
  })
  .passthrough()

// ============================================
// Errors
// ============================================

/**
 * Non-2xx response from the RAG service
 */
export class HttpStatusError extends Error {
  constructor(
    public readonly status: number,
    statusText: string
  ) {
    super(`HTTP ${status}${statusText ? ` ${statusText}` : ''}`)
    this.name = 'HttpStatusError'
  }
}

// ============================================
// RagClient Class
// ============================================

/**
 * Client for the RAG HTTP API
 *
 * Responsibilities:
 * - Bearer-authenticated requests against one base URL
 * - Per-operation timeouts (ask 30s, upload 60s, list/get 10s)
 * - Normalizing timeouts, transport failures and non-2xx statuses into ServiceError results
 */
export class RagClient {
  private readonly baseUrl: string
  private readonly apiKey: string
  private readonly askTimeoutMs: number
  private readonly uploadTimeoutMs: number
  private readonly listTimeoutMs: number

  constructor(config: RagClientConfig) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, '')
    this.apiKey = config.apiKey
    this.askTimeoutMs = config.askTimeoutMs ?? DEFAULT_ASK_TIMEOUT_MS
    this.uploadTimeoutMs = config.uploadTimeoutMs ?? DEFAULT_UPLOAD_TIMEOUT_MS
    this.listTimeoutMs = config.listTimeoutMs ?? DEFAULT_LIST_TIMEOUT_MS

    if (!this.apiKey) {
      console.warn('RAG_API_KEY not set - RAG features may not work')
    }
  }

  /**
   * Ask a question, optionally scoped to one document
   */
  async ask(question: string, documentId?: string): Promise<Result<RagAnswer>> {
    const rejection = rejectionOf(validateQuestion(question))
    if (rejection) {
      return rejection
    }

    try {
      const response = await this.request(
        '/query',
        'POST',
        JSON.stringify({ question, document_id: documentId ?? null }),
        this.askTimeoutMs
      )
      const body = askResponseSchema.parse(await response.json())
      console.error(`RAG question asked: ${question.slice(0, 50)} | Status: ${response.status}`)
      return ok(toAnswer(body))
    } catch (error) {
      return this.failure('RAG API error', error)
    }
  }

  /**
   * Upload a PDF as multipart form data with a JSON metadata field
   */
  async upload(filePath: string, metadata: UploadMetadata = {}): Promise<Result<UploadResult>> {
    if (!filePath.toLowerCase().endsWith('.pdf')) {
      return err('InvalidInput', 'Only PDF files are supported')
    }

    try {
      await access(filePath)
    } catch {
      console.error(`File not found: ${filePath}`)
      return err('ServiceError', `File not found: ${filePath}`)
    }

    try {
      const form = new FormData()
      const file = await openAsBlob(filePath, { type: 'application/pdf' })
      form.append('file', file, basename(filePath))
      if (Object.keys(metadata).length > 0) {
        form.append('metadata', JSON.stringify(metadata))
      }

      const response = await this.request('/api/upload', 'POST', form, this.uploadTimeoutMs)
      const result = toUploadResult(uploadResponseSchema.parse(await response.json()))
      console.error(`PDF uploaded: ${filePath} | Document ID: ${result.documentId ?? 'unknown'}`)
      return ok(result)
    } catch (error) {
      return this.failure('Upload error', error)
    }
  }

  /**
   * List every document known to the RAG service
   */
  async list(): Promise<Result<DocumentSummary[]>> {
    try {
      const response = await this.request('/api/documents', 'GET', undefined, this.listTimeoutMs)
      const body = documentListSchema.parse(await response.json())
      const documents = (Array.isArray(body) ? body : body.documents).map(toDocument)
      console.error(`Documents listed: ${documents.length} found`)
      return ok(documents)
    } catch (error) {
      return this.failure('Failed to list documents', error)
    }
  }

  /**
   * Fetch one document; `null` on 404
   */
  async getDocument(documentId: string): Promise<Result<DocumentSummary | null>> {
    try {
      const response = await this.request(
        `/api/documents/${encodeURIComponent(documentId)}`,
        'GET',
        undefined,
        this.listTimeoutMs,
        [404]
      )
      if (response.status === 404) {
        return ok(null)
      }
      return ok(toDocument(documentSchema.parse(await response.json())))
    } catch (error) {
      return this.failure('Failed to get document', error)
    }
  }

  private async request(
    path: string,
    method: 'GET' | 'POST',
    body: string | FormData | undefined,
    timeoutMs: number,
    acceptedStatuses: readonly number[] = []
  ): Promise<Response> {
    const headers: Record<string, string> = {}
    if (this.apiKey) {
      headers['Authorization'] = `Bearer ${this.apiKey}`
    }
    if (typeof body === 'string') {
      headers['Content-Type'] = 'application/json'
    }

    const init: RequestInit = { method, headers, signal: AbortSignal.timeout(timeoutMs) }
    if (body !== undefined) {
      init.body = body
    }

    const response = await fetch(`${this.baseUrl}${path}`, init)
    if (!response.ok && !acceptedStatuses.includes(response.status)) {
      throw new HttpStatusError(response.status, response.statusText)
    }
    return response
  }

  private failure(prefix: string, error: unknown): Err {
    if (isTimeoutError(error)) {
      console.error('RAG API request timed out')
      return err('ServiceError', 'RAG API timeout - please try again')
    }
    const message =
      error instanceof z.ZodError
        ? `${prefix}: unexpected response (${describeMismatch(error.issues)})`
        : `${prefix}: ${formatErrorMessage(error)}`
    console.error(message)
    return err('ServiceError', message)
  }
}

/**
 * Name the deepest failing field, looking inside union branches
 */
function describeMismatch(issues: readonly z.ZodIssue[]): string {
  const issue = deepestIssue(issues)
  if (!issue) {
    return 'invalid body'
  }
  return issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
}

function deepestIssue(issues: readonly z.ZodIssue[]): z.ZodIssue | undefined {
  let deepest: z.ZodIssue | undefined
  for (const issue of issues) {
    const candidate =
      issue.code === 'invalid_union'
        ? (deepestIssue(issue.unionErrors.flatMap((unionError) => unionError.issues)) ?? issue)
        : issue
    if (!deepest || candidate.path.length > deepest.path.length) {
      deepest = candidate
    }
  }
  return deepest
}

// ============================================
// Wire → domain mapping
// ============================================

function toSource(raw: z.infer<typeof sourceSchema>): RagSource {
  if (typeof raw === 'string') {
    return { text: raw }
  }
  const source: RagSource = { text: raw.text ?? '' }
  if (raw.page !== undefined && raw.page !== null) {
    source.page = raw.page
  }
  if (raw.similarity !== undefined && raw.similarity !== null) {
    source.similarity = raw.similarity
  }
  return source
}

function toAnswer(body: z.infer<typeof askResponseSchema>): RagAnswer {
  const answer: RagAnswer = {
    answer: body.answer ?? 'No answer provided',
    sources: (body.sources ?? body.context ?? []).map(toSource),
  }
  if (body.confidence !== undefined && body.confidence !== null) {
    answer.confidence = String(body.confidence)
  }
  return answer
}

function toDocument(raw: z.infer<typeof documentSchema>): DocumentSummary {
  const summary: DocumentSummary = {}
  if (raw.id !== undefined && raw.id !== null) {
    summary.id = String(raw.id)
  }
  if (raw.title !== undefined && raw.title !== null && raw.title !== '') {
    summary.title = String(raw.title)
  }
  if (raw.created_at !== undefined && raw.created_at !== null && raw.created_at !== '') {
    summary.createdAt = String(raw.created_at)
  }
  if (raw.description !== undefined && raw.description !== null && raw.description !== '') {
    summary.description = String(raw.description)
  }
  if (raw.page_count !== undefined && raw.page_count !== null) {
    summary.pageCount = raw.page_count
  }
  return summary
}

function toUploadResult(raw: z.infer<typeof uploadResponseSchema>): UploadResult {
  const result: UploadResult = {}
  if (raw.document_id !== undefined && raw.document_id !== null) {
    result.documentId = String(raw.document_id)
  }
  if (raw.status !== undefined && raw.status !== null && raw.status !== '') {
    result.status = String(raw.status)
  }
  if (raw.title !== undefined && raw.title !== null) {
    result.title = String(raw.title)
  }
  if (raw.chunks_created !== undefined && raw.chunks_created !== null) {
    result.chunksCreated = raw.chunks_created
  }
  return result
}
