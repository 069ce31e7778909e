// Text rendering of tool results
//
// Every function here is pure: the same input always renders the same text.

import type { ErrorKind } from '../result.js'
import type { DocumentSummary, RagAnswer, RagSource, UploadResult } from '../rag-client/types.js'

/** Maximum characters of a source passage shown under an answer */
export const SOURCE_PREVIEW_LENGTH = 150

// ============================================
// Database rows
// ============================================

/**
 * Render rows as numbered record blocks
 *
 * @param rows - Rows in store order
 * @param maxRecords - Render at most this many rows and append a "Showing x of y" footer
 */
export function formatRows(
  rows: readonly Record<string, unknown>[],
  maxRecords?: number
): string {
  if (rows.length === 0) {
    return 'No results found'
  }

  const shown = maxRecords !== undefined && maxRecords > 0 ? rows.slice(0, maxRecords) : rows

  const blocks = shown.map((row, index) => {
    const lines = [`--- Record ${index + 1} ---`]
    for (const [key, value] of Object.entries(row)) {
      lines.push(`${key}: ${formatValue(value)}`)
    }
    return lines.join('\n')
  })

  let text = blocks.join('\n\n')
  if (shown.length < rows.length) {
    text += `\n\n(Showing ${shown.length} of ${rows.length} total records)`
  }
  return text
}

/**
 * Render a single column value
 */
export function formatValue(value: unknown): string {
  if (value === null || value === undefined) {
    return 'NULL'
  }
  if (value instanceof Date) {
    return formatTimestamp(value)
  }
  if (value instanceof Uint8Array) {
    return `\\x${Buffer.from(value).toString('hex')}`
  }
  if (typeof value === 'object') {
    return JSON.stringify(value)
  }
  return String(value)
}

/**
 * YYYY-MM-DD HH:MM:SS in UTC
 */
export function formatTimestamp(date: Date): string {
  if (Number.isNaN(date.getTime())) {
    return 'Invalid Date'
  }
  return date.toISOString().slice(0, 19).replace('T', ' ')
}

// ============================================
// RAG answers and documents
// ============================================

export function formatRagAnswer(answer: RagAnswer): string {
  let text = `Answer: ${answer.answer}\n\n`
  text += `Confidence: ${answer.confidence ?? 'unknown'}\n\n`

  if (answer.sources.length > 0) {
    text += 'Sources:\n'
    answer.sources.forEach((source, index) => {
      text += formatSource(source, index + 1)
    })
  }

  return text
}

function formatSource(source: RagSource, position: number): string {
  // Counted in code points so a surrogate pair is never split
  const characters = Array.from(source.text)
  const preview =
    characters.length > SOURCE_PREVIEW_LENGTH
      ? `${characters.slice(0, SOURCE_PREVIEW_LENGTH).join('')}...`
      : source.text

  let text = `\n${position}. Page ${source.page ?? 'unknown'}`
  if (source.similarity) {
    text += ` (relevance: ${(source.similarity * 100).toFixed(2)}%)`
  }
  return `${text}\n   ${preview}\n`
}

export function formatDocumentList(documents: readonly DocumentSummary[]): string {
  if (documents.length === 0) {
    return 'No documents found'
  }

  let text = `Found ${documents.length} document(s):\n\n`

  documents.forEach((document, index) => {
    text += `${index + 1}. ${document.title ?? 'Untitled'}\n`
    text += `   ID: ${document.id ?? 'unknown'}\n`
    text += `   Created: ${document.createdAt ?? 'unknown'}\n`
    if (document.description) {
      text += `   Description: ${document.description}\n`
    }
    if (document.pageCount !== undefined) {
      text += `   Pages: ${document.pageCount}\n`
    }
    text += '\n'
  })

  return text
}

export function formatUploadResult(result: UploadResult, filePath: string): string {
  let text = 'PDF uploaded successfully!\n'
  text += `File: ${filePath}\n`
  text += `Document ID: ${result.documentId ?? 'unknown'}\n`
  text += `Status: ${result.status ?? 'unknown'}\n`

  if (result.title !== undefined) {
    text += `Title: ${result.title}\n`
  }
  if (result.chunksCreated !== undefined) {
    text += `Chunks created: ${result.chunksCreated}\n`
  }

  return text
}

// ============================================
// Errors
// ============================================

/**
 * Error envelope: `Error executing <tool>: [<kind>] <message>`
 */
export function formatError(errorKind: ErrorKind, message: string, toolName: string): string {
  return `Error executing ${toolName}: [${errorKind}] ${message}`
}
