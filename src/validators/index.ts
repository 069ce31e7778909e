// Input validators shared by the dispatcher and the backing services

// ============================================
// Type Definitions
// ============================================

/**
 * Outcome of a validator: accepted, or rejected with a human-readable reason
 */
export type ValidationResult = { valid: true } | { valid: false; reason: string }

const ACCEPTED: ValidationResult = { valid: true }

function reject(reason: string): ValidationResult {
  return { valid: false, reason }
}

// ============================================
// Constants
// ============================================

/**
 * Statements that must not appear as whole words in a read-only query.
 *
 * This is a denylist, not a SQL parser. It stops the obvious write/DDL verbs and
 * nothing more: comments, encodings or functions with side effects are not detected.
 */
export const FORBIDDEN_SQL_KEYWORDS = [
  'DROP',
  'DELETE',
  'TRUNCATE',
  'ALTER',
  'CREATE',
  'INSERT',
  'UPDATE',
  'GRANT',
  'REVOKE',
  'EXECUTE',
  'EXEC',
] as const

/** Path prefixes a caller may never hand to the upload tool */
export const SENSITIVE_PATH_PREFIXES = ['/etc', '/root'] as const

export const DEFAULT_MAX_QUESTION_LENGTH = 1000
export const DEFAULT_MAX_LIMIT = 1000

const DOCUMENT_ID_PATTERN = /^[A-Za-z0-9_.-]+$/

// ============================================
// Validators
// ============================================

/**
 * Read-only SQL check: must start with SELECT and must not contain a forbidden keyword.
 * Word boundaries keep identifiers such as `dropped_column` from matching.
 */
export function validateSqlQuery(query: unknown): ValidationResult {
  if (typeof query !== 'string' || query.length === 0) {
    return reject('Query must be a non-empty string')
  }

  const normalized = query.toUpperCase().trim()

  for (const keyword of FORBIDDEN_SQL_KEYWORDS) {
    if (new RegExp(`\\b${keyword}\\b`).test(normalized)) {
      return reject(
        `Query contains forbidden keyword: ${keyword}. Only SELECT queries are allowed.`
      )
    }
  }

  if (!normalized.startsWith('SELECT')) {
    return reject('Query must start with SELECT. Only read-only SELECT queries are allowed.')
  }

  return ACCEPTED
}

/**
 * Question check for RAG queries. The untrimmed length is compared with the limit.
 */
export function validateQuestion(
  question: unknown,
  maxLength: number = DEFAULT_MAX_QUESTION_LENGTH
): ValidationResult {
  if (typeof question !== 'string' || question.length === 0) {
    return reject('Question must be a non-empty string')
  }
  if (question.trim().length === 0) {
    return reject('Question cannot be empty or whitespace only')
  }
  if (question.length > maxLength) {
    return reject(
      `Question too long (${question.length} characters). Maximum allowed: ${maxLength} characters`
    )
  }
  return ACCEPTED
}

/**
 * File path check: no parent-directory segments, no sensitive roots,
 * and (optionally) one of the allowed extensions, compared case-insensitively.
 */
export function validateFilePath(
  filePath: unknown,
  allowedExtensions?: readonly string[]
): ValidationResult {
  if (typeof filePath !== 'string' || filePath.length === 0) {
    return reject('File path must be a non-empty string')
  }

  if (
    filePath.includes('..') ||
    SENSITIVE_PATH_PREFIXES.some((prefix) => filePath.startsWith(prefix))
  ) {
    return reject('Invalid file path: potential security risk')
  }

  if (allowedExtensions && allowedExtensions.length > 0) {
    const lowered = filePath.toLowerCase()
    if (!allowedExtensions.some((extension) => lowered.endsWith(extension.toLowerCase()))) {
      return reject(`File extension not allowed. Allowed: ${allowedExtensions.join(', ')}`)
    }
  }

  return ACCEPTED
}

/**
 * Document ID check: letters, digits, underscores, hyphens and dots only
 */
export function validateDocumentId(documentId: unknown): ValidationResult {
  if (typeof documentId !== 'string' || documentId.trim().length === 0) {
    return reject('Document ID must be a non-empty string')
  }
  if (!DOCUMENT_ID_PATTERN.test(documentId)) {
    return reject(
      'Document ID can only contain letters, numbers, hyphens, underscores, and dots'
    )
  }
  return ACCEPTED
}

/**
 * Row limit check for database queries
 */
export function validateLimit(
  limit: unknown,
  maxLimit: number = DEFAULT_MAX_LIMIT
): ValidationResult {
  if (typeof limit !== 'number' || !Number.isInteger(limit)) {
    return reject('Limit must be an integer')
  }
  if (limit < 1) {
    return reject('Limit must be at least 1')
  }
  if (limit > maxLimit) {
    return reject(`Limit exceeds maximum allowed value of ${maxLimit}`)
  }
  return ACCEPTED
}
