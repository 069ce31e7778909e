// Tagged result values passed between validators, services and the dispatcher

import type { ValidationResult } from './validators/index.js'

/**
 * Failure categories reported back to the MCP caller
 */
export type ErrorKind = 'UnknownTool' | 'MissingArgument' | 'InvalidInput' | 'ServiceError'

export interface Ok<T> {
  ok: true
  value: T
}

export interface Err {
  ok: false
  kind: ErrorKind
  message: string
}

export type Result<T> = Ok<T> | Err

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value }
}

export function err(kind: ErrorKind, message: string): Err {
  return { ok: false, kind, message }
}

/**
 * Convert a validator rejection into an InvalidInput failure, or null when accepted
 */
export function rejectionOf(validation: ValidationResult): Err | null {
  return validation.valid ? null : err('InvalidInput', validation.reason)
}
