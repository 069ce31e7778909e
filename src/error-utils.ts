// Error helpers shared by the services and the dispatcher

/**
 * Extract a displayable message from any thrown value.
 * Development mode (NODE_ENV=development) keeps the stack trace for debugging;
 * every other mode returns the message only.
 */
export function formatErrorMessage(error: unknown): string {
  const err = toError(error)
  return process.env['NODE_ENV'] === 'development' ? err.stack || err.message : err.message
}

/**
 * Normalize a thrown value into an Error instance
 */
export function toError(error: unknown): Error {
  if (error instanceof Error) {
    return error
  }
  if (
    error !== null &&
    typeof error === 'object' &&
    'message' in error &&
    typeof error.message === 'string'
  ) {
    return new Error(error.message)
  }
  return new Error(String(error))
}

/**
 * True for the abort raised by `AbortSignal.timeout()` once its budget expires
 */
export function isTimeoutError(error: unknown): boolean {
  return (
    error !== null &&
    typeof error === 'object' &&
    'name' in error &&
    error.name === 'TimeoutError'
  )
}
