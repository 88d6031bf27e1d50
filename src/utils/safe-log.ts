/**
 * Safe error logging utility.
 * In production, strips stack traces and driver details (pg errors carry the
 * failing query and parameters) before they reach the logs.
 */

export function safeError(error: unknown): unknown {
  if (process.env.NODE_ENV !== 'production') {
    return error
  }

  if (error instanceof Error) {
    const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined
    return code ? { message: error.message, name: error.name, code } : { message: error.message, name: error.name }
  }

  if (typeof error === 'string') {
    return error
  }

  return '[non-Error thrown]'
}
