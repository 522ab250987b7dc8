/**
 * Safe error logging utility.
 * In production, strips stack traces and driver details so they do not end up
 * in logs that may be forwarded externally. Causes are followed one level so a
 * wrapped persistence failure still names the underlying error.
 */

export function safeError(error: unknown): unknown {
  if (process.env.NODE_ENV !== 'production') {
    return error
  }

  if (error instanceof Error) {
    const summary: Record<string, unknown> = { message: error.message, name: error.name }
    if (error.cause instanceof Error) {
      summary.cause = { message: error.cause.message, name: error.cause.name }
    }
    return summary
  }

  if (typeof error === 'string') {
    return error
  }

  return '[non-Error thrown]'
}
