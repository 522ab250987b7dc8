/**
 * Error taxonomy shared by the core and the HTTP layer.
 * Every operational error carries the status the API answers with and a
 * stable machine-readable code.
 */

export class AppError extends Error {
  public readonly statusCode: number
  public readonly code: string

  constructor(message: string, statusCode = 500, code = 'ERR_UNKNOWN', options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
    this.statusCode = statusCode
    this.code = code
  }
}

/** Empty or malformed user id / message. Rejected before any state is touched. */
export class InputError extends AppError {
  public readonly details?: unknown

  constructor(message = 'Invalid input', details?: unknown) {
    super(message, 400, 'ERR_INPUT')
    this.details = details
  }
}

/** Aggregate could not be loaded or committed. Nothing was written. */
export class PersistenceError extends AppError {
  constructor(message: string, cause?: unknown, code = 'ERR_PERSISTENCE') {
    super(message, 503, code, { cause })
  }
}

/** The commit was built on an aggregate another writer has since advanced. */
export class StaleContextError extends PersistenceError {
  constructor(message: string) {
    super(message, undefined, 'ERR_STALE_CONTEXT')
  }
}

export class OutOfOrderMessageError extends AppError {
  constructor(userId: string, timestamp: string, lastTimestamp: string) {
    super(
      `Message for ${userId} at ${timestamp} precedes the last recorded message at ${lastTimestamp}`,
      409,
      'ERR_OUT_OF_ORDER',
    )
  }
}

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`)
    this.name = 'ConfigError'
  }
}
