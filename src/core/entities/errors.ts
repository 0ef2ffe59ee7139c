// ============================================================================
// Log Store Errors
// ============================================================================

export type LogStoreErrorCode =
  | 'not_found'
  | 'already_exists'
  | 'illegal_state'
  | 'io_failure'

/**
 * Error raised by the log store and its storage backends.
 *
 * `already_exists` is the expected outcome of losing a create race and is
 * recoverable by the caller; `illegal_state` means the backend contradicted
 * itself and must not be retried.
 */
export class LogStoreError extends Error {
  readonly code: LogStoreErrorCode
  readonly path: string
  /** Failures of cleanup steps that ran after this error was raised. */
  readonly suppressed: Error[] = []

  constructor(code: LogStoreErrorCode, path: string, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'LogStoreError'
    this.code = code
    this.path = path
  }
}

export function notFound(path: string, cause?: unknown): LogStoreError {
  return new LogStoreError('not_found', path, `No such file or directory: ${path}`, { cause })
}

export function alreadyExists(path: string, cause?: unknown): LogStoreError {
  return new LogStoreError('already_exists', path, `File already exists: ${path}`, { cause })
}

export function illegalState(path: string, message: string): LogStoreError {
  return new LogStoreError('illegal_state', path, message)
}

/** Wraps any failure as `io_failure`, passing existing LogStoreErrors through. */
export function ioFailure(path: string, cause: unknown): LogStoreError {
  if (cause instanceof LogStoreError) return cause
  const detail = cause instanceof Error ? cause.message : String(cause)
  return new LogStoreError('io_failure', path, `I/O failure on ${path}: ${detail}`, { cause })
}

export function isLogStoreError(err: unknown, code?: LogStoreErrorCode): err is LogStoreError {
  if (!(err instanceof LogStoreError)) return false
  return code === undefined || err.code === code
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err))
}
