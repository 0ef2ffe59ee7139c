import { alreadyExists, ioFailure, notFound, type LogStoreError } from '../../core/entities/errors.js'

export function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code
  }
  return undefined
}

export function isMissing(error: unknown): boolean {
  const code = errorCode(error)
  return code === 'ENOENT' || code === 'ENOTDIR'
}

/** Maps a Node-style filesystem error onto the log store's error codes. */
export function translateFsError(path: string, error: unknown): LogStoreError {
  if (isMissing(error)) return notFound(path, error)
  if (errorCode(error) === 'EEXIST') return alreadyExists(path, error)
  return ioFailure(path, error)
}
