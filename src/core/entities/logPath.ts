import { posix } from 'node:path'

// ============================================================================
// Log Paths
// ============================================================================

/**
 * A file inside a log directory. Paths are POSIX-style strings; qualification
 * against a particular backend is the caller's concern.
 */
export type LogPath = {
  parent: string
  name: string
}

export function toLogPath(path: string): LogPath {
  const normalized = posix.normalize(path)
  const name = posix.basename(normalized)
  if (!name || name === '.' || name === '..') {
    throw new Error(`Path has no file name: '${path}'`)
  }
  return { parent: posix.dirname(normalized), name }
}

export function childPath(dir: string, name: string): string {
  return posix.join(dir, name)
}

/** Orders names by their UTF-8 bytes. */
export function compareNames(a: string, b: string): number {
  return Buffer.compare(Buffer.from(a, 'utf8'), Buffer.from(b, 'utf8'))
}

// ============================================================================
// File Status
// ============================================================================

export type FileStatus = {
  path: string
  name: string
  size: number
  /** Epoch milliseconds, as reported by the backend. */
  modificationTime: number
  isDirectory: boolean
}
