/**
 * Core Layer - Ports
 *
 * StorageBackend abstracts the file primitives of a storage system (local
 * disk, an in-memory volume, a remote filesystem). The log store composes
 * these primitives into create-once and ordered-listing guarantees.
 */

import type { Readable, Writable } from 'node:stream'
import type { FileStatus } from '../entities/logPath.js'

export interface StorageBackend {
  /**
   * True when `rename` is atomic and refuses to replace an existing
   * destination. Create-if-absent writes are only allowed on such backends.
   */
  readonly atomicRename: boolean

  exists(path: string): Promise<boolean>

  /**
   * Open a file for reading.
   * Rejects with `not_found` when the file cannot be opened.
   */
  openForRead(path: string): Promise<Readable>

  /**
   * Open a file for writing. With `truncateIfExists` false the open fails
   * with `already_exists` rather than touching an existing file.
   * Content is only guaranteed to be stored once the stream has finished.
   */
  openForWrite(path: string, truncateIfExists: boolean): Promise<Writable>

  /**
   * List the entries of a directory with a single backend call.
   * Listings may lag behind recent renames on eventually consistent systems.
   */
  listDirectory(path: string): Promise<FileStatus[]>

  /**
   * Rename `source` to `destination`.
   * @returns false when the backend refused the rename
   */
  rename(source: string, destination: string): Promise<boolean>

  /** @returns false when nothing existed at `path` */
  delete(path: string, recursive: boolean): Promise<boolean>
}
