/**
 * Core Layer - Ports
 *
 * LogStore is the create-once file layer under a commit log.
 */

import type { FileStatus } from '../entities/logPath.js'

/** Single-pass sequence of lines that releases its source exactly once. */
export interface CloseableLineIterator extends AsyncIterableIterator<string> {
  close(): Promise<void>
}

export type Lines = Iterable<string> | AsyncIterable<string>

export interface LogStore {
  /**
   * Open a file and iterate its lines (UTF-8, without terminators). A line
   * ends at `\n`, `\r` or `\r\n`.
   * The file is opened before this resolves, so `not_found` surfaces here.
   */
  read(path: string): Promise<CloseableLineIterator>

  /** Read every line of a file. */
  readAll(path: string): Promise<string[]>

  /**
   * List the files in `path`'s directory whose names sort at or after
   * `path`'s own name, in ascending byte order.
   *
   * The listing reflects whatever the backend reports: a file published
   * moments ago may be absent on a backend without consistent listings.
   */
  listFrom(path: string): Promise<IterableIterator<FileStatus>>

  /**
   * Write lines to `path`, each terminated by a newline.
   *
   * @param overwrite - replace any existing file; when false the file is
   *   created at most once and `already_exists` is raised if it is taken
   */
  write(path: string, lines: Lines, overwrite?: boolean): Promise<void>
}
