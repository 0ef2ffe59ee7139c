import {
  alreadyExists,
  illegalState,
  ioFailure,
  isLogStoreError,
  notFound,
  toError,
  type LogStoreError
} from '../../core/entities/errors.js'
import { compareNames, toLogPath, type FileStatus, type LogPath } from '../../core/entities/logPath.js'
import type { CloseableLineIterator, Lines, LogStore } from '../../core/ports/logStore.js'
import type { StorageBackend } from '../../core/ports/storageBackend.js'
import { NoopTelemetrySink, type TelemetryEvent, type TelemetrySink } from '../../core/ports/telemetry.js'
import { LineReader } from './lineReader.js'
import { LineSink } from './lineSink.js'
import { createTempPath, defaultTokenSource, type TokenSource } from './tempPath.js'

export type RenameLogStoreOptions = {
  backend: StorageBackend
  telemetry?: TelemetrySink
  tokens?: TokenSource
}

/**
 * LogStore that publishes create-if-absent writes with a single rename.
 *
 * Content is staged in a hidden temp file next to the target, then renamed
 * into place. Only backends whose rename is atomic and never replaces an
 * existing destination (`atomicRename`) may take create-if-absent writes:
 * the rename is the only arbiter between concurrent writers.
 */
export class RenameLogStore implements LogStore {
  readonly #backend: StorageBackend
  readonly #telemetry: TelemetrySink
  readonly #tokens: TokenSource

  constructor(opts: RenameLogStoreOptions) {
    this.#backend = opts.backend
    this.#telemetry = opts.telemetry ?? new NoopTelemetrySink()
    this.#tokens = opts.tokens ?? defaultTokenSource
  }

  async read(path: string): Promise<CloseableLineIterator> {
    try {
      const stream = await this.#backend.openForRead(path)
      return new LineReader(path, stream)
    } catch (error) {
      throw ioFailure(path, error)
    }
  }

  async readAll(path: string): Promise<string[]> {
    const lines: string[] = []
    for await (const line of await this.read(path)) {
      lines.push(line)
    }
    return lines
  }

  async listFrom(path: string): Promise<IterableIterator<FileStatus>> {
    const from = toLogPath(path)
    await this.#requireParent(from)

    let entries: FileStatus[]
    try {
      entries = await this.#backend.listDirectory(from.parent)
    } catch (error) {
      throw ioFailure(from.parent, error)
    }

    return entries
      .filter((entry) => compareNames(entry.name, from.name) >= 0)
      .sort((a, b) => compareNames(a.name, b.name))
      .values()
  }

  async write(path: string, lines: Lines, overwrite = false): Promise<void> {
    const target = toLogPath(path)
    if (!overwrite && !this.#backend.atomicRename) {
      throw illegalState(path, 'Backend rename may replace existing files; create-if-absent writes are not supported')
    }
    await this.#requireParent(target)

    if (overwrite) {
      await this.#writeInPlace(path, lines)
    } else {
      await this.#writeOnce(target, path, lines)
    }
  }

  async #writeInPlace(path: string, lines: Lines): Promise<void> {
    const sink = await this.#open(path, true)
    try {
      await sink.writeAll(lines)
      await sink.close()
    } catch (error) {
      throw ioFailure(path, error)
    } finally {
      sink.abort()
    }
  }

  async #writeOnce(target: LogPath, path: string, lines: Lines): Promise<void> {
    if (await this.#exists(path)) {
      throw alreadyExists(path)
    }

    const tempPath = createTempPath(target, this.#tokens)
    const sink = await this.#openTemp(tempPath)
    let renamed = false
    let failure: LogStoreError | null = null

    try {
      try {
        await sink.writeAll(lines)
        await sink.close()
      } catch (error) {
        throw ioFailure(tempPath, error)
      }

      renamed = await this.#rename(tempPath, path)
      if (renamed) {
        this.#emit({ type: 'commit_published', payload: { path } })
        return
      }

      if (await this.#exists(path)) {
        this.#emit({ type: 'commit_conflict', payload: { path } })
        throw alreadyExists(path)
      }
      this.#emit({ type: 'rename_inconsistent', payload: { path, tempPath } })
      throw illegalState(path, `Cannot rename ${tempPath} to ${path}`)
    } catch (error) {
      failure = ioFailure(path, error)
      throw failure
    } finally {
      const problems = await this.#release(sink, renamed ? null : tempPath, path)
      failure?.suppressed.push(...problems)
    }
  }

  /** Closes the stream if still open and removes an unpublished temp file. */
  async #release(sink: LineSink, tempPath: string | null, path: string): Promise<Error[]> {
    const problems: Error[] = []
    try {
      sink.abort()
    } catch (error) {
      problems.push(this.#reportCleanup(path, 'close_stream', error))
    }
    if (tempPath !== null) {
      try {
        await this.#backend.delete(tempPath, false)
      } catch (error) {
        problems.push(this.#reportCleanup(path, 'delete_temp', error))
      }
    }
    return problems
  }

  #reportCleanup(path: string, step: 'close_stream' | 'delete_temp', error: unknown): Error {
    const err = toError(error)
    this.#emit({ type: 'cleanup_failed', payload: { path, step, message: err.message } })
    return err
  }

  /** Telemetry never changes the outcome of a store operation. */
  #emit(event: TelemetryEvent): void {
    try {
      this.#telemetry.emit(event)
    } catch (error) {
      console.warn(`Telemetry sink failed on ${event.type}: ${toError(error).message}`)
    }
  }

  async #open(path: string, truncateIfExists: boolean): Promise<LineSink> {
    try {
      return new LineSink(await this.#backend.openForWrite(path, truncateIfExists))
    } catch (error) {
      throw ioFailure(path, error)
    }
  }

  async #openTemp(tempPath: string): Promise<LineSink> {
    try {
      return await this.#open(tempPath, false)
    } catch (error) {
      if (isLogStoreError(error, 'already_exists')) {
        throw illegalState(tempPath, `Temporary path already exists: ${tempPath}`)
      }
      throw error
    }
  }

  async #rename(source: string, destination: string): Promise<boolean> {
    try {
      return await this.#backend.rename(source, destination)
    } catch (error) {
      throw ioFailure(destination, error)
    }
  }

  async #exists(path: string): Promise<boolean> {
    try {
      return await this.#backend.exists(path)
    } catch (error) {
      throw ioFailure(path, error)
    }
  }

  async #requireParent(logPath: LogPath): Promise<void> {
    if (!(await this.#exists(logPath.parent))) {
      throw notFound(logPath.parent)
    }
  }
}
