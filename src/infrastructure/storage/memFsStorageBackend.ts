import { fs as memfs } from 'memfs'
import { posix } from 'node:path'
import { Readable, type Writable } from 'node:stream'
import { alreadyExists, ioFailure, notFound } from '../../core/entities/errors.js'
import type { FileStatus } from '../../core/entities/logPath.js'
import type { StorageBackend } from '../../core/ports/storageBackend.js'
import { BufferedWriteStream } from './bufferedWriteStream.js'
import { errorCode, isMissing, translateFsError } from './fsErrors.js'

export type MemFs = typeof memfs

/**
 * In-memory backend over a memfs volume. Writes are buffered and land on the
 * volume when the stream ends.
 */
export class MemFsStorageBackend implements StorageBackend {
  readonly atomicRename = true
  readonly #fs: MemFs

  constructor(fs: MemFs = memfs) {
    this.#fs = fs
  }

  async exists(path: string): Promise<boolean> {
    try {
      await this.#fs.promises.access(path, this.#fs.constants.F_OK)
      return true
    } catch (error) {
      if (isMissing(error)) return false
      throw ioFailure(path, error)
    }
  }

  async openForRead(path: string): Promise<Readable> {
    try {
      const data = await this.#fs.promises.readFile(path)
      const buffer = typeof data === 'string' ? Buffer.from(data, 'utf8') : data
      return Readable.from([buffer], { objectMode: false })
    } catch (error) {
      throw translateFsError(path, error)
    }
  }

  async openForWrite(path: string, truncateIfExists: boolean): Promise<Writable> {
    if (!(await this.exists(posix.dirname(path)))) {
      throw notFound(posix.dirname(path))
    }
    if (!truncateIfExists && (await this.exists(path))) {
      throw alreadyExists(path)
    }
    const flag = truncateIfExists ? 'w' : 'wx'
    return new BufferedWriteStream(async (data) => {
      try {
        await this.#fs.promises.writeFile(path, data, { flag })
      } catch (error) {
        throw translateFsError(path, error)
      }
    })
  }

  async listDirectory(path: string): Promise<FileStatus[]> {
    let entries: unknown[]
    try {
      entries = await this.#fs.promises.readdir(path)
    } catch (error) {
      throw translateFsError(path, error)
    }

    const statuses: FileStatus[] = []
    for (const entry of entries) {
      const name = entryName(entry)
      const entryPath = posix.join(path, name)
      try {
        const s = await this.#fs.promises.stat(entryPath)
        statuses.push({
          path: entryPath,
          name,
          size: Number(s.size),
          modificationTime: new Date(s.mtime).getTime(),
          isDirectory: s.isDirectory()
        })
      } catch (error) {
        if (isMissing(error)) continue
        throw ioFailure(entryPath, error)
      }
    }
    return statuses
  }

  async rename(source: string, destination: string): Promise<boolean> {
    try {
      await this.#fs.promises.link(source, destination)
    } catch (error) {
      if (errorCode(error) === 'EEXIST' || isMissing(error)) return false
      throw ioFailure(destination, error)
    }
    try {
      await this.#fs.promises.unlink(source)
    } catch (error) {
      throw ioFailure(source, error)
    }
    return true
  }

  async delete(path: string, recursive: boolean): Promise<boolean> {
    try {
      await this.#fs.promises.rm(path, { recursive })
      return true
    } catch (error) {
      if (isMissing(error)) return false
      throw ioFailure(path, error)
    }
  }
}

function entryName(entry: unknown): string {
  if (typeof entry === 'string') return entry
  if (Buffer.isBuffer(entry)) return entry.toString()
  if (entry && typeof entry === 'object' && 'name' in entry) {
    return String(entry.name)
  }
  return String(entry)
}
