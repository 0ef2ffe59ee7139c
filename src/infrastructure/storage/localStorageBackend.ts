import { constants } from 'node:fs'
import { access, link, open, readdir, rm, stat, unlink } from 'node:fs/promises'
import { join } from 'node:path'
import type { Readable, Writable } from 'node:stream'
import { ioFailure } from '../../core/entities/errors.js'
import type { FileStatus } from '../../core/entities/logPath.js'
import type { StorageBackend } from '../../core/ports/storageBackend.js'
import { errorCode, isMissing, translateFsError } from './fsErrors.js'

/**
 * Local disk backend.
 *
 * `rename` publishes with link + unlink: `link` fails with EEXIST instead of
 * replacing the destination, which plain rename(2) would do silently.
 */
export class LocalStorageBackend implements StorageBackend {
  readonly atomicRename = true

  async exists(path: string): Promise<boolean> {
    try {
      await access(path, constants.F_OK)
      return true
    } catch (error) {
      if (isMissing(error)) return false
      throw ioFailure(path, error)
    }
  }

  async openForRead(path: string): Promise<Readable> {
    try {
      const handle = await open(path, 'r')
      return handle.createReadStream()
    } catch (error) {
      throw translateFsError(path, error)
    }
  }

  async openForWrite(path: string, truncateIfExists: boolean): Promise<Writable> {
    try {
      const handle = await open(path, truncateIfExists ? 'w' : 'wx')
      return handle.createWriteStream()
    } catch (error) {
      throw translateFsError(path, error)
    }
  }

  async listDirectory(path: string): Promise<FileStatus[]> {
    let names: string[]
    try {
      names = await readdir(path)
    } catch (error) {
      throw translateFsError(path, error)
    }

    const statuses: FileStatus[] = []
    for (const name of names) {
      const entryPath = join(path, name)
      try {
        const s = await stat(entryPath)
        statuses.push({
          path: entryPath,
          name,
          size: s.size,
          modificationTime: Math.trunc(s.mtimeMs),
          isDirectory: s.isDirectory()
        })
      } catch (error) {
        // Removed between readdir and stat, e.g. a discarded temp file
        if (isMissing(error)) continue
        throw ioFailure(entryPath, error)
      }
    }
    return statuses
  }

  async rename(source: string, destination: string): Promise<boolean> {
    try {
      await link(source, destination)
    } catch (error) {
      if (errorCode(error) === 'EEXIST' || isMissing(error)) return false
      throw ioFailure(destination, error)
    }
    try {
      await unlink(source)
    } catch (error) {
      throw ioFailure(source, error)
    }
    return true
  }

  async delete(path: string, recursive: boolean): Promise<boolean> {
    try {
      await rm(path, { recursive })
      return true
    } catch (error) {
      if (isMissing(error)) return false
      throw ioFailure(path, error)
    }
  }
}
