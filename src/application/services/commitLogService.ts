/**
 * Application Layer - Commit Log Service
 *
 * Versioned commits on top of a LogStore. Commit `n` lives in
 * `<dir>/<n zero-padded to 20 digits>.json`, so name order is version order.
 */

import { isLogStoreError } from '../../core/entities/errors.js'
import { childPath, type FileStatus } from '../../core/entities/logPath.js'
import type { Lines, LogStore } from '../../core/ports/logStore.js'

const COMMIT_FILE_PATTERN = /^(\d{20})\.json$/

export function commitFileName(version: number): string {
  if (!Number.isSafeInteger(version) || version < 0) {
    throw new Error(`Invalid commit version: ${version}`)
  }
  return `${String(version).padStart(20, '0')}.json`
}

export function parseCommitVersion(name: string): number | null {
  const match = COMMIT_FILE_PATTERN.exec(name)
  if (!match?.[1]) return null
  const version = Number(match[1])
  return Number.isSafeInteger(version) ? version : null
}

export type CommitEntry = {
  version: number
  status: FileStatus
}

export class CommitLogService {
  readonly #store: LogStore
  readonly #maxCommitAttempts: number

  constructor(store: LogStore, opts?: { maxCommitAttempts?: number }) {
    this.#store = store
    this.#maxCommitAttempts = opts?.maxCommitAttempts ?? 10
  }

  commitPath(dir: string, version: number): string {
    return childPath(dir, commitFileName(version))
  }

  /**
   * Create commit `version`. Rejects with `already_exists` if another writer
   * holds that version.
   */
  async commit(dir: string, version: number, lines: Lines): Promise<string> {
    const path = this.commitPath(dir, version)
    await this.#store.write(path, lines, false)
    return path
  }

  /**
   * Commit at the first free version after the latest one seen.
   * Losing a race moves on to the next version, up to `maxCommitAttempts`.
   */
  async append(dir: string, lines: Lines): Promise<number> {
    const content: string[] = []
    for await (const line of lines) content.push(line)

    const latest = await this.latestVersion(dir)
    let version = latest === null ? 0 : latest + 1
    for (let attempt = 1; ; attempt++) {
      try {
        await this.commit(dir, version, content)
        return version
      } catch (error) {
        if (!isLogStoreError(error, 'already_exists') || attempt >= this.#maxCommitAttempts) throw error
        version += 1
      }
    }
  }

  async read(dir: string, version: number): Promise<string[]> {
    return this.#store.readAll(this.commitPath(dir, version))
  }

  /** Commits at or after `fromVersion`, ascending. Other files are skipped. */
  async *listFrom(dir: string, fromVersion = 0): AsyncGenerator<CommitEntry> {
    const statuses = await this.#store.listFrom(this.commitPath(dir, fromVersion))
    for (const status of statuses) {
      if (status.isDirectory) continue
      const version = parseCommitVersion(status.name)
      if (version === null) continue
      yield { version, status }
    }
  }

  async latestVersion(dir: string): Promise<number | null> {
    let latest: number | null = null
    for await (const entry of this.listFrom(dir)) {
      latest = entry.version
    }
    return latest
  }
}
