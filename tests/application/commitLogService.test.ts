import { describe, it, expect } from 'vitest'
import { Volume, createFsFromVolume } from 'memfs'
import {
  CommitLogService,
  commitFileName,
  parseCommitVersion
} from '../../src/application/services/commitLogService.js'
import { RenameLogStore } from '../../src/infrastructure/logstore/renameLogStore.js'
import { MemFsStorageBackend } from '../../src/infrastructure/storage/memFsStorageBackend.js'
import { isLogStoreError } from '../../src/core/entities/errors.js'
import { FaultInjectingBackend } from '../helpers/faultInjectingBackend.js'

function setup(maxCommitAttempts?: number) {
  const vol = new Volume()
  vol.mkdirSync('/table/_delta_log', { recursive: true })
  const backend = new FaultInjectingBackend(new MemFsStorageBackend(createFsFromVolume(vol)))
  const store = new RenameLogStore({ backend })
  const commitLog = new CommitLogService(store, { maxCommitAttempts })
  return { vol, backend, commitLog }
}

const DIR = '/table/_delta_log'

describe('commit file names', () => {
  it('pads versions to twenty digits', () => {
    expect(commitFileName(0)).toBe('00000000000000000000.json')
    expect(commitFileName(42)).toBe('00000000000000000042.json')
  })

  it('rejects negative and fractional versions', () => {
    expect(() => commitFileName(-1)).toThrow('Invalid commit version: -1')
    expect(() => commitFileName(1.5)).toThrow('Invalid commit version: 1.5')
  })

  it('parses only commit file names', () => {
    expect(parseCommitVersion('00000000000000000042.json')).toBe(42)
    expect(parseCommitVersion('42.json')).toBeNull()
    expect(parseCommitVersion('00000000000000000042.checkpoint.parquet')).toBeNull()
    expect(parseCommitVersion('.00000000000000000042.json.abc.tmp')).toBeNull()
  })
})

describe('CommitLogService', () => {
  it('commits and reads back a version', async () => {
    const { vol, commitLog } = setup()

    const path = await commitLog.commit(DIR, 3, ['{"commitInfo":{}}'])

    expect(path).toBe('/table/_delta_log/00000000000000000003.json')
    expect(vol.readFileSync(path, 'utf8')).toBe('{"commitInfo":{}}\n')
    expect(await commitLog.read(DIR, 3)).toEqual(['{"commitInfo":{}}'])
  })

  it('refuses to commit a version twice', async () => {
    const { commitLog } = setup()
    await commitLog.commit(DIR, 0, ['a'])

    const error = await commitLog.commit(DIR, 0, ['b']).then(() => null, (e: unknown) => e)

    expect(isLogStoreError(error, 'already_exists')).toBe(true)
    expect(await commitLog.read(DIR, 0)).toEqual(['a'])
  })

  it('appends after the latest version', async () => {
    const { commitLog } = setup()

    expect(await commitLog.append(DIR, ['first'])).toBe(0)
    expect(await commitLog.append(DIR, ['second'])).toBe(1)
    expect(await commitLog.latestVersion(DIR)).toBe(1)
  })

  it('moves to the next version when another writer takes one', async () => {
    const { vol, backend, commitLog } = setup()
    backend.faults.beforeRename = async (_source, destination) => {
      backend.faults.beforeRename = undefined
      vol.writeFileSync(destination, 'other\n')
    }

    const version = await commitLog.append(DIR, ['mine'])

    expect(version).toBe(1)
    expect(vol.readFileSync(`${DIR}/00000000000000000000.json`, 'utf8')).toBe('other\n')
    expect(vol.readFileSync(`${DIR}/00000000000000000001.json`, 'utf8')).toBe('mine\n')
  })

  it('gives up after the configured number of attempts', async () => {
    const { vol, backend, commitLog } = setup(2)
    backend.faults.beforeRename = async (_source, destination) => {
      vol.writeFileSync(destination, 'other\n')
    }

    const error = await commitLog.append(DIR, ['mine']).then(() => null, (e: unknown) => e)

    expect(isLogStoreError(error, 'already_exists')).toBe(true)
    expect(error).toMatchObject({ path: `${DIR}/00000000000000000001.json` })
    expect(backend.callsTo('rename')).toHaveLength(2)
  })

  it('lists commits from a version and skips other files', async () => {
    const { vol, commitLog } = setup()
    for (const v of [0, 1, 2, 4]) vol.writeFileSync(`${DIR}/${commitFileName(v)}`, '')
    vol.writeFileSync(`${DIR}/.00000000000000000005.json.x1.tmp`, '')
    vol.writeFileSync(`${DIR}/_last_checkpoint`, '')
    vol.writeFileSync(`${DIR}/00000000000000000002.checkpoint.parquet`, '')
    vol.mkdirSync(`${DIR}/00000000000000000009.json`)

    const versions: number[] = []
    for await (const entry of commitLog.listFrom(DIR, 1)) versions.push(entry.version)

    expect(versions).toEqual([1, 2, 4])
  })

  it('reports no latest version for an empty log', async () => {
    const { commitLog } = setup()

    expect(await commitLog.latestVersion(DIR)).toBeNull()
  })

  it('fails with not_found for a missing log directory', async () => {
    const { commitLog } = setup()

    const error = await commitLog.append('/other/_delta_log', ['x']).then(() => null, (e: unknown) => e)

    expect(error).toMatchObject({ code: 'not_found', path: '/other/_delta_log' })
  })
})
