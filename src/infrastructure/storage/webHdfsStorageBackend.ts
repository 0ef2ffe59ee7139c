import { Readable, type Writable } from 'node:stream'
import { z } from 'zod'
import { alreadyExists, ioFailure, notFound, type LogStoreError } from '../../core/entities/errors.js'
import { childPath, type FileStatus } from '../../core/entities/logPath.js'
import type { StorageBackend } from '../../core/ports/storageBackend.js'
import { BufferedWriteStream } from './bufferedWriteStream.js'

// ============================================================================
// Response Schemas
// ============================================================================

const HdfsFileStatusSchema = z.object({
  pathSuffix: z.string(),
  type: z.enum(['FILE', 'DIRECTORY', 'SYMLINK']),
  length: z.number(),
  modificationTime: z.number()
})

const ListStatusResponseSchema = z.object({
  FileStatuses: z.object({
    FileStatus: z.array(HdfsFileStatusSchema)
  })
})

const BooleanResponseSchema = z.object({
  boolean: z.boolean()
})

const RemoteExceptionSchema = z.object({
  RemoteException: z.object({
    exception: z.string(),
    message: z.string()
  })
})

export type WebHdfsOptions = {
  /** Namenode HTTP address, e.g. http://namenode:9870 */
  baseUrl: string
  /** Sent as `user.name` with every request. */
  user?: string
  fetch?: typeof fetch
}

type Operation = 'GETFILESTATUS' | 'OPEN' | 'CREATE' | 'LISTSTATUS' | 'RENAME' | 'DELETE'

/**
 * Network backend speaking the WebHDFS REST protocol.
 *
 * RENAME reports `false` instead of replacing an existing destination, which
 * makes it safe for create-if-absent writes. Uploads are buffered and sent
 * with the two-step CREATE (namenode redirect, then datanode PUT) when the
 * write stream ends.
 */
export class WebHdfsStorageBackend implements StorageBackend {
  readonly atomicRename = true
  readonly #baseUrl: URL
  readonly #user: string | undefined
  readonly #fetch: typeof fetch

  constructor(opts: WebHdfsOptions) {
    this.#baseUrl = new URL(opts.baseUrl)
    this.#user = opts.user
    this.#fetch = opts.fetch ?? ((input, init) => fetch(input, init))
  }

  async exists(path: string): Promise<boolean> {
    const res = await this.#request(path, 'GETFILESTATUS', 'GET')
    if (res.status === 404) return false
    if (!res.ok) throw await responseError(path, res)
    return true
  }

  async openForRead(path: string): Promise<Readable> {
    const res = await this.#request(path, 'OPEN', 'GET')
    if (!res.ok) throw await responseError(path, res)
    if (!res.body) return Readable.from([], { objectMode: false })
    return Readable.fromWeb(res.body)
  }

  async openForWrite(path: string, truncateIfExists: boolean): Promise<Writable> {
    if (!truncateIfExists && (await this.exists(path))) {
      throw alreadyExists(path)
    }
    return new BufferedWriteStream((data) => this.#create(path, data, truncateIfExists))
  }

  async listDirectory(path: string): Promise<FileStatus[]> {
    const res = await this.#request(path, 'LISTSTATUS', 'GET')
    if (!res.ok) throw await responseError(path, res)
    const parsed = ListStatusResponseSchema.safeParse(await readJson(path, res))
    if (!parsed.success) {
      throw ioFailure(path, new Error(`Malformed LISTSTATUS response: ${parsed.error.message}`))
    }
    return parsed.data.FileStatuses.FileStatus.map((s) => ({
      path: childPath(path, s.pathSuffix),
      name: s.pathSuffix,
      size: s.length,
      modificationTime: s.modificationTime,
      isDirectory: s.type === 'DIRECTORY'
    }))
  }

  async rename(source: string, destination: string): Promise<boolean> {
    const res = await this.#request(source, 'RENAME', 'PUT', { destination })
    if (!res.ok) throw await responseError(source, res)
    return readBoolean(source, res)
  }

  async delete(path: string, recursive: boolean): Promise<boolean> {
    const res = await this.#request(path, 'DELETE', 'DELETE', { recursive: String(recursive) })
    if (!res.ok) throw await responseError(path, res)
    return readBoolean(path, res)
  }

  async #create(path: string, data: Buffer, overwrite: boolean): Promise<void> {
    const res = await this.#request(path, 'CREATE', 'PUT', { overwrite: String(overwrite) }, { redirect: 'manual' })
    if (res.status !== 307) throw await responseError(path, res)
    const location = res.headers.get('location')
    if (!location) {
      throw ioFailure(path, new Error('CREATE redirect without a Location header'))
    }

    let upload: Response
    try {
      upload = await this.#fetch(location, {
        method: 'PUT',
        headers: { 'content-type': 'application/octet-stream' },
        body: data
      })
    } catch (error) {
      throw ioFailure(path, error)
    }
    if (upload.status !== 201) throw await responseError(path, upload)
  }

  async #request(
    path: string,
    op: Operation,
    method: string,
    params: Record<string, string> = {},
    init: { redirect?: 'follow' | 'manual' } = {}
  ): Promise<Response> {
    const url = this.#url(path, op, params)
    try {
      return await this.#fetch(url, { method, redirect: init.redirect ?? 'follow' })
    } catch (error) {
      throw ioFailure(path, error)
    }
  }

  #url(path: string, op: Operation, params: Record<string, string>): string {
    if (!path.startsWith('/')) {
      throw new Error(`WebHDFS paths must be absolute: '${path}'`)
    }
    const encoded = path.split('/').map(encodeURIComponent).join('/')
    const url = new URL(`/webhdfs/v1${encoded}`, this.#baseUrl)
    url.searchParams.set('op', op)
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, value)
    }
    if (this.#user) url.searchParams.set('user.name', this.#user)
    return url.toString()
  }
}

async function readJson(path: string, res: Response): Promise<unknown> {
  try {
    return await res.json()
  } catch (error) {
    throw ioFailure(path, error)
  }
}

async function readBoolean(path: string, res: Response): Promise<boolean> {
  const parsed = BooleanResponseSchema.safeParse(await readJson(path, res))
  if (!parsed.success) {
    throw ioFailure(path, new Error(`Malformed boolean response: ${parsed.error.message}`))
  }
  return parsed.data.boolean
}

async function responseError(path: string, res: Response): Promise<LogStoreError> {
  let text: string
  try {
    text = await res.text()
  } catch (error) {
    return ioFailure(path, error)
  }

  let exception: string | undefined
  let message = res.statusText
  const parsed = RemoteExceptionSchema.safeParse(parseJsonOrUndefined(text))
  if (parsed.success) {
    exception = parsed.data.RemoteException.exception
    message = parsed.data.RemoteException.message
  }

  const cause = new Error(`HTTP ${res.status}: ${message}`)
  if (res.status === 404 || exception === 'FileNotFoundException') return notFound(path, cause)
  if (exception === 'FileAlreadyExistsException') return alreadyExists(path, cause)
  return ioFailure(path, cause)
}

function parseJsonOrUndefined(text: string): unknown {
  try {
    return JSON.parse(text)
  } catch {
    return undefined
  }
}
