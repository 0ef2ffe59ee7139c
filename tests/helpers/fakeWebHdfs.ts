/**
 * Shared test helper: FakeWebHdfs
 *
 * An in-process stand-in for a WebHDFS namenode and datanode, exposed as a
 * `fetch` implementation. Files live in a Map keyed by absolute path.
 */

const NAMENODE = 'http://namenode.test:9870'
const DATANODE = 'http://datanode.test:9864'

type FakeFile = { content: Buffer; modificationTime: number }

type HdfsEntry = { pathSuffix: string; type: 'FILE' | 'DIRECTORY'; length: number; modificationTime: number }

function json(status: number, body: unknown): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } })
}

function remoteException(status: number, exception: string, message: string): Response {
  return json(status, { RemoteException: { exception, message } })
}

function parentOf(path: string): string {
  const idx = path.lastIndexOf('/')
  return idx <= 0 ? '/' : path.slice(0, idx)
}

export class FakeWebHdfs {
  readonly baseUrl = NAMENODE
  readonly files = new Map<string, FakeFile>()
  readonly dirs = new Set<string>(['/'])
  readonly requests: URL[] = []
  clock = 1_700_000_000_000

  readonly fetch: typeof fetch = async (input, init) => {
    const raw = typeof input === 'string' ? input : input instanceof URL ? input.href : input.url
    const url = new URL(raw)
    this.requests.push(url)
    const path = decodeURIComponent(url.pathname.replace(/^\/webhdfs\/v1/, '')) || '/'
    const op = url.searchParams.get('op')

    if (url.origin === DATANODE) {
      return this.#upload(path, url, init?.body)
    }

    switch (op) {
      case 'GETFILESTATUS':
        if (this.files.has(path) || this.dirs.has(path)) return json(200, { FileStatus: { pathSuffix: '' } })
        return remoteException(404, 'FileNotFoundException', `File does not exist: ${path}`)
      case 'OPEN': {
        const file = this.files.get(path)
        if (!file) return remoteException(404, 'FileNotFoundException', `File does not exist: ${path}`)
        return new Response(file.content, { status: 200 })
      }
      case 'CREATE': {
        if (init?.redirect !== 'manual') return json(400, { error: 'expected manual redirect' })
        if (url.searchParams.get('overwrite') === 'false' && this.files.has(path)) {
          return remoteException(403, 'FileAlreadyExistsException', `${path} already exists`)
        }
        const location = `${DATANODE}${url.pathname}?${url.searchParams.toString()}`
        return new Response(null, { status: 307, headers: { location } })
      }
      case 'LISTSTATUS': {
        if (!this.dirs.has(path)) return remoteException(404, 'FileNotFoundException', `File ${path} does not exist.`)
        return json(200, { FileStatuses: { FileStatus: this.#children(path) } })
      }
      case 'RENAME': {
        const destination = url.searchParams.get('destination') ?? ''
        const file = this.files.get(path)
        if (!file || this.files.has(destination) || this.dirs.has(destination)) return json(200, { boolean: false })
        this.files.delete(path)
        this.files.set(destination, file)
        return json(200, { boolean: true })
      }
      case 'DELETE':
        return json(200, { boolean: this.files.delete(path) })
      default:
        return remoteException(400, 'IllegalArgumentException', `Invalid op: ${op}`)
    }
  }

  mkdir(path: string): void {
    for (let dir = path; dir !== '/'; dir = parentOf(dir)) this.dirs.add(dir)
  }

  put(path: string, content: string): void {
    this.mkdir(parentOf(path))
    this.clock += 1
    this.files.set(path, { content: Buffer.from(content, 'utf8'), modificationTime: this.clock })
  }

  text(path: string): string | undefined {
    return this.files.get(path)?.content.toString('utf8')
  }

  #upload(path: string, url: URL, body: unknown): Response {
    if (url.searchParams.get('overwrite') === 'false' && this.files.has(path)) {
      return remoteException(403, 'FileAlreadyExistsException', `${path} already exists`)
    }
    const content = body instanceof Uint8Array ? Buffer.from(body) : Buffer.from(String(body ?? ''), 'utf8')
    this.mkdir(parentOf(path))
    this.clock += 1
    this.files.set(path, { content, modificationTime: this.clock })
    return new Response(null, { status: 201 })
  }

  #children(dir: string): HdfsEntry[] {
    const prefix = dir === '/' ? '/' : `${dir}/`
    const entries: HdfsEntry[] = []
    for (const [path, file] of this.files) {
      if (parentOf(path) === dir) {
        entries.push({ pathSuffix: path.slice(prefix.length), type: 'FILE', length: file.content.length, modificationTime: file.modificationTime })
      }
    }
    for (const sub of this.dirs) {
      if (sub !== dir && parentOf(sub) === dir) {
        entries.push({ pathSuffix: sub.slice(prefix.length), type: 'DIRECTORY', length: 0, modificationTime: this.clock })
      }
    }
    return entries
  }
}
