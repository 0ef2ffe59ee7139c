import { Writable } from 'node:stream'
import { toError } from '../../core/entities/errors.js'

export type StoreBuffered = (data: Buffer) => Promise<void>

/**
 * Writable that collects everything written and hands it to `store` when
 * the stream ends. Nothing is visible to readers before that point.
 */
export class BufferedWriteStream extends Writable {
  readonly #chunks: Buffer[] = []
  readonly #store: StoreBuffered

  constructor(store: StoreBuffered) {
    super()
    this.#store = store
  }

  _write(chunk: Buffer, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    this.#chunks.push(chunk)
    callback()
  }

  _final(callback: (error?: Error | null) => void): void {
    this.#store(Buffer.concat(this.#chunks)).then(
      () => callback(),
      (error: unknown) => callback(toError(error))
    )
  }
}
