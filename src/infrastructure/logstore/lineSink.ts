import { once } from 'node:events'
import type { Writable } from 'node:stream'
import { finished } from 'node:stream/promises'
import type { Lines } from '../../core/ports/logStore.js'

/**
 * Writes newline-terminated lines to a Writable and closes it at most once.
 * Errors the stream emits between writes are kept and rethrown on the next
 * write or on close.
 */
export class LineSink {
  readonly #stream: Writable
  #error: Error | null = null
  #closed = false

  constructor(stream: Writable) {
    this.#stream = stream
    stream.on('error', (error: Error) => {
      this.#error ??= error
    })
  }

  get closed(): boolean {
    return this.#closed
  }

  async writeAll(lines: Lines): Promise<void> {
    for await (const line of lines) {
      await this.writeLine(line)
    }
  }

  async writeLine(line: string): Promise<void> {
    if (this.#error) throw this.#error
    if (this.#closed) throw new Error('Write after close')
    if (!this.#stream.write(`${line}\n`, 'utf8')) {
      await once(this.#stream, 'drain')
    }
  }

  /** Flush and close. Resolves once the backend has stored the content. */
  async close(): Promise<void> {
    if (this.#closed) return
    this.#closed = true
    if (this.#error) {
      this.#stream.destroy()
      throw this.#error
    }
    this.#stream.end()
    await finished(this.#stream)
  }

  /** Close without flushing. */
  abort(): void {
    if (this.#closed) return
    this.#closed = true
    this.#stream.destroy()
  }
}
