import type { Readable } from 'node:stream'
import { StringDecoder } from 'node:string_decoder'
import { ioFailure } from '../../core/entities/errors.js'
import type { CloseableLineIterator } from '../../core/ports/logStore.js'

/**
 * Cuts the complete lines off the front of `text`. A line ends at `\n`, `\r`
 * or `\r\n`; a trailing `\r` stays in `rest` until the next character shows
 * whether a `\n` follows.
 */
function takeLines(text: string): { lines: string[]; rest: string } {
  const lines: string[] = []
  const breaks = /[\r\n]/g
  let start = 0
  for (let match = breaks.exec(text); match; match = breaks.exec(text)) {
    const end = match.index
    if (text[end] === '\r') {
      if (end + 1 === text.length) break
      lines.push(text.slice(start, end))
      start = text[end + 1] === '\n' ? end + 2 : end + 1
    } else {
      lines.push(text.slice(start, end))
      start = end + 1
    }
    breaks.lastIndex = start
  }
  return { lines, rest: text.slice(start) }
}

/**
 * Splits a byte stream into UTF-8 lines ended by `\n`, `\r` or `\r\n`.
 *
 * The source is destroyed once, whichever comes first: exhaustion, an error,
 * `return()` from a `break`, or `close()`.
 */
export class LineReader implements CloseableLineIterator {
  readonly #path: string
  readonly #source: Readable
  readonly #lines: AsyncGenerator<string, void, undefined>
  #closed = false

  constructor(path: string, source: Readable) {
    this.#path = path
    this.#source = source
    this.#lines = this.#split()
  }

  get closed(): boolean {
    return this.#closed
  }

  [Symbol.asyncIterator](): this {
    return this
  }

  async next(): Promise<IteratorResult<string>> {
    try {
      return await this.#lines.next()
    } catch (error) {
      await this.close()
      throw ioFailure(this.#path, error)
    }
  }

  async return(): Promise<IteratorResult<string>> {
    // A generator that never started skips its finally block, so close here too
    await this.#lines.return(undefined)
    await this.close()
    return { done: true, value: undefined }
  }

  async close(): Promise<void> {
    if (this.#closed) return
    this.#closed = true
    this.#source.destroy()
  }

  async *#split(): AsyncGenerator<string, void, undefined> {
    const decoder = new StringDecoder('utf8')
    let pending = ''
    try {
      for await (const chunk of this.#source) {
        if (typeof chunk === 'string') {
          pending += chunk
        } else if (chunk instanceof Uint8Array) {
          pending += decoder.write(Buffer.from(chunk.buffer, chunk.byteOffset, chunk.byteLength))
        } else {
          throw new Error(`Unexpected chunk type: ${typeof chunk}`)
        }

        const { lines, rest } = takeLines(pending)
        pending = rest
        yield* lines
      }
      pending += decoder.end()
      const { lines, rest } = takeLines(pending)
      yield* lines
      if (rest.length > 0) yield rest.endsWith('\r') ? rest.slice(0, -1) : rest
    } finally {
      await this.close()
    }
  }
}
