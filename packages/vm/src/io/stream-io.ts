/**
 * Stream I/O Adapter
 *
 * Reads raw bytes from a Node Readable and decodes them on demand, so number
 * tokens and single code points can be interleaved on the same input.
 * Writes UTF-8 text to a Writable.
 */

import { once } from 'node:events'
import type { Readable, Writable } from 'node:stream'
import { logger } from '@cursevm/core'
import type { IOAdapter } from '@cursevm/types'
import { isDelimiter } from './whitespace'

// payload bits of the leading byte, by continuation byte count
const LEADING_MASK = [0x7f, 0x1f, 0x0f, 0x07] as const

/**
 * Number of continuation bytes announced by a leading byte, null when the
 * byte cannot start a sequence
 */
export function continuationCount(byte: number): number | null {
  if ((byte & 0x80) === 0) return 0
  if ((byte & 0xe0) === 0xc0) return 1
  if ((byte & 0xf0) === 0xe0) return 2
  if ((byte & 0xf8) === 0xf0) return 3
  return null
}

export class StreamIOAdapter implements IOAdapter {
  private readonly source: AsyncIterator<unknown>
  private buffer: Uint8Array = new Uint8Array(0)
  private offset = 0
  private ended = false

  constructor(
    input: Readable,
    private readonly output: Writable,
  ) {
    this.source = input[Symbol.asyncIterator]()
  }

  async readNumber(): Promise<string | null> {
    for (;;) {
      const byte = await this.peekByte()
      if (byte === null) return null
      if (!isDelimiter(byte)) break
      this.offset++
    }

    const bytes: number[] = []
    for (;;) {
      const byte = await this.peekByte()
      if (byte === null || isDelimiter(byte)) break
      bytes.push(byte)
      this.offset++
    }
    return Buffer.from(bytes).toString('utf8')
  }

  /**
   * Decode one code point. A malformed or truncated sequence reads as end of
   * input for this call; the bytes examined are consumed.
   */
  async readCodepoint(): Promise<number | null> {
    const first = await this.readByte()
    if (first === null) {
      return null
    }

    const count = continuationCount(first)
    if (count === null) {
      logger.debug('Invalid UTF-8 leading byte', { byte: first })
      return null
    }

    let codepoint = first & LEADING_MASK[count]
    for (let i = 0; i < count; i++) {
      const byte = await this.readByte()
      if (byte === null || (byte & 0xc0) !== 0x80) {
        logger.debug('Invalid UTF-8 continuation byte', { byte })
        return null
      }
      codepoint = (codepoint << 6) | (byte & 0x3f)
    }
    return codepoint
  }

  writeText(text: string): void {
    this.output.write(text)
  }

  writeCodepoint(codepoint: number): void {
    this.output.write(String.fromCodePoint(codepoint))
  }

  /**
   * Wait until buffered output has been handed to the underlying resource
   */
  async flush(): Promise<void> {
    if (this.output.writableNeedDrain) {
      await once(this.output, 'drain')
    }
  }

  /**
   * Stop reading input; releases the underlying stream
   */
  async close(): Promise<void> {
    this.ended = true
    await this.source.return?.()
  }

  private async readByte(): Promise<number | null> {
    const byte = await this.peekByte()
    if (byte !== null) {
      this.offset++
    }
    return byte
  }

  private async peekByte(): Promise<number | null> {
    while (this.offset >= this.buffer.length) {
      if (!(await this.fill())) {
        return null
      }
    }
    return this.buffer[this.offset] ?? null
  }

  private async fill(): Promise<boolean> {
    if (this.ended) {
      return false
    }
    const next = await this.source.next()
    if (next.done) {
      this.ended = true
      return false
    }
    this.buffer = toBytes(next.value)
    this.offset = 0
    return true
  }
}

function toBytes(chunk: unknown): Uint8Array {
  if (chunk instanceof Uint8Array) {
    return chunk
  }
  if (typeof chunk === 'string') {
    return Buffer.from(chunk, 'utf8')
  }
  throw new TypeError(`Unsupported stream chunk: ${typeof chunk}`)
}
