import type { IOAdapter } from '@cursevm/types'
import { isDelimiter } from './whitespace'

/**
 * In-memory I/O adapter
 *
 * Reads from a fixed input string and collects everything written. Used by
 * tests and by hosts embedding the interpreter.
 */
export class BufferIOAdapter implements IOAdapter {
  private readonly input: number[]
  private cursor = 0
  private readonly chunks: string[] = []

  constructor(input = '') {
    this.input = Array.from(input, (char) => char.codePointAt(0) ?? 0)
  }

  get output(): string {
    return this.chunks.join('')
  }

  /** code points not yet consumed */
  get remaining(): number {
    return this.input.length - this.cursor
  }

  async readNumber(): Promise<string | null> {
    while (this.cursor < this.input.length && this.isDelimiterAt(this.cursor)) {
      this.cursor++
    }

    const start = this.cursor
    while (this.cursor < this.input.length && !this.isDelimiterAt(this.cursor)) {
      this.cursor++
    }

    if (start === this.cursor) {
      return null
    }
    return this.input
      .slice(start, this.cursor)
      .map((codepoint) => String.fromCodePoint(codepoint))
      .join('')
  }

  async readCodepoint(): Promise<number | null> {
    const codepoint = this.input[this.cursor]
    if (codepoint === undefined) {
      return null
    }
    this.cursor++
    return codepoint
  }

  writeText(text: string): void {
    this.chunks.push(text)
  }

  writeCodepoint(codepoint: number): void {
    this.chunks.push(String.fromCodePoint(codepoint))
  }

  private isDelimiterAt(position: number): boolean {
    const codepoint = this.input[position]
    return codepoint !== undefined && isDelimiter(codepoint)
  }
}
