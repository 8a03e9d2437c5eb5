/**
 * TextBuffer - immutable UTF-8 text
 *
 * Attribute spans are byte offsets into this buffer. The buffer never changes
 * after construction; edits produce a new buffer.
 *
 * @module text/buffer
 */

import { InvalidTextError } from '../types'
import type { TextSpan } from './span'

const encoder = new TextEncoder()
const decoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true })

/**
 * A block of text that attributes can be applied to
 */
export interface TextStorage {
  /** Length in bytes */
  readonly length: number

  /**
   * Whether `offset` falls between two characters (or at either end).
   * Offsets inside a multi-byte character are not boundaries.
   */
  isBoundary(offset: number): boolean
}

/**
 * Immutable UTF-8 byte buffer
 *
 * @example
 * ```typescript
 * const text = TextBuffer.fromString('héllo')
 * text.length          // 6
 * text.isBoundary(2)   // false, inside 'é'
 * text.slice({ start: 0, end: 3 }) // 'hé'
 * ```
 */
export class TextBuffer implements TextStorage {
  private readonly bytes: Uint8Array

  private constructor(bytes: Uint8Array) {
    this.bytes = bytes
  }

  static fromString(text: string): TextBuffer {
    return new TextBuffer(encoder.encode(text))
  }

  /**
   * Wrap already-encoded bytes. The bytes are copied and must be valid UTF-8.
   */
  static fromBytes(bytes: Uint8Array): TextBuffer {
    try {
      decoder.decode(bytes)
    } catch (error) {
      throw new InvalidTextError(
        `Text is not valid UTF-8: ${error instanceof Error ? error.message : String(error)}`
      )
    }
    return new TextBuffer(bytes.slice())
  }

  static empty(): TextBuffer {
    return new TextBuffer(new Uint8Array(0))
  }

  get length(): number {
    return this.bytes.length
  }

  isEmpty(): boolean {
    return this.bytes.length === 0
  }

  isBoundary(offset: number): boolean {
    if (!Number.isInteger(offset) || offset < 0 || offset > this.bytes.length) {
      return false
    }
    if (offset === 0 || offset === this.bytes.length) {
      return true
    }
    // UTF-8 continuation bytes look like 10xxxxxx
    const byte = this.bytes[offset] ?? 0
    return (byte & 0xc0) !== 0x80
  }

  /**
   * Decode the text covered by a span
   */
  slice(span: TextSpan): string {
    return decoder.decode(this.bytes.subarray(span.start, span.end))
  }

  /**
   * Copy of the underlying bytes
   */
  toBytes(): Uint8Array {
    return this.bytes.slice()
  }

  /**
   * Build a new buffer with the bytes of `span` removed
   */
  withRangeRemoved(span: TextSpan): TextBuffer {
    const next = new Uint8Array(this.bytes.length - (span.end - span.start))
    next.set(this.bytes.subarray(0, span.start), 0)
    next.set(this.bytes.subarray(span.end), span.start)
    return new TextBuffer(next)
  }

  toString(): string {
    return decoder.decode(this.bytes)
  }
}
