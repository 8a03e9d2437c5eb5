import { describe, it, expect } from 'vitest'
import { SpanUtils, validateRange, validateSpan } from './span'
import { TextBuffer } from './buffer'
import { InvalidSpanError } from '../types'

function reasonFor(run: () => void): string | undefined {
  try {
    run()
  } catch (error) {
    if (error instanceof InvalidSpanError) return error.reason
    throw error
  }
  return undefined
}

describe('SpanUtils', () => {
  it('should not treat abutting spans as overlapping', () => {
    expect(SpanUtils.overlaps({ start: 0, end: 5 }, { start: 5, end: 8 })).toBe(false)
    expect(SpanUtils.overlaps({ start: 0, end: 5 }, { start: 4, end: 8 })).toBe(true)
  })

  it('should compute intersections', () => {
    expect(SpanUtils.intersection({ start: 0, end: 6 }, { start: 3, end: 10 })).toEqual({ start: 3, end: 6 })
    expect(SpanUtils.intersection({ start: 0, end: 3 }, { start: 3, end: 10 })).toBeNull()
  })

  it('should check containment as half-open', () => {
    const span = { start: 2, end: 4 }
    expect(SpanUtils.contains(span, 2)).toBe(true)
    expect(SpanUtils.contains(span, 3)).toBe(true)
    expect(SpanUtils.contains(span, 4)).toBe(false)
  })

  it('should order by start then end', () => {
    const spans = [
      { start: 3, end: 5 },
      { start: 1, end: 9 },
      { start: 1, end: 2 }
    ]
    expect([...spans].sort(SpanUtils.compare)).toEqual([
      { start: 1, end: 2 },
      { start: 1, end: 9 },
      { start: 3, end: 5 }
    ])
  })

  it('should format spans as half-open intervals', () => {
    expect(SpanUtils.toString({ start: 3, end: 10 })).toBe('[3, 10)')
  })
})

describe('validateSpan', () => {
  const text = TextBuffer.fromString('abc')

  it('should accept spans inside the text', () => {
    expect(() => validateSpan({ start: 0, end: 3 }, text)).not.toThrow()
    expect(() => validateSpan({ start: 1, end: 2 }, text)).not.toThrow()
  })

  it('should reject empty spans', () => {
    expect(reasonFor(() => validateSpan({ start: 1, end: 1 }, text))).toBe('empty')
  })

  it('should reject spans past the end of the text', () => {
    expect(reasonFor(() => validateSpan({ start: 0, end: 4 }, text))).toBe('out-of-bounds')
    expect(reasonFor(() => validateSpan({ start: -1, end: 2 }, text))).toBe('out-of-bounds')
  })

  it('should reject reversed spans', () => {
    expect(reasonFor(() => validateSpan({ start: 2, end: 1 }, text))).toBe('reversed')
  })

  it('should reject spans splitting a character', () => {
    const accented = TextBuffer.fromString('é')
    expect(reasonFor(() => validateSpan({ start: 0, end: 1 }, accented))).toBe('misaligned')
  })

  it('should carry the offending offsets', () => {
    try {
      validateSpan({ start: 2, end: 7 }, text)
      expect.unreachable()
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidSpanError)
      if (error instanceof InvalidSpanError) {
        expect(error.code).toBe('INVALID_SPAN')
        expect(error.span).toEqual({ start: 2, end: 7 })
        expect(error.reason).toBe('out-of-bounds')
        expect(error.message).toBe('Span [2, 7) is outside the text (length 3)')
      }
    }
  })
})

describe('validateRange', () => {
  it('should accept empty edit ranges', () => {
    expect(() => validateRange({ start: 1, end: 1 }, TextBuffer.fromString('abc'))).not.toThrow()
  })

  it('should still reject misaligned ranges', () => {
    expect(reasonFor(() => validateRange({ start: 1, end: 1 }, TextBuffer.fromString('é')))).toBe(
      'misaligned'
    )
  })
})
