/**
 * TextSpan - half-open byte interval [start, end)
 *
 * Spans are plain readonly objects so they can be shared freely between
 * assertions, runs and styled runs.
 */

import { InvalidSpanError } from '../types'
import type { TextStorage } from './buffer'

export interface TextSpan {
  readonly start: number
  readonly end: number
}

/**
 * Utilities for working with TextSpans
 */
export const SpanUtils = {
  create(start: number, end: number): TextSpan {
    return { start, end }
  },

  length(span: TextSpan): number {
    return Math.max(0, span.end - span.start)
  },

  isEmpty(span: TextSpan): boolean {
    return span.end <= span.start
  },

  /**
   * Check if a byte offset is within the span
   */
  contains(span: TextSpan, offset: number): boolean {
    return offset >= span.start && offset < span.end
  },

  /**
   * Two spans overlap if they share at least one byte. Abutting spans
   * (`a.end === b.start`) do not overlap.
   */
  overlaps(a: TextSpan, b: TextSpan): boolean {
    return a.start < b.end && b.start < a.end
  },

  intersection(a: TextSpan, b: TextSpan): TextSpan | null {
    const start = Math.max(a.start, b.start)
    const end = Math.min(a.end, b.end)
    return start < end ? { start, end } : null
  },

  equals(a: TextSpan, b: TextSpan): boolean {
    return a.start === b.start && a.end === b.end
  },

  /**
   * Order by start, then by end
   */
  compare(a: TextSpan, b: TextSpan): number {
    return a.start - b.start || a.end - b.end
  },

  toString(span: TextSpan): string {
    return `[${span.start}, ${span.end})`
  }
}

/**
 * Validate an attribute span against the text it applies to
 *
 * @throws InvalidSpanError if the span is empty, out of bounds, or splits a
 * multi-byte character
 */
export function validateSpan(span: TextSpan, text: TextStorage): void {
  checkRange(span, text, false)
}

/**
 * Validate an edit range. Unlike attribute spans, edit ranges may be empty.
 *
 * @throws InvalidSpanError
 */
export function validateRange(span: TextSpan, text: TextStorage): void {
  checkRange(span, text, true)
}

function checkRange(span: TextSpan, text: TextStorage, allowEmpty: boolean): void {
  const { start, end } = span
  const offending = SpanUtils.create(start, end)
  const label = SpanUtils.toString(span)

  if (!Number.isInteger(start) || !Number.isInteger(end) || start < 0 || end > text.length) {
    throw new InvalidSpanError(
      `Span ${label} is outside the text (length ${text.length})`,
      offending,
      'out-of-bounds'
    )
  }

  if (start > end) {
    throw new InvalidSpanError(`Span ${label} ends before it starts`, offending, 'reversed')
  }

  if (start === end && !allowEmpty) {
    throw new InvalidSpanError(`Span ${label} is empty`, offending, 'empty')
  }

  if (!text.isBoundary(start) || !text.isBoundary(end)) {
    throw new InvalidSpanError(
      `Span ${label} splits a multi-byte character`,
      offending,
      'misaligned'
    )
  }
}
