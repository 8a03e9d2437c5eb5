/**
 * Core TypeScript types for spanstyle
 * @module types
 */

import type { TextSpan } from './text/span'

// ====================
// Attribute Types
// ====================

/**
 * String keys of an attribute map
 *
 * Callers describe their attribute kinds as an object type, for example
 * `{ weight: 'bold' | 'normal'; color: string }`. Every string key is a kind
 * and its property type is the type of the values asserted for that kind.
 */
export type AttributeKey<V extends object> = Extract<keyof V, string>

/**
 * Resolved value per kind. A kind that is absent has no entry.
 */
export type ResolvedAttributes<V extends object> = {
  readonly [K in AttributeKey<V>]?: V[K]
}

/**
 * Mutable counterpart of {@link ResolvedAttributes}, used while building
 */
export type AttributeRecord<V extends object> = {
  [K in AttributeKey<V>]?: V[K]
}

/**
 * What happens to a span when text it covers is edited
 */
export enum SpanEditAction {
  /**
   * Keep the span and clip it around the edit. Typical of style attributes.
   */
  Keep = 'keep',

  /**
   * Drop the span. Typical of attributes whose meaning depends on the exact
   * text, like spelling errors or compiler diagnostics.
   */
  Remove = 'remove'
}

// ====================
// Style Types
// ====================

export type StyleValue = string | number | boolean

export type StyleProperties = Readonly<Record<string, StyleValue>>

// ====================
// Error Types
// ====================

export class SpanStyleError extends Error {
  constructor(message: string, public code: string) {
    super(message)
    this.name = 'SpanStyleError'
  }
}

export type InvalidSpanReason = 'empty' | 'reversed' | 'out-of-bounds' | 'misaligned'

export class InvalidSpanError extends SpanStyleError {
  constructor(
    message: string,
    public readonly span: TextSpan,
    public readonly reason: InvalidSpanReason
  ) {
    super(message, 'INVALID_SPAN')
    this.name = 'InvalidSpanError'
  }
}

export class NotFoundError extends SpanStyleError {
  constructor(public readonly sequence: number) {
    super(`No attribute assertion with sequence ${sequence}`, 'NOT_FOUND')
    this.name = 'NotFoundError'
  }
}

export class InvalidTextError extends SpanStyleError {
  constructor(message: string) {
    super(message, 'INVALID_TEXT')
    this.name = 'InvalidTextError'
  }
}

/**
 * The edited text handed to a deletion does not match the deleted range
 */
export class TextMismatchError extends SpanStyleError {
  constructor(
    public readonly expectedLength: number,
    public readonly actualLength: number
  ) {
    super(`Edited text has length ${actualLength}, expected ${expectedLength}`, 'TEXT_MISMATCH')
    this.name = 'TextMismatchError'
  }
}

export class ResolverConfigError extends SpanStyleError {
  constructor(message: string) {
    super(message, 'RESOLVER_CONFIG')
    this.name = 'ResolverConfigError'
  }
}

/**
 * Raised when the engine produces an inconsistent result.
 *
 * This is a defect in spanstyle itself, never a problem with caller input.
 * Check `isFault` (or `instanceof`) to tell it apart from validation errors.
 */
export class InvariantViolationError extends SpanStyleError {
  readonly isFault = true

  constructor(message: string) {
    super(message, 'INVARIANT_VIOLATION')
    this.name = 'InvariantViolationError'
  }
}
