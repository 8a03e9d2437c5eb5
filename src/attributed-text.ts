/**
 * AttributedText - text with ranged attributes, resolved into styled runs
 *
 * This is the object a markup parser builds (insert/remove/clear) and a
 * layout engine reads (runs()).
 *
 * Run snapshots are computed lazily and cached until the next mutation. A
 * snapshot is never patched: after any mutation, previously returned
 * snapshots are stale and the next call returns new arrays. With
 * `freezeSnapshots` (the default) snapshots are deeply frozen and may be
 * shared between readers.
 *
 * The facade owns both the text and its AttributeStore. Text edits go through
 * delete() so the two never disagree about the text length.
 *
 * @module attributed-text
 */

import { AttributeStore } from './attributes/store'
import type { AttributeAssertion } from './attributes/store'
import type { KindPolicies, ResolvedKindPolicy } from './attributes/policy'
import { loadConfig } from './config'
import type { Config, ConfigOptions } from './config'
import { createLogger } from './logger'
import type { Logger } from './logger'
import type { Resolver, StyledRun } from './resolver/resolver'
import { RunBuilder } from './runs/builder'
import { RunUtils } from './runs/run'
import type { Run } from './runs/run'
import { TextBuffer } from './text/buffer'
import { SpanUtils, validateRange } from './text/span'
import type { TextSpan } from './text/span'
import { SpanStyleError } from './types'
import type { AttributeKey } from './types'

export interface AttributedTextOptions<V extends object> {
  /** Per-kind merge, equality and edit behavior */
  policies?: KindPolicies<V>
  /** Needed for runs(); attributeRuns() works without one */
  resolver?: Resolver<V>
  config?: ConfigOptions
}

interface Snapshot<T> {
  readonly revision: number
  readonly value: T
}

/**
 * @example
 * ```typescript
 * interface Attrs { weight: 'bold' | 'normal' }
 *
 * const resolver = new Resolver<Attrs>()
 *   .registerRule('weight', w => ({ fontWeight: w === 'bold' ? 700 : 400 }), 'normal')
 *
 * const text = new AttributedText<Attrs>('Hello world', { resolver })
 * text.insert('weight', { start: 0, end: 5 }, 'bold')
 *
 * for (const run of text.runs()) {
 *   layout.shape(text.slice(run.span), run.properties)
 * }
 * ```
 */
export class AttributedText<V extends object> {
  readonly config: Config

  private buffer: TextBuffer
  private readonly store: AttributeStore<V>
  private readonly resolver?: Resolver<V>
  private readonly builder: RunBuilder
  private readonly logger: Logger
  private attributeSnapshot: Snapshot<ReadonlyArray<Run<V>>> | null = null
  private styledSnapshot: Snapshot<readonly StyledRun[]> | null = null

  constructor(text: string | TextBuffer, options: AttributedTextOptions<V> = {}) {
    this.config = loadConfig(options.config)
    this.buffer = typeof text === 'string' ? TextBuffer.fromString(text) : text
    this.resolver = options.resolver
    this.store = new AttributeStore<V>(this.buffer, {
      policies: options.policies,
      missingRemoval: this.config.missingRemoval,
      debug: this.config.debug
    })
    this.builder = new RunBuilder({ debug: this.config.debug })
    this.logger = createLogger('AttributedText', this.config.debug)
  }

  get text(): TextBuffer {
    return this.buffer
  }

  /**
   * Length of the text in bytes
   */
  get length(): number {
    return this.buffer.length
  }

  /**
   * Changes whenever the attributes or the text change
   */
  get revision(): number {
    return this.store.revision
  }

  /**
   * Decode the text under a span
   */
  slice(span: TextSpan): string {
    return this.buffer.slice(span)
  }

  // ====================
  // Build phase
  // ====================

  /**
   * Apply `value` for `kind` over `span` (byte offsets)
   *
   * @returns the sequence id of the assertion, for remove()
   * @throws InvalidSpanError (nothing is applied)
   */
  insert<K extends AttributeKey<V>>(kind: K, span: TextSpan, value: V[K]): number {
    return this.store.insert(kind, span, value)
  }

  /**
   * @throws NotFoundError for an unknown id unless `missingRemoval` is 'ignore'
   */
  remove(sequence: number): boolean {
    return this.store.remove(sequence)
  }

  clear<K extends AttributeKey<V>>(kind: K): number {
    return this.store.clear(kind)
  }

  /**
   * Delete a byte range from the text
   *
   * Attribute spans are rebased onto the shorter text; see
   * {@link AttributeStore.applyDeletion}. An empty range is a no-op.
   *
   * @returns sequence ids of assertions dropped by the edit
   * @throws InvalidSpanError if the range is reversed, out of bounds or
   * splits a character
   */
  delete(range: TextSpan): number[] {
    validateRange(range, this.buffer)
    if (SpanUtils.isEmpty(range)) {
      return []
    }

    const next = this.buffer.withRangeRemoved(range)
    const dropped = this.store.applyDeletion(range, next)
    this.buffer = next

    this.logger.debug('delete', SpanUtils.toString(range), `length now ${next.length}`)
    return dropped
  }

  // ====================
  // Query phase
  // ====================

  /**
   * Total number of assertions across all kinds
   */
  get size(): number {
    return this.store.size
  }

  /**
   * Kinds with at least one assertion, in the order they were first used
   */
  kinds(): Array<AttributeKey<V>> {
    return this.store.kinds()
  }

  /**
   * Assertions of one kind, sorted by start
   */
  assertions<K extends AttributeKey<V>>(kind: K): ReadonlyArray<AttributeAssertion<V, K>> {
    return this.store.assertions(kind)
  }

  get(sequence: number): AttributeAssertion<V> | undefined {
    return this.store.get(sequence)
  }

  /**
   * Resolved policy for a kind (defaults filled in)
   */
  policy<K extends AttributeKey<V>>(kind: K): ResolvedKindPolicy<V[K]> {
    return this.store.policy(kind)
  }

  /**
   * Every assertion covering a byte, unresolved, oldest first
   */
  attributesAt(offset: number): Array<AttributeAssertion<V>> {
    return this.store.attributesAt(offset)
  }

  /**
   * Every assertion overlapping a span, unresolved, oldest first
   */
  attributesForRange(span: TextSpan): Array<AttributeAssertion<V>> {
    return this.store.attributesForRange(span)
  }

  /**
   * The run partition with one resolved value per kind
   *
   * @throws InvariantViolationError on an engine defect
   */
  attributeRuns(): ReadonlyArray<Run<V>> {
    const revision = this.store.revision
    if (this.attributeSnapshot?.revision === revision) {
      return this.attributeSnapshot.value
    }

    const runs = this.builder.build(this.store)
    const value = this.config.freezeSnapshots ? Object.freeze(runs.map(freezeRun)) : runs
    this.attributeSnapshot = { revision, value }
    return value
  }

  /**
   * Styled runs in left-to-right order, covering the whole text
   *
   * @throws SpanStyleError with code `NO_RESOLVER` if no resolver was given
   * @throws InvariantViolationError on an engine defect
   */
  runs(): readonly StyledRun[] {
    if (!this.resolver) {
      throw new SpanStyleError('AttributedText has no resolver; pass one in the options', 'NO_RESOLVER')
    }

    const revision = this.store.revision
    if (this.styledSnapshot?.revision === revision) {
      return this.styledSnapshot.value
    }

    const styled = this.resolver.resolve(this.attributeRuns())
    const value = this.config.freezeSnapshots ? Object.freeze(styled.map(freezeStyledRun)) : styled
    this.styledSnapshot = { revision, value }
    return value
  }

  /**
   * The styled run covering a byte, or undefined past the end of the text
   */
  styleAt(offset: number): StyledRun | undefined {
    return RunUtils.findAt(this.runs(), offset)
  }

  toString(): string {
    return this.attributeRuns().map(run => RunUtils.toString(run)).join(' ')
  }
}

function freezeRun<V extends object>(run: Run<V>): Run<V> {
  Object.freeze(run.span)
  Object.freeze(run.attributes)
  return Object.freeze(run)
}

function freezeStyledRun(run: StyledRun): StyledRun {
  Object.freeze(run.span)
  Object.freeze(run.properties)
  return Object.freeze(run)
}
