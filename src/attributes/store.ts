/**
 * AttributeStore - ranged attribute assertions over a text
 *
 * The store keeps, per attribute kind, every assertion that has been made
 * (span, value, sequence). Assertions of the same kind may overlap; nothing
 * is normalized here. {@link RunBuilder} resolves overlaps lazily on read.
 *
 * Every mutation bumps {@link AttributeStore.revision}, which is what run
 * caches key on.
 */

import { createLogger } from '../logger'
import type { Logger } from '../logger'
import { NotFoundError, SpanEditAction, TextMismatchError } from '../types'
import type { AttributeKey } from '../types'
import type { Config } from '../config'
import type { TextStorage } from '../text/buffer'
import { SpanUtils, validateRange, validateSpan } from '../text/span'
import type { TextSpan } from '../text/span'
import { ownEntry } from '../utils/own'
import { partitionPoint } from '../utils/search'
import { PolicyUtils } from './policy'
import type { KindPolicies, ResolvedKindPolicy } from './policy'

/**
 * One ranged claim that a kind has a value over a span
 */
export interface AttributeAssertion<V extends object, K extends AttributeKey<V> = AttributeKey<V>> {
  readonly kind: K
  readonly span: TextSpan
  readonly value: V[K]
  /** Insertion counter, unique within the store and strictly increasing */
  readonly sequence: number
}

export interface AttributeStoreOptions<V extends object> {
  /** Per-kind merge, equality and edit behavior */
  policies?: KindPolicies<V>
  /** What remove() does with an unknown sequence (default: 'error') */
  missingRemoval?: Config['missingRemoval']
  debug?: boolean
}

type Tracks<V extends object> = {
  [K in AttributeKey<V>]?: Array<AttributeAssertion<V, K>>
}

type ResolvedPolicies<V extends object> = {
  [K in AttributeKey<V>]?: ResolvedKindPolicy<V[K]>
}

/**
 * @example
 * ```typescript
 * interface Attrs { weight: 'bold' | 'normal'; color: string }
 *
 * const store = new AttributeStore<Attrs>(TextBuffer.fromString('Hello world'))
 * const id = store.insert('weight', { start: 0, end: 5 }, 'bold')
 * store.insert('color', { start: 3, end: 11 }, '#ff0000')
 * store.remove(id)
 * ```
 */
export class AttributeStore<V extends object> {
  private tracks: Tracks<V> = {}
  private readonly resolvedPolicies: ResolvedPolicies<V> = {}
  private readonly kindOrder: Array<AttributeKey<V>> = []
  private readonly kindBySequence = new Map<number, AttributeKey<V>>()
  private readonly policies: KindPolicies<V>
  private readonly missingRemoval: Config['missingRemoval']
  private readonly logger: Logger
  private nextSequence = 1
  private currentRevision = 0

  constructor(private text: TextStorage, options: AttributeStoreOptions<V> = {}) {
    this.policies = options.policies ?? {}
    this.missingRemoval = options.missingRemoval ?? 'error'
    this.logger = createLogger('AttributeStore', options.debug ?? false)
  }

  /**
   * Length of the text in bytes
   */
  get length(): number {
    return this.text.length
  }

  /**
   * Changes on every successful mutation
   */
  get revision(): number {
    return this.currentRevision
  }

  /**
   * Total number of assertions across all kinds
   */
  get size(): number {
    return this.kindBySequence.size
  }

  /**
   * Apply `value` for `kind` over `span`
   *
   * @returns the sequence id of the new assertion
   * @throws InvalidSpanError if the span is empty, out of bounds or splits a
   * character. The store is left unchanged.
   */
  insert<K extends AttributeKey<V>>(kind: K, span: TextSpan, value: V[K]): number {
    validateSpan(span, this.text)

    const assertion: AttributeAssertion<V, K> = {
      kind,
      span: SpanUtils.create(span.start, span.end),
      value,
      sequence: this.nextSequence++
    }

    const list = ownEntry(this.tracks, kind) ?? []
    // After every assertion with the same start, so ties stay in sequence order
    list.splice(partitionPoint(list, a => a.span.start > span.start), 0, assertion)
    this.tracks[kind] = list

    if (!this.kindOrder.includes(kind)) {
      this.kindOrder.push(kind)
    }
    this.kindBySequence.set(assertion.sequence, kind)
    this.touch()

    this.logger.debug('insert', kind, SpanUtils.toString(span), `#${assertion.sequence}`)
    return assertion.sequence
  }

  /**
   * Delete the assertion with the given sequence id
   *
   * @returns true if an assertion was removed. With `missingRemoval: 'ignore'`
   * an unknown id returns false.
   * @throws NotFoundError for an unknown id with `missingRemoval: 'error'`
   */
  remove(sequence: number): boolean {
    const kind = this.kindBySequence.get(sequence)
    if (kind === undefined) {
      if (this.missingRemoval === 'error') {
        throw new NotFoundError(sequence)
      }
      this.logger.debug('remove: no assertion', `#${sequence}`)
      return false
    }

    this.removeFromTrack(kind, sequence)
    this.kindBySequence.delete(sequence)
    this.touch()

    this.logger.debug('remove', kind, `#${sequence}`)
    return true
  }

  /**
   * Remove every assertion of a kind
   *
   * @returns the number of assertions removed
   */
  clear<K extends AttributeKey<V>>(kind: K): number {
    const list = ownEntry(this.tracks, kind)
    if (!list || list.length === 0) {
      return 0
    }

    for (const assertion of list) {
      this.kindBySequence.delete(assertion.sequence)
    }
    this.tracks[kind] = []
    this.touch()

    this.logger.debug('clear', kind, `${list.length} assertions`)
    return list.length
  }

  /**
   * Remove every assertion of every kind
   */
  clearAll(): void {
    if (this.kindBySequence.size === 0) {
      return
    }
    this.tracks = {}
    this.kindBySequence.clear()
    this.touch()
  }

  /**
   * Look up an assertion by sequence id
   */
  get(sequence: number): AttributeAssertion<V> | undefined {
    const kind = this.kindBySequence.get(sequence)
    if (kind === undefined) {
      return undefined
    }
    return this.assertions(kind).find(a => a.sequence === sequence)
  }

  /**
   * Assertions of one kind, sorted by start
   */
  assertions<K extends AttributeKey<V>>(kind: K): ReadonlyArray<AttributeAssertion<V, K>> {
    return ownEntry(this.tracks, kind) ?? []
  }

  /**
   * Kinds with at least one assertion, in the order they were first used
   */
  kinds(): Array<AttributeKey<V>> {
    return this.kindOrder.filter(kind => this.assertions(kind).length > 0)
  }

  /**
   * Resolved policy for a kind (defaults filled in)
   */
  policy<K extends AttributeKey<V>>(kind: K): ResolvedKindPolicy<V[K]> {
    const cached = ownEntry(this.resolvedPolicies, kind)
    if (cached) {
      return cached
    }
    const resolved = PolicyUtils.resolve(ownEntry(this.policies, kind))
    this.resolvedPolicies[kind] = resolved
    return resolved
  }

  /**
   * Every assertion covering the byte at `offset`, oldest first
   *
   * Overlaps are not resolved; this reports everything.
   */
  attributesAt(offset: number): Array<AttributeAssertion<V>> {
    return this.collect(span => SpanUtils.contains(span, offset))
  }

  /**
   * Every assertion overlapping `span`, oldest first
   *
   * Overlaps are not resolved; this reports everything.
   */
  attributesForRange(span: TextSpan): Array<AttributeAssertion<V>> {
    return this.collect(candidate => SpanUtils.overlaps(candidate, span))
  }

  /**
   * Rebase every assertion after `range` has been deleted from the text
   *
   * Called by the owner of the text once it has built the edited buffer.
   * Spans after the deletion shift left. Spans overlapping it are dropped if
   * their kind's `onEdit` is `Remove`; otherwise the deleted bytes are cut
   * out of them, and spans left empty are dropped.
   *
   * @returns the sequence ids of dropped assertions
   * @throws InvalidSpanError if `range` is not a valid range of the old text
   * @throws TextMismatchError if `nextText` is not `range` shorter than the old text
   */
  applyDeletion(range: TextSpan, nextText: TextStorage): number[] {
    validateRange(range, this.text)

    const deleted = range.end - range.start
    if (nextText.length !== this.text.length - deleted) {
      throw new TextMismatchError(this.text.length - deleted, nextText.length)
    }

    const dropped: number[] = []
    if (deleted > 0) {
      for (const kind of this.kindOrder) {
        dropped.push(...this.rebaseTrack(kind, range))
      }
      for (const sequence of dropped) {
        this.kindBySequence.delete(sequence)
      }
    }

    this.text = nextText
    this.touch()

    this.logger.debug('delete', SpanUtils.toString(range), `${dropped.length} assertions dropped`)
    return dropped
  }

  private rebaseTrack<K extends AttributeKey<V>>(kind: K, range: TextSpan): number[] {
    const list = ownEntry(this.tracks, kind)
    if (!list) {
      return []
    }

    const removeOnEdit = this.policy(kind).onEdit === SpanEditAction.Remove
    const dropped: number[] = []
    const kept: Array<AttributeAssertion<V, K>> = []

    for (const assertion of list) {
      const { span } = assertion
      if (removeOnEdit && SpanUtils.overlaps(span, range)) {
        dropped.push(assertion.sequence)
        continue
      }

      const start = rebaseOffset(span.start, range)
      const end = rebaseOffset(span.end, range)
      if (start >= end) {
        dropped.push(assertion.sequence)
        continue
      }

      kept.push(
        start === span.start && end === span.end
          ? assertion
          : { ...assertion, span: SpanUtils.create(start, end) }
      )
    }

    this.tracks[kind] = kept
    return dropped
  }

  private removeFromTrack<K extends AttributeKey<V>>(kind: K, sequence: number): void {
    const list = ownEntry(this.tracks, kind)
    if (!list) {
      return
    }
    const index = list.findIndex(a => a.sequence === sequence)
    if (index >= 0) {
      list.splice(index, 1)
    }
  }

  private collect(matches: (span: TextSpan) => boolean): Array<AttributeAssertion<V>> {
    const result: Array<AttributeAssertion<V>> = []
    for (const kind of this.kindOrder) {
      for (const assertion of this.assertions(kind)) {
        if (matches(assertion.span)) {
          result.push(assertion)
        }
      }
    }
    return result.sort((a, b) => a.sequence - b.sequence)
  }

  private touch(): void {
    this.currentRevision++
  }
}

/**
 * Map an offset in the old text to the edited text
 */
function rebaseOffset(offset: number, deletion: TextSpan): number {
  if (offset <= deletion.start) {
    return offset
  }
  if (offset <= deletion.end) {
    return deletion.start
  }
  return offset - (deletion.end - deletion.start)
}
