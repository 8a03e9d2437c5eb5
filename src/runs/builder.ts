/**
 * RunBuilder - normalize an AttributeStore into a run partition
 *
 * Algorithm:
 * 1. Collect every assertion boundary, plus 0 and the text length, as
 *    sorted breakpoints. Between two consecutive breakpoints no assertion
 *    starts or ends, so the interval is attribute-homogeneous.
 * 2. Sweep the intervals left to right. Per kind, keep the assertions that
 *    cover the interval's start: a cursor into the start-sorted assertion
 *    list adds assertions as they begin, and assertions whose end has been
 *    reached drop out. The kind's merge policy picks the value.
 * 3. Merge neighbouring intervals whose resolved sets are equal.
 * 4. Verify the runs partition [0, length) before handing them out.
 */

import { PolicyUtils } from '../attributes/policy'
import type { AttributeAssertion, AttributeStore } from '../attributes/store'
import { createLogger } from '../logger'
import type { Logger } from '../logger'
import { InvariantViolationError } from '../types'
import type { AttributeKey, AttributeRecord } from '../types'
import { SpanUtils } from '../text/span'
import { sortedUnique } from '../utils/search'
import { RunUtils } from './run'
import type { KindEquality, Run } from './run'

export interface RunBuilderOptions {
  debug?: boolean
}

/**
 * Sweep state for one kind
 */
class KindCursor<V extends object, K extends AttributeKey<V>> {
  private next = 0
  private active: Array<AttributeAssertion<V, K>> = []

  constructor(private readonly assertions: ReadonlyArray<AttributeAssertion<V, K>>) {}

  /**
   * Move to `offset` and return the values covering it, oldest first
   */
  advance(offset: number): Array<V[K]> {
    let added = false
    while (this.next < this.assertions.length) {
      const assertion = this.assertions[this.next]
      if (!assertion || assertion.span.start > offset) break
      this.active.push(assertion)
      this.next++
      added = true
    }

    this.active = this.active.filter(a => a.span.end > offset)
    if (added) {
      this.active.sort((a, b) => a.sequence - b.sequence)
    }
    return this.active.map(a => a.value)
  }
}

export class RunBuilder {
  private readonly logger: Logger

  constructor(options: RunBuilderOptions = {}) {
    this.logger = createLogger('RunBuilder', options.debug ?? false)
  }

  /**
   * Build the canonical run partition of the store's text
   *
   * @throws InvariantViolationError if the result does not partition the
   * text. This indicates a defect in the builder, not bad input.
   */
  build<V extends object>(store: AttributeStore<V>): Array<Run<V>> {
    const length = store.length
    if (length === 0) {
      return []
    }

    const kinds = store.kinds()
    const breakpoints = collectBreakpoints(store, kinds)
    const equals: KindEquality<V> = (kind, a, b) => store.policy(kind).equals(a, b)

    const runs: Array<Run<V>> = []
    let previous: Run<V> | undefined
    const resolveAt = this.createResolver(store, kinds)

    for (let i = 0; i + 1 < breakpoints.length; i++) {
      const start = breakpoints[i]
      const end = breakpoints[i + 1]
      if (start === undefined || end === undefined) break

      const attributes = resolveAt(start)
      if (previous && RunUtils.sameAttributes(previous.attributes, attributes, kinds, equals)) {
        previous = { span: SpanUtils.create(previous.span.start, end), attributes: previous.attributes }
        runs[runs.length - 1] = previous
      } else {
        previous = { span: SpanUtils.create(start, end), attributes }
        runs.push(previous)
      }
    }

    verifyPartition(runs, length, kinds, equals)

    this.logger.debug(
      'build',
      `${breakpoints.length - 1} intervals -> ${runs.length} runs`,
      `(${kinds.length} kinds, ${store.size} assertions)`
    )
    return runs
  }

  /**
   * Returns a function resolving every kind at increasing offsets
   */
  private createResolver<V extends object>(
    store: AttributeStore<V>,
    kinds: ReadonlyArray<AttributeKey<V>>
  ): (offset: number) => AttributeRecord<V> {
    const steps = kinds.map(kind => this.kindStep(store, kind))
    return offset => {
      const attributes: AttributeRecord<V> = {}
      for (const step of steps) {
        step(offset, attributes)
      }
      return attributes
    }
  }

  private kindStep<V extends object, K extends AttributeKey<V>>(
    store: AttributeStore<V>,
    kind: K
  ): (offset: number, into: AttributeRecord<V>) => void {
    const cursor = new KindCursor<V, K>(store.assertions(kind))
    const merge = store.policy(kind).merge
    return (offset, into) => {
      const value = PolicyUtils.pick(merge, cursor.advance(offset))
      if (value !== undefined) {
        into[kind] = value
      }
    }
  }
}

function collectBreakpoints<V extends object>(
  store: AttributeStore<V>,
  kinds: ReadonlyArray<AttributeKey<V>>
): number[] {
  const offsets: number[] = [0, store.length]
  for (const kind of kinds) {
    for (const { span } of store.assertions(kind)) {
      offsets.push(span.start, span.end)
    }
  }
  return sortedUnique(offsets)
}

/**
 * Check that runs partition [0, length) with no identical neighbours
 *
 * @throws InvariantViolationError
 */
export function verifyPartition<V extends object>(
  runs: ReadonlyArray<Run<V>>,
  length: number,
  kinds: ReadonlyArray<AttributeKey<V>>,
  equals: KindEquality<V>
): void {
  let expectedStart = 0
  let previous: Run<V> | undefined

  for (const run of runs) {
    if (run.span.start !== expectedStart) {
      throw new InvariantViolationError(
        `Run ${RunUtils.toString(run)} starts at ${run.span.start}, expected ${expectedStart}`
      )
    }
    if (SpanUtils.isEmpty(run.span)) {
      throw new InvariantViolationError(`Run ${RunUtils.toString(run)} is empty`)
    }
    if (previous && RunUtils.sameAttributes(previous.attributes, run.attributes, kinds, equals)) {
      throw new InvariantViolationError(
        `Adjacent runs ${RunUtils.toString(previous)} and ${RunUtils.toString(run)} are identical`
      )
    }
    expectedStart = run.span.end
    previous = run
  }

  if (expectedStart !== length) {
    throw new InvariantViolationError(`Runs cover [0, ${expectedStart}), expected [0, ${length})`)
  }
}

/**
 * Shared builder for callers that do not need debug output
 */
export const runBuilder = new RunBuilder()
