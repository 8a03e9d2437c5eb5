/**
 * Run - a maximal span with a constant resolved attribute set
 */

import type { AttributeKey, ResolvedAttributes } from '../types'
import { SpanUtils } from '../text/span'
import type { TextSpan } from '../text/span'
import { ownEntry } from '../utils/own'

export interface Run<V extends object> {
  readonly span: TextSpan
  /** Resolved value per kind; absent kinds have no entry */
  readonly attributes: ResolvedAttributes<V>
}

/**
 * Compares resolved values of one kind
 */
export type KindEquality<V extends object> = <K extends AttributeKey<V>>(
  kind: K,
  a: V[K],
  b: V[K]
) => boolean

/**
 * Utilities for working with Runs
 */
export const RunUtils = {
  /**
   * Check whether two attribute sets are equal over `kinds`
   */
  sameAttributes<V extends object>(
    a: ResolvedAttributes<V>,
    b: ResolvedAttributes<V>,
    kinds: ReadonlyArray<AttributeKey<V>>,
    equals: KindEquality<V>
  ): boolean {
    return kinds.every(kind => valuesEqual(kind, ownEntry(a, kind), ownEntry(b, kind), equals))
  },

  /**
   * Find the run covering a byte offset (binary search)
   */
  findAt<R extends { readonly span: TextSpan }>(runs: readonly R[], offset: number): R | undefined {
    let low = 0
    let high = runs.length - 1
    while (low <= high) {
      const mid = (low + high) >>> 1
      const run = runs[mid]
      if (!run) {
        return undefined
      }
      if (offset < run.span.start) {
        high = mid - 1
      } else if (offset >= run.span.end) {
        low = mid + 1
      } else {
        return run
      }
    }
    return undefined
  },

  toString<V extends object>(run: Run<V>): string {
    const parts = Object.entries(run.attributes).map(([kind, value]) => `${kind}:${String(value)}`)
    return `Run(${SpanUtils.toString(run.span)}, ${parts.length > 0 ? `[${parts.join(', ')}]` : '[none]'})`
  }
}

function valuesEqual<V extends object, K extends AttributeKey<V>>(
  kind: K,
  a: V[K] | undefined,
  b: V[K] | undefined,
  equals: KindEquality<V>
): boolean {
  if (a === undefined || b === undefined) {
    return a === b
  }
  return equals(kind, a, b)
}
