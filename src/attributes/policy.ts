/**
 * Per-kind attribute policies
 *
 * Each attribute kind decides how overlapping assertions of that kind are
 * resolved, how two resolved values are compared, and what happens to its
 * spans when the text underneath is edited. Kinds without a policy use the
 * defaults: last write wins, `Object.is` equality, keep on edit.
 */

import { SpanEditAction } from '../types'
import type { AttributeKey } from '../types'

/**
 * Attribute merge strategies
 *
 * When several assertions of the same kind cover a byte, the strategy picks
 * the value that applies there.
 */
export enum MergeStrategy {
  /**
   * LAST_WRITE_WINS: highest sequence wins
   * Example: color='red'@1 + color='blue'@2 = color='blue'
   */
  LAST_WRITE_WINS = 'lww',

  /**
   * CUSTOM: kind-specific combinator over every covering value
   * Example: letterSpacing=1@1 + letterSpacing=2@2 = letterSpacing=3
   */
  CUSTOM = 'custom'
}

export type MergePolicy<T> =
  | { readonly strategy: MergeStrategy.LAST_WRITE_WINS }
  | {
      readonly strategy: MergeStrategy.CUSTOM
      /** Receives every covering value, oldest first. Never called with an empty list. */
      combine(values: readonly T[]): T
    }

export interface KindPolicy<T> {
  merge?: MergePolicy<T>
  equals?(a: T, b: T): boolean
  onEdit?: SpanEditAction
}

export type KindPolicies<V extends object> = {
  readonly [K in AttributeKey<V>]?: KindPolicy<V[K]>
}

/**
 * A KindPolicy with every field filled in
 */
export interface ResolvedKindPolicy<T> {
  readonly merge: MergePolicy<T>
  equals(a: T, b: T): boolean
  readonly onEdit: SpanEditAction
}

const LAST_WRITE_WINS = { strategy: MergeStrategy.LAST_WRITE_WINS } as const

export const PolicyUtils = {
  resolve<T>(policy: KindPolicy<T> | undefined): ResolvedKindPolicy<T> {
    const equals = policy?.equals
    return {
      merge: policy?.merge ?? LAST_WRITE_WINS,
      equals: equals ? (a, b) => equals(a, b) : (a, b) => Object.is(a, b),
      onEdit: policy?.onEdit ?? SpanEditAction.Keep
    }
  },

  /**
   * Pick the value that applies where all of `covering` overlap.
   * `covering` must be sorted by ascending sequence and non-empty.
   */
  pick<T>(policy: MergePolicy<T>, covering: readonly T[]): T | undefined {
    if (covering.length === 0) {
      return undefined
    }
    if (policy.strategy === MergeStrategy.CUSTOM) {
      return policy.combine(covering)
    }
    return covering[covering.length - 1]
  }
}

/**
 * Ready-made combinators for {@link MergeStrategy.CUSTOM}
 */
export const MergeStrategies = {
  lastWriteWins<T>(): MergePolicy<T> {
    return LAST_WRITE_WINS
  },

  /** Additive, e.g. for letter spacing or baseline shift */
  sum(): MergePolicy<number> {
    return {
      strategy: MergeStrategy.CUSTOM,
      combine: values => values.reduce((total, value) => total + value, 0)
    }
  },

  /** Union of flags: true if any covering assertion is true */
  any(): MergePolicy<boolean> {
    return {
      strategy: MergeStrategy.CUSTOM,
      combine: values => values.some(Boolean)
    }
  },

  custom<T>(combine: (values: readonly T[]) => T): MergePolicy<T> {
    return { strategy: MergeStrategy.CUSTOM, combine }
  }
}
