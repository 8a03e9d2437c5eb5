/**
 * Resolver - map resolved attribute runs to concrete style properties
 *
 * Rules are registered per attribute kind together with a default value.
 * For every run, each registered rule is called with the run's value for its
 * kind, or with the default when the kind is absent there. The property maps
 * are merged in registration order: when two rules produce the same
 * property, the rule registered later wins.
 *
 * Kinds without a rule are ignored, so callers may keep bookkeeping-only
 * kinds in the store.
 *
 * Configuration is sealed on first use. Registering afterwards throws, so
 * the precedence order cannot change between resolution passes.
 */

import { ResolverConfigError } from '../types'
import type { AttributeKey, ResolvedAttributes, StyleProperties, StyleValue } from '../types'
import type { Run } from '../runs/run'
import type { TextSpan } from '../text/span'
import { ownEntry } from '../utils/own'

export type ResolutionRule<T> = (value: T) => StyleProperties

export interface StyledRun {
  readonly span: TextSpan
  readonly properties: StyleProperties
}

interface RegisteredRule<T> {
  readonly rule: ResolutionRule<T>
  readonly defaultValue: T
}

type RuleTable<V extends object> = {
  [K in AttributeKey<V>]?: RegisteredRule<V[K]>
}

/**
 * @example
 * ```typescript
 * interface Attrs { weight: 'bold' | 'normal'; color: string }
 *
 * const resolver = new Resolver<Attrs>()
 *   .registerRule('weight', w => ({ fontWeight: w === 'bold' ? 700 : 400 }), 'normal')
 *   .registerRule('color', c => ({ color: c }), '#000000')
 *
 * resolver.resolve(text.attributeRuns())
 * ```
 */
export class Resolver<V extends object> {
  private readonly rules: RuleTable<V> = {}
  private readonly order: Array<AttributeKey<V>> = []
  private sealed = false

  /**
   * Register the rule for a kind
   *
   * @param kind - Attribute kind the rule handles
   * @param rule - Maps a value of that kind to style properties
   * @param defaultValue - Passed to `rule` where the kind is absent
   * @throws ResolverConfigError if the kind already has a rule or the
   * resolver is sealed
   */
  registerRule<K extends AttributeKey<V>>(kind: K, rule: ResolutionRule<V[K]>, defaultValue: V[K]): this {
    if (this.sealed) {
      throw new ResolverConfigError(`Cannot register a rule for '${kind}': resolver is sealed`)
    }
    if (ownEntry(this.rules, kind)) {
      throw new ResolverConfigError(`A rule for '${kind}' is already registered`)
    }

    this.rules[kind] = { rule, defaultValue }
    this.order.push(kind)
    return this
  }

  /**
   * Freeze the configuration. Called implicitly by the first resolution.
   */
  seal(): this {
    this.sealed = true
    return this
  }

  get isSealed(): boolean {
    return this.sealed
  }

  /**
   * Kinds with a rule, in precedence order (lowest first)
   */
  kinds(): ReadonlyArray<AttributeKey<V>> {
    return this.order
  }

  /**
   * Resolve one attribute set to style properties
   */
  resolveAttributes(attributes: ResolvedAttributes<V>): StyleProperties {
    this.sealed = true
    const properties: Record<string, StyleValue> = {}
    for (const kind of this.order) {
      this.applyRule(kind, attributes, properties)
    }
    return properties
  }

  resolveRun(run: Run<V>): StyledRun {
    return { span: run.span, properties: this.resolveAttributes(run.attributes) }
  }

  /**
   * Resolve a run partition, one styled run per run
   */
  resolve(runs: ReadonlyArray<Run<V>>): StyledRun[] {
    return runs.map(run => this.resolveRun(run))
  }

  private applyRule<K extends AttributeKey<V>>(
    kind: K,
    attributes: ResolvedAttributes<V>,
    into: Record<string, StyleValue>
  ): void {
    const registered = ownEntry(this.rules, kind)
    if (!registered) {
      return
    }
    const value = ownEntry(attributes, kind)
    Object.assign(into, registered.rule(value === undefined ? registered.defaultValue : value))
  }
}
