/**
 * spanstyle - ranged text attributes resolved into styled runs
 *
 * Architecture:
 * - TextBuffer: immutable UTF-8 text with character boundary checks
 * - AttributeStore: ranged, possibly overlapping attribute assertions
 * - RunBuilder: partitions the text into maximal runs with one resolved
 *   value per kind
 * - Resolver: maps each run's attributes to style properties
 * - AttributedText: ties the above together with a run cache
 *
 * @packageDocumentation
 */

// Facade
export { AttributedText } from './attributed-text'
export type { AttributedTextOptions } from './attributed-text'

// Text
export { TextBuffer } from './text/buffer'
export type { TextStorage } from './text/buffer'
export { SpanUtils, validateSpan, validateRange } from './text/span'
export type { TextSpan } from './text/span'

// Attributes
export { AttributeStore } from './attributes/store'
export type { AttributeAssertion, AttributeStoreOptions } from './attributes/store'
export { MergeStrategy, MergeStrategies, PolicyUtils } from './attributes/policy'
export type { MergePolicy, KindPolicy, KindPolicies, ResolvedKindPolicy } from './attributes/policy'
export {
  BLACK,
  ColorUtils,
  typographyPolicies,
  createTypographyResolver
} from './attributes/presets'
export type { Color, FontWeight, TypographyAttributes } from './attributes/presets'

// Runs
export { RunBuilder, runBuilder, verifyPartition } from './runs/builder'
export type { RunBuilderOptions } from './runs/builder'
export { RunUtils } from './runs/run'
export type { Run, KindEquality } from './runs/run'

// Resolution
export { Resolver } from './resolver/resolver'
export type { ResolutionRule, StyledRun } from './resolver/resolver'

// Configuration
export { loadConfig } from './config'
export type { Config, ConfigOptions } from './config'

// Types and errors
export {
  SpanEditAction,
  SpanStyleError,
  InvalidSpanError,
  NotFoundError,
  InvalidTextError,
  TextMismatchError,
  ResolverConfigError,
  InvariantViolationError
} from './types'
export type {
  AttributeKey,
  AttributeRecord,
  ResolvedAttributes,
  InvalidSpanReason,
  StyleProperties,
  StyleValue
} from './types'
