/**
 * Preset attribute kinds for common typography
 *
 * Callers are free to define their own attribute maps; these cover the usual
 * rich text needs and double as a reference for how kinds, policies and
 * resolution rules fit together.
 */

import { Resolver } from '../resolver/resolver'
import { SpanEditAction } from '../types'
import type { StyleProperties } from '../types'
import { MergeStrategies } from './policy'
import type { KindPolicies } from './policy'

export type FontWeight = 'thin' | 'light' | 'normal' | 'medium' | 'bold' | 'black'

export interface Color {
  readonly r: number
  readonly g: number
  readonly b: number
  readonly a?: number
}

export interface TypographyAttributes {
  weight: FontWeight
  italic: boolean
  underline: boolean
  color: Color
  /** BCP 47 tag */
  language: string
  /** Extra spacing in px; overlapping assertions add up */
  letterSpacing: number
  /** Link target */
  href: string
  /** Spell-check marker, dropped when the marked text is edited */
  misspelled: boolean
}

const FONT_WEIGHTS: Record<FontWeight, number> = {
  thin: 100,
  light: 300,
  normal: 400,
  medium: 500,
  bold: 700,
  black: 900
}

export const BLACK: Color = { r: 0, g: 0, b: 0 }

export const ColorUtils = {
  equals(a: Color, b: Color): boolean {
    return a.r === b.r && a.g === b.g && a.b === b.b && (a.a ?? 1) === (b.a ?? 1)
  },

  /**
   * CSS color string: `#rrggbb`, or `rgba(...)` when not opaque
   */
  toCss(color: Color): string {
    const alpha = color.a ?? 1
    if (alpha < 1) {
      return `rgba(${color.r}, ${color.g}, ${color.b}, ${alpha})`
    }
    return '#' + [color.r, color.g, color.b].map(c => c.toString(16).padStart(2, '0')).join('')
  }
}

export const typographyPolicies: KindPolicies<TypographyAttributes> = {
  color: { equals: ColorUtils.equals },
  letterSpacing: { merge: MergeStrategies.sum() },
  misspelled: { onEdit: SpanEditAction.Remove }
}

/**
 * Resolver mapping {@link TypographyAttributes} to CSS-like properties
 *
 * Registration order: weight, italic, underline, color, language,
 * letterSpacing, href. `href` is registered last so links override the
 * color and decoration of the text they cover. `misspelled` has no rule.
 */
export function createTypographyResolver(): Resolver<TypographyAttributes> {
  return new Resolver<TypographyAttributes>()
    .registerRule('weight', weight => ({ fontWeight: FONT_WEIGHTS[weight] }), 'normal')
    .registerRule('italic', italic => ({ fontStyle: italic ? 'italic' : 'normal' }), false)
    .registerRule('underline', underline => ({ textDecoration: underline ? 'underline' : 'none' }), false)
    .registerRule('color', color => ({ color: ColorUtils.toCss(color) }), BLACK)
    .registerRule('language', language => ({ lang: language }), 'und')
    .registerRule('letterSpacing', spacing => ({ letterSpacing: spacing }), 0)
    .registerRule(
      'href',
      (href): StyleProperties => (href === '' ? {} : { color: '#0000ee', textDecoration: 'underline', href }),
      ''
    )
}
