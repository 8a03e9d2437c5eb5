import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { AttributedText } from './attributed-text'
import { createTypographyResolver, typographyPolicies } from './attributes/presets'
import { Resolver } from './resolver/resolver'
import type { TypographyAttributes } from './attributes/presets'
import { InvalidSpanError, NotFoundError, SpanStyleError } from './types'

const DEFAULTS = {
  fontWeight: 400,
  fontStyle: 'normal',
  textDecoration: 'none',
  color: '#000000',
  lang: 'und',
  letterSpacing: 0
}

function typography(text: string, config = {}): AttributedText<TypographyAttributes> {
  return new AttributedText<TypographyAttributes>(text, {
    policies: typographyPolicies,
    resolver: createTypographyResolver(),
    config
  })
}

describe('AttributedText - resolution', () => {
  let text: AttributedText<TypographyAttributes>

  beforeEach(() => {
    text = typography('abcdefghij')
  })

  it('should resolve overlapping weights to two styled runs', () => {
    text.insert('weight', { start: 0, end: 6 }, 'bold')
    text.insert('weight', { start: 3, end: 10 }, 'normal')

    expect(text.runs()).toEqual([
      { span: { start: 0, end: 3 }, properties: { ...DEFAULTS, fontWeight: 700 } },
      { span: { start: 3, end: 10 }, properties: DEFAULTS }
    ])
  })

  it('should resolve an unattributed text to one run of defaults', () => {
    expect(text.runs()).toEqual([{ span: { start: 0, end: 10 }, properties: DEFAULTS }])
  })

  it('should produce no runs for an empty text', () => {
    expect(typography('').runs()).toEqual([])
  })

  it('should let links override color and decoration', () => {
    text.insert('color', { start: 0, end: 10 }, { r: 255, g: 0, b: 0 })
    text.insert('href', { start: 2, end: 4 }, 'https://example.com')

    const runs = text.runs()
    expect(runs).toHaveLength(3)
    expect(runs[0]?.properties).toEqual({ ...DEFAULTS, color: '#ff0000' })
    expect(runs[1]?.properties).toEqual({
      ...DEFAULTS,
      color: '#0000ee',
      textDecoration: 'underline',
      href: 'https://example.com'
    })
    expect(runs[2]?.span).toEqual({ start: 4, end: 10 })
  })

  it('should add up overlapping letter spacing', () => {
    text.insert('letterSpacing', { start: 0, end: 6 }, 1)
    text.insert('letterSpacing', { start: 3, end: 10 }, 2)

    expect(text.runs().map(run => run.properties.letterSpacing)).toEqual([1, 3, 2])
  })

  it('should find the styled run covering a byte', () => {
    text.insert('weight', { start: 0, end: 3 }, 'bold')

    expect(text.styleAt(2)?.properties.fontWeight).toBe(700)
    expect(text.styleAt(3)?.span).toEqual({ start: 3, end: 10 })
    expect(text.styleAt(10)).toBeUndefined()
  })

  it('should describe its attribute runs', () => {
    text.insert('weight', { start: 0, end: 6 }, 'bold')
    text.insert('weight', { start: 3, end: 10 }, 'normal')

    expect(text.toString()).toBe('Run([0, 3), [weight:bold]) Run([3, 10), [weight:normal])')
  })

  it('should resolve kinds named like Object.prototype members', () => {
    interface Inherited {
      constructor: string
      toString: string
    }
    const resolver = new Resolver<Inherited>()
      .registerRule('constructor', role => ({ role }), 'none')
      .registerRule('toString', label => ({ label }), 'none')
    const inherited = new AttributedText<Inherited>('abcdef', { resolver })
    inherited.insert('constructor', { start: 0, end: 3 }, 'x')
    inherited.insert('toString', { start: 2, end: 6 }, 'y')

    const runs = inherited.runs()
    expect(runs.map(run => [run.span.start, run.span.end])).toEqual([
      [0, 2],
      [2, 3],
      [3, 6]
    ])
    expect(runs.map(run => [run.properties.role, run.properties.label])).toEqual([
      ['x', 'none'],
      ['x', 'y'],
      ['none', 'y']
    ])
  })

  it('should require a resolver for styled runs', () => {
    const bare = new AttributedText<TypographyAttributes>('abc')
    bare.insert('weight', { start: 0, end: 1 }, 'bold')

    expect(bare.attributeRuns()).toHaveLength(2)
    expect(() => bare.runs()).toThrow(SpanStyleError)
    try {
      bare.runs()
    } catch (error) {
      expect(error instanceof SpanStyleError && error.code).toBe('NO_RESOLVER')
    }
  })
})

describe('AttributedText - snapshots', () => {
  it('should return the same snapshot until the next mutation', () => {
    const text = typography('abcdefghij')
    text.insert('weight', { start: 0, end: 6 }, 'bold')

    const first = text.runs()
    expect(text.runs()).toBe(first)
    expect(text.attributeRuns()).toBe(text.attributeRuns())
  })

  it('should hand out a new snapshot after a mutation and leave the old one intact', () => {
    const text = typography('abcdefghij')
    text.insert('weight', { start: 0, end: 6 }, 'bold')
    const before = text.runs()

    text.insert('italic', { start: 0, end: 2 }, true)
    const after = text.runs()

    expect(after).not.toBe(before)
    expect(before).toHaveLength(2)
    expect(after).toHaveLength(3)
    expect(after[0]?.properties.fontStyle).toBe('italic')
  })

  it('should freeze snapshots by default', () => {
    const text = typography('abc')
    text.insert('weight', { start: 0, end: 1 }, 'bold')
    const runs = text.runs()

    expect(Object.isFrozen(runs)).toBe(true)
    expect(Object.isFrozen(runs[0])).toBe(true)
    expect(Object.isFrozen(runs[0]?.properties)).toBe(true)
    expect(Object.isFrozen(runs[0]?.span)).toBe(true)
    expect(Object.isFrozen(text.attributeRuns()[0]?.attributes)).toBe(true)
  })

  it('should leave snapshots unfrozen when configured', () => {
    const text = typography('abc', { freezeSnapshots: false })
    const runs = text.runs()

    expect(Object.isFrozen(runs)).toBe(false)
    expect(Object.isFrozen(runs[0]?.properties)).toBe(false)
  })

  it('should invalidate snapshots on remove and clear', () => {
    const text = typography('abcdefghij')
    const id = text.insert('weight', { start: 0, end: 6 }, 'bold')
    text.insert('italic', { start: 0, end: 2 }, true)
    expect(text.runs()).toHaveLength(3)

    text.remove(id)
    expect(text.runs()).toHaveLength(2)

    text.clear('italic')
    expect(text.runs()).toEqual([{ span: { start: 0, end: 10 }, properties: DEFAULTS }])
  })
})

describe('AttributedText - validation', () => {
  it('should reject spans that split a character', () => {
    const text = typography('naïve')
    expect(text.length).toBe(6)

    expect(() => text.insert('weight', { start: 0, end: 3 }, 'bold')).toThrow(InvalidSpanError)
    expect(text.size).toBe(0)
    expect(text.revision).toBe(0)
  })

  it('should reject spans past the end', () => {
    const text = typography('abc')
    expect(() => text.insert('weight', { start: 1, end: 4 }, 'bold')).toThrow(InvalidSpanError)
  })

  it('should follow the configured removal policy', () => {
    expect(() => typography('abc').remove(99)).toThrow(NotFoundError)
    expect(typography('abc', { missingRemoval: 'ignore' }).remove(99)).toBe(false)
  })
})

describe('AttributedText - editing', () => {
  it('should rebase attributes when text is deleted', () => {
    const text = typography('Hello World')
    text.insert('weight', { start: 6, end: 11 }, 'bold')
    const typo = text.insert('misspelled', { start: 0, end: 5 }, true)

    expect(text.delete({ start: 0, end: 6 })).toEqual([typo])
    expect(text.text.toString()).toBe('World')
    expect(text.attributeRuns()).toEqual([{ span: { start: 0, end: 5 }, attributes: { weight: 'bold' } }])
  })

  it('should keep attributes that straddle the deletion', () => {
    const text = typography('Hello World')
    text.insert('weight', { start: 0, end: 11 }, 'bold')

    text.delete({ start: 5, end: 11 })
    expect(text.slice({ start: 0, end: 5 })).toBe('Hello')
    expect(text.runs()).toEqual([{ span: { start: 0, end: 5 }, properties: { ...DEFAULTS, fontWeight: 700 } }])
  })

  it('should treat an empty deletion as a no-op', () => {
    const text = typography('abc')
    const before = text.runs()

    expect(text.delete({ start: 1, end: 1 })).toEqual([])
    expect(text.runs()).toBe(before)
  })

  it('should keep its queries in step with the text after a deletion', () => {
    const text = typography('Hello World')
    const id = text.insert('weight', { start: 6, end: 11 }, 'bold')

    text.delete({ start: 0, end: 6 })
    expect(text.length).toBe(5)
    expect(text.get(id)?.span).toEqual({ start: 0, end: 5 })
    expect(text.assertions('weight').map(a => text.slice(a.span))).toEqual(['World'])
    expect(text.kinds()).toEqual(['weight'])
    expect(text.policy('misspelled').onEdit).toBe('remove')
    expect(text.styleAt(4)?.properties.fontWeight).toBe(700)
  })

  it('should reject reversed deletion ranges', () => {
    const text = typography('abc')
    expect(() => text.delete({ start: 2, end: 1 })).toThrow(InvalidSpanError)
  })

  it('should report unresolved assertions at an offset', () => {
    const text = typography('abcdefghij')
    text.insert('weight', { start: 0, end: 6 }, 'bold')
    text.insert('weight', { start: 3, end: 10 }, 'normal')

    expect(text.attributesAt(4).map(a => a.value)).toEqual(['bold', 'normal'])
    expect(text.attributesForRange({ start: 7, end: 9 }).map(a => a.sequence)).toEqual([2])
  })
})

describe('AttributedText - logging', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('should log mutations when debug is enabled', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {})
    const text = typography('abc', { debug: true })
    text.insert('weight', { start: 0, end: 2 }, 'bold')

    expect(debug).toHaveBeenCalledWith('[AttributeStore]', 'insert', 'weight', '[0, 2)', '#1')
  })

  it('should stay quiet by default', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {})
    const text = typography('abc', { debug: false })
    text.insert('weight', { start: 0, end: 2 }, 'bold')
    text.runs()

    expect(debug).not.toHaveBeenCalled()
  })
})
