/**
 * Seeded PRNG (mulberry32) so randomized tests replay the same edits
 */
export function createRandom(seed: number): Random {
  let state = seed >>> 0
  const next = (): number => {
    state = (state + 0x6d2b79f5) >>> 0
    let t = state
    t = Math.imul(t ^ (t >>> 15), t | 1)
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61)
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296
  }

  return {
    next,
    int(max) {
      return Math.floor(next() * max)
    },
    pick(items) {
      const item = items[Math.floor(next() * items.length)]
      if (item === undefined) {
        throw new RangeError('pick() from an empty list')
      }
      return item
    },
    chance(probability) {
      return next() < probability
    }
  }
}

export interface Random {
  /** Uniform in [0, 1) */
  next(): number
  /** Uniform integer in [0, max) */
  int(max: number): number
  pick<T>(items: readonly T[]): T
  chance(probability: number): boolean
}
