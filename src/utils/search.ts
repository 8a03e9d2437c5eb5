/**
 * Index of the first element for which `isAfter` returns true, or
 * `items.length` if there is none. `items` must be partitioned so that every
 * element for which `isAfter` is false comes first.
 */
export function partitionPoint<T>(items: readonly T[], isAfter: (item: T) => boolean): number {
  let low = 0
  let high = items.length
  while (low < high) {
    const mid = (low + high) >>> 1
    const item = items[mid]
    if (item !== undefined && isAfter(item)) {
      high = mid
    } else {
      low = mid + 1
    }
  }
  return low
}

/**
 * Sorted, de-duplicated copy of a list of offsets
 */
export function sortedUnique(values: Iterable<number>): number[] {
  return Array.from(new Set(values)).sort((a, b) => a - b)
}
