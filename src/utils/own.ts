/**
 * Read an own property of a kind-keyed table
 *
 * Kind names are chosen by callers, so a kind may be called `constructor` or
 * `toString`. Inherited members of `Object.prototype` never count as entries.
 */
export function ownEntry<T extends object, K extends keyof T>(table: T, key: K): T[K] | undefined {
  return Object.hasOwn(table, key) ? table[key] : undefined
}
