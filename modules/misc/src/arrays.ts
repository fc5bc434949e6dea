import { getOrCreate } from './maps'

export function sortBy<T>(input: Iterable<T>, key: (item: T) => number): T[]
export function sortBy<T>(input: Iterable<T>, key: (item: T) => string): T[]
export function sortBy<T>(input: Iterable<T>, key: (item: T) => string | number): T[] {
  return [...input].sort((a, b) => comp(a, b, key))
}

function comp<T>(a: T, b: T, key: (item: T) => string | number): number {
  const ak = key(a)
  const bk = key(b)

  if (typeof ak === 'string' && typeof bk === 'string') {
    return ak < bk ? -1 : ak > bk ? 1 : 0
  }

  if (typeof ak === 'number' && typeof bk === 'number') {
    return ak - bk
  }

  throw new Error(`Cannot compare ${ak} and ${bk}`)
}

/**
 * Splits `input` into buckets by `key`. Buckets keep the relative order of their items, and the returned map iterates
 * its keys in order of first appearance.
 */
export function groupBy<T, K>(input: Iterable<T>, key: (item: T) => K): Map<K, T[]> {
  const ret = new Map<K, T[]>()
  for (const item of input) {
    getOrCreate(ret, key(item), () => []).push(item)
  }
  return ret
}

/**
 * Returns the value at the given quantile (0..1) of an ascending-sorted array, or undefined if it is empty.
 */
export function quantile(sorted: readonly number[], q: number): number | undefined {
  if (sorted.length === 0) {
    return undefined
  }
  const i = Math.min(sorted.length - 1, Math.max(0, Math.ceil(q * sorted.length) - 1))
  return sorted[i]
}
