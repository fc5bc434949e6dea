/**
 * Looks up `key`. A missing key is a programming error here, so it throws, naming the key (and, if given, what kind of
 * thing the map holds).
 */
export function mustGet<K, V>(map: ReadonlyMap<K, V>, key: K, what = 'entry'): V {
  if (!map.has(key)) {
    throw new Error(`no ${what} named <${String(key)}>`)
  }
  const ret = map.get(key)
  if (ret === undefined) {
    throw new Error(`${what} <${String(key)}> is undefined`)
  }
  return ret
}

export function getOrCreate<K, V>(map: Map<K, V>, key: K, create: (key: K) => V): V {
  const existing = map.get(key)
  if (existing !== undefined) {
    return existing
  }
  const created = create(key)
  map.set(key, created)
  return created
}

/**
 * Counting: a missing key starts at zero. Returns the updated count.
 */
export function bump<K>(counts: Map<K, number>, key: K, by = 1): number {
  const next = (counts.get(key) ?? 0) + by
  counts.set(key, next)
  return next
}
