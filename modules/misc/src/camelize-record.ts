type CamelizeString<T extends PropertyKey, C extends string = ''> = T extends string
  ? string extends T
    ? string
    : T extends `${infer F}-${infer R}`
    ? CamelizeString<Capitalize<R>, `${C}${F}`>
    : `${C}${T}`
  : T

export type CamelizeRecord<T> = { [K in keyof T as CamelizeString<K>]: T[K] }

/**
 * Converts dash-separated keys ("time-limit") into camel-case ones ("timeLimit"). Keys without dashes are kept as-is.
 * When both spellings are present (as yargs produces), the camel-case one wins.
 */
export function camelizeRecord<T extends Record<string, unknown>>(rec: T): CamelizeRecord<T> {
  const ret: Record<string, unknown> = {}

  for (const [k, v] of Object.entries(rec)) {
    const parts = k.split('-')
    const camel = parts.map((p, i) => (i === 0 || p.length === 0 ? p : p[0].toUpperCase() + p.slice(1))).join('')
    if (camel !== k && camel in rec) {
      continue
    }
    ret[camel] = v
  }

  return ret as CamelizeRecord<T> // eslint-disable-line @typescript-eslint/consistent-type-assertions
}
