import { ClientOperation, Key, keyPartitions, mergeValidity, Validity } from 'core-types'

import { Checker } from './checker'
import { checkLinearizable, DEFAULT_MAX_STEPS } from './linearizability'

export interface KeyVerdict {
  valid: Validity
  message?: string
  witness?: unknown
}

/**
 * Lifts a single-key check to a whole history: every key is checked on its own, and the history is valid iff every key
 * is. Keys that are not valid keep their verdicts (with witnesses) in the result's details.
 */
export function independent(checkKey: (ops: ClientOperation[]) => KeyVerdict): Checker {
  return {
    async check({ history, logger }) {
      const verdicts = new Map<Key, KeyVerdict>()
      for (const [key, ops] of keyPartitions(history)) {
        const v = checkKey(ops)
        verdicts.set(key, v)
        if (v.valid !== true) {
          logger.info(`key ${key} (${ops.length} operations): ${v.valid}`, { message: v.message })
        }
      }

      const keysWith = (valid: Validity) => [...verdicts].filter(([_, v]) => v.valid === valid).map(([k]) => k)
      const invalidKeys = keysWith(false)
      const unknownKeys = keysWith('unknown')
      const valid = mergeValidity([...verdicts.values()].map(v => v.valid))
      const failures: Record<string, KeyVerdict> = {}
      for (const k of [...invalidKeys, ...unknownKeys]) {
        const v = verdicts.get(k)
        if (v) {
          failures[String(k)] = v
        }
      }

      const message =
        valid === true
          ? `${verdicts.size} keys checked, all linearizable`
          : valid === false
          ? `keys that are not linearizable: ${invalidKeys.join(', ')}`
          : `keys that could not be decided: ${unknownKeys.join(', ')}`
      return { valid, message, details: { keyCount: verdicts.size, invalidKeys, unknownKeys, failures } }
    },
  }
}

export interface LinearizableOptions {
  /**
   * Per-key bound on the number of search states.
   */
  maxSteps?: number
}

/**
 * The built-in correctness checker: per-key linearizability against a CAS register.
 */
export function linearizable(options: LinearizableOptions = {}): Checker {
  return independent(ops => {
    const r = checkLinearizable(ops, options.maxSteps ?? DEFAULT_MAX_STEPS)
    return { valid: r.valid, message: r.message, witness: r.witness }
  })
}
