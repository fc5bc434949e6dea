import { Invocation, Key } from 'core-types'
import { Int } from 'misc'

import { Limited, limit, mix, OpSource, randomInt, RandomFn, repeatedly, stagger, Staggered } from './op-source'

export interface WorkloadParams {
  /**
   * Target rate of invocations per lane, per time unit.
   */
  opGenRate: number
  /**
   * Nominal number of invocations per key (before jitter).
   */
  opsPerKey: Int
  /**
   * Number of lanes that work on a key at the same time.
   */
  concurrencyPerKey: Int
  /**
   * Values written (and CAS-ed) are drawn from [0, valueRange).
   */
  valueRange: Int
  timeUnitMs: number
}

export interface OpMix {
  read: number
  write: number
  cas: number
}

export const EVEN_MIX: OpMix = { read: 1, write: 1, cas: 1 }

export const JITTER_MIN = 0.9
export const JITTER_MAX = 1.0

export function reads(key: Key): OpSource<Invocation> {
  return repeatedly(() => ({ f: 'read', key, value: null }))
}

export function writes(key: Key, valueRange: number, random: RandomFn): OpSource<Invocation> {
  return repeatedly(() => ({ f: 'write', key, value: randomInt(valueRange, random) }))
}

export function compareAndSets(key: Key, valueRange: number, random: RandomFn): OpSource<Invocation> {
  return repeatedly(() => ({
    f: 'cas',
    key,
    value: [randomInt(valueRange, random), randomInt(valueRange, random)],
  }))
}

/**
 * Draws the per-key budget: `opsPerKey` scaled by a factor picked uniformly in [0.9, 1.0], so that keys do not all run
 * dry at the same moment.
 */
export function jitteredBudget(opsPerKey: number, random: RandomFn): number {
  const jitter = JITTER_MIN + random() * (JITTER_MAX - JITTER_MIN)
  return Math.max(Math.ceil(JITTER_MIN * opsPerKey), Math.min(opsPerKey, Math.floor(opsPerKey * jitter)))
}

/**
 * Builds the (finite) invocation stream of a single key: a weighted mix of read/write/cas, paced by a stagger, capped
 * by a jittered budget. All lanes working on the key pull from the same stream and therefore share the budget.
 */
export function keyGenerator(
  key: Key,
  params: WorkloadParams,
  random: RandomFn,
  opMix: OpMix = EVEN_MIX,
): Limited<Staggered<Invocation>> {
  const budget = jitteredBudget(params.opsPerKey, random)
  const mixed = mix(
    [
      { weight: opMix.read, source: reads(key) },
      { weight: opMix.write, source: writes(key, params.valueRange, random) },
      { weight: opMix.cas, source: compareAndSets(key, params.valueRange, random) },
    ],
    random,
  )
  return limit(stagger(mixed, params.timeUnitMs / params.opGenRate, random), budget)
}
