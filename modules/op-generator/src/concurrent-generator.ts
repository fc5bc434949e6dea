import { Invocation, Key } from 'core-types'
import { Int } from 'misc'

import { Limited, OpSource, RandomFn, Staggered, timeLimit } from './op-source'
import { EVEN_MIX, keyGenerator, OpMix, WorkloadParams } from './workload'

export interface GeneratorOptions {
  /**
   * Total number of lanes. Lanes are split into groups of `concurrencyPerKey`; each group works on one key at a time.
   */
  concurrency: Int
  random?: RandomFn
  /**
   * Milliseconds; compared against `deadline`.
   */
  now?: () => number
  /**
   * Once `now()` reaches this value every lane is exhausted, regardless of unfinished per-key budgets.
   */
  deadline?: number
  opMix?: OpMix
}

export interface Lane {
  /**
   * 0-based, unique across the generator. Doubles as the initial process id of the lane's worker.
   */
  id: number
  group: number
  source: OpSource<Staggered<Invocation>>
}

class KeyGroup {
  private current: Limited<Staggered<Invocation>> | undefined

  constructor(private readonly allocate: () => Limited<Staggered<Invocation>>) {}

  next(): Staggered<Invocation> | undefined {
    while (true) {
      if (!this.current) {
        this.current = this.allocate()
      }
      const ret = this.current.next()
      if (ret !== undefined) {
        return ret
      }
      if (this.current.budget === 0) {
        // A zero budget would make us allocate keys forever.
        return undefined
      }
      this.current = undefined
    }
  }
}

/**
 * Produces, for an unbounded sequence of keys (0, 1, 2, ...), independent invocation streams, and exposes them through a
 * fixed set of lanes. Lanes are grouped: the lanes of a group share a key until its budget is spent, at which point the
 * group moves on to the next unallocated key. The whole generator ends at `deadline`.
 *
 * The generator is pure data: nothing is invoked here.
 */
export class ConcurrentGenerator {
  readonly lanes: readonly Lane[]
  private nextKey = 0
  private readonly budgets = new Map<Key, Limited<Staggered<Invocation>>>()

  constructor(private readonly params: WorkloadParams, options: GeneratorOptions) {
    const random = options.random ?? Math.random
    const now = options.now ?? (() => performance.now())
    const deadline = options.deadline ?? Number.POSITIVE_INFINITY
    const opMix = options.opMix ?? EVEN_MIX

    const groupCount = Math.max(1, Math.floor(options.concurrency / params.concurrencyPerKey))
    const lanes: Lane[] = []
    for (let g = 0; g < groupCount; ++g) {
      const group = new KeyGroup(() => {
        const key = this.nextKey++
        const ret = keyGenerator(key, this.params, random, opMix)
        this.budgets.set(key, ret)
        return ret
      })
      const shared: OpSource<Staggered<Invocation>> = { next: () => group.next() }
      for (let l = 0; l < params.concurrencyPerKey; ++l) {
        lanes.push({ id: lanes.length, group: g, source: timeLimit(shared, deadline, now) })
      }
    }
    this.lanes = lanes
  }

  /**
   * The keys that were started so far, with their drawn budgets and the number of invocations handed out for each.
   */
  keyStats(): { key: Key; budget: number; emitted: number }[] {
    return [...this.budgets.entries()].map(([key, l]) => ({ key, budget: l.budget, emitted: l.emitted }))
  }
}
