/**
 * A stateful, pull-based stream of items. Once `next()` has returned `undefined` the source is exhausted and keeps
 * returning `undefined`. Sources are not restartable: a fresh one must be built for every run.
 */
export interface OpSource<T> {
  next(): T | undefined
}

/**
 * A source of uniformly distributed numbers in [0, 1).
 */
export type RandomFn = () => number

export function randomInt(bound: number, random: RandomFn): number {
  return Math.min(bound - 1, Math.floor(random() * bound))
}

/**
 * An infinite source that calls `f` for every item.
 */
export function repeatedly<T>(f: () => T): OpSource<T> {
  return { next: () => f() }
}

export interface Weighted<T> {
  weight: number
  source: OpSource<T>
}

/**
 * Draws each item from one of `entries`, picked at random in proportion to its weight. An entry whose source is
 * exhausted is dropped; the mix is exhausted when all of them are.
 */
export function mix<T>(entries: readonly Weighted<T>[], random: RandomFn): OpSource<T> {
  const live = entries.filter(e => e.weight > 0)
  return {
    next() {
      while (live.length > 0) {
        const total = live.reduce((acc, e) => acc + e.weight, 0)
        let r = random() * total
        let i = 0
        while (i < live.length - 1 && r >= live[i].weight) {
          r -= live[i].weight
          ++i
        }
        const ret = live[i].source.next()
        if (ret !== undefined) {
          return ret
        }
        live.splice(i, 1)
      }
      return undefined
    },
  }
}

export interface Staggered<T> {
  item: T
  /**
   * How long to wait before acting on `item`.
   */
  delayMs: number
}

/**
 * Attaches a random delay, uniform in [0, 2 * meanDelayMs), to every item, so that items are emitted at an average
 * rate of one per `meanDelayMs`.
 */
export function stagger<T>(source: OpSource<T>, meanDelayMs: number, random: RandomFn): OpSource<Staggered<T>> {
  return {
    next() {
      const item = source.next()
      if (item === undefined) {
        return undefined
      }
      return { item, delayMs: random() * 2 * meanDelayMs }
    },
  }
}

export interface Limited<T> extends OpSource<T> {
  /**
   * The number of items handed out so far.
   */
  readonly emitted: number
  readonly budget: number
}

/**
 * Passes through at most `budget` items of `source`.
 */
export function limit<T>(source: OpSource<T>, budget: number): Limited<T> {
  let emitted = 0
  return {
    next() {
      if (emitted >= budget) {
        return undefined
      }
      const ret = source.next()
      if (ret !== undefined) {
        ++emitted
      }
      return ret
    },
    get emitted() {
      return emitted
    },
    budget,
  }
}

/**
 * Passes through items of `source` until `now()` reaches `deadline`. After that the source is exhausted for good, even
 * if the clock were to go back.
 */
export function timeLimit<T>(source: OpSource<T>, deadline: number, now: () => number): OpSource<T> {
  let expired = false
  return {
    next() {
      if (expired || now() >= deadline) {
        expired = true
        return undefined
      }
      return source.next()
    },
  }
}
