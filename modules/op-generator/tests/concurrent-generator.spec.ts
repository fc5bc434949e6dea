import { Int } from 'misc'

import { ConcurrentGenerator, jitteredBudget, keyGenerator, OpSource, WorkloadParams } from '../src'

function lcg(seed: number): () => number {
  let s = seed
  return () => {
    s = (s * 48271) % 2147483647
    return s / 2147483647
  }
}

function drain<T>(source: OpSource<T>, max: number): T[] {
  const ret: T[] = []
  for (let i = 0; i < max; ++i) {
    const v = source.next()
    if (v === undefined) {
      break
    }
    ret.push(v)
  }
  return ret
}

const params: WorkloadParams = {
  opGenRate: 10,
  opsPerKey: Int(100),
  concurrencyPerKey: Int(5),
  valueRange: Int(10),
  timeUnitMs: 1000,
}

describe('workload', () => {
  test('jitteredBudget() stays within [0.9B, B]', () => {
    expect(jitteredBudget(100, () => 0)).toEqual(90)
    expect(jitteredBudget(100, () => 0.99999)).toEqual(99)
    expect(jitteredBudget(15, () => 0)).toEqual(14)
    expect(jitteredBudget(1, () => 0)).toEqual(1)
    const random = lcg(7)
    for (let i = 0; i < 200; ++i) {
      const b = jitteredBudget(37, random)
      expect(b).toBeGreaterThanOrEqual(0.9 * 37)
      expect(b).toBeLessThanOrEqual(37)
    }
  })
  test('keyGenerator() emits well-formed invocations for its key, paced at the configured rate', () => {
    const g = keyGenerator(3, params, lcg(1))
    const items = drain(g, 1000)
    expect(items.length).toEqual(g.budget)
    for (const { item, delayMs } of items) {
      expect(item.key).toEqual(3)
      expect(delayMs).toBeGreaterThanOrEqual(0)
      expect(delayMs).toBeLessThan(200)
      if (item.f === 'read') {
        expect(item.value).toBeNull()
      } else if (item.f === 'write') {
        expect(item.value).toBeGreaterThanOrEqual(0)
        expect(item.value).toBeLessThan(10)
      } else {
        expect(item.value).toHaveLength(2)
        expect(Math.max(...item.value)).toBeLessThan(10)
        expect(Math.min(...item.value)).toBeGreaterThanOrEqual(0)
      }
    }
    expect(new Set(items.map(at => at.item.f))).toEqual(new Set(['read', 'write', 'cas']))
  })
  test('keyGenerator() honors the op mix', () => {
    const g = keyGenerator(0, params, lcg(2), { read: 0, write: 1, cas: 0 })
    expect(drain(g, 1000).every(at => at.item.f === 'write')).toBe(true)
  })
})

describe('ConcurrentGenerator', () => {
  test('splits the lanes into groups of concurrencyPerKey', () => {
    const gen = new ConcurrentGenerator(params, { concurrency: Int(12), random: lcg(3) })
    expect(gen.lanes.map(l => l.id)).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8, 9])
    expect(gen.lanes.map(l => l.group)).toEqual([0, 0, 0, 0, 0, 1, 1, 1, 1, 1])
  })
  test('uses a single group when concurrency is smaller than concurrencyPerKey', () => {
    const gen = new ConcurrentGenerator(params, { concurrency: Int(2), random: lcg(3) })
    expect(gen.lanes).toHaveLength(5)
  })
  test('the lanes of a group share a key and its budget, then move on to the next key', () => {
    const gen = new ConcurrentGenerator(params, { concurrency: Int(5), random: lcg(4) })
    const seen: number[] = []
    for (let round = 0; round < 60; ++round) {
      for (const lane of gen.lanes) {
        const v = lane.source.next()
        if (v) {
          seen.push(v.item.key)
        }
      }
    }
    expect(seen).toHaveLength(300)
    // keys are handed out in increasing order
    expect([...seen].sort((a, b) => a - b)).toEqual(seen)
    const stats = gen.keyStats()
    const finished = stats.slice(0, -1)
    expect(finished.length).toBeGreaterThanOrEqual(2)
    for (const s of finished) {
      expect(s.emitted).toEqual(s.budget)
      expect(s.budget).toBeGreaterThanOrEqual(90)
      expect(s.budget).toBeLessThanOrEqual(100)
      expect(seen.filter(k => k === s.key)).toHaveLength(s.budget)
    }
  })
  test('different groups work on different keys', () => {
    const gen = new ConcurrentGenerator(params, { concurrency: Int(10), random: lcg(5) })
    const first = gen.lanes.map(l => l.source.next()?.item.key)
    expect(first).toEqual([0, 0, 0, 0, 0, 1, 1, 1, 1, 1])
  })
  test('the deadline ends every lane, even with unfinished budgets', () => {
    let now = 0
    const gen = new ConcurrentGenerator(params, { concurrency: Int(10), random: lcg(6), now: () => now, deadline: 100 })
    expect(gen.lanes.every(l => l.source.next() !== undefined)).toBe(true)
    now = 100
    expect(gen.lanes.every(l => l.source.next() === undefined)).toBe(true)
    expect(gen.keyStats().every(s => s.emitted < s.budget)).toBe(true)
  })
})
