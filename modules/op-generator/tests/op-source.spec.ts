import { limit, mix, OpSource, randomInt, repeatedly, stagger, timeLimit } from '../src'

function fromArray<T>(arr: T[]): OpSource<T> {
  let i = 0
  return { next: () => arr[i++] }
}

function drain<T>(source: OpSource<T>, max = 1000): T[] {
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

function cycle(values: number[]): () => number {
  let i = 0
  return () => values[i++ % values.length]
}

describe('op-source', () => {
  test('randomInt() maps [0, 1) onto [0, bound)', () => {
    expect(randomInt(10, () => 0)).toEqual(0)
    expect(randomInt(10, () => 0.55)).toEqual(5)
    expect(randomInt(10, () => 0.9999)).toEqual(9)
  })
  describe('mix', () => {
    test('picks sources in proportion to their weights', () => {
      const m = mix(
        [
          { weight: 1, source: repeatedly(() => 'a') },
          { weight: 3, source: repeatedly(() => 'b') },
        ],
        cycle([0.1, 0.3, 0.9]),
      )
      // total weight is 4: r=0.4 picks 'a' (< 1), r=1.2 and r=3.6 pick 'b'
      expect(drain(m, 3)).toEqual(['a', 'b', 'b'])
    })
    test('drops exhausted sources and ends when all are exhausted', () => {
      const m = mix(
        [
          { weight: 1, source: fromArray(['a1', 'a2']) },
          { weight: 1, source: fromArray(['b1']) },
        ],
        () => 0.7,
      )
      expect(drain(m)).toEqual(['b1', 'a1', 'a2'])
      expect(m.next()).toBeUndefined()
    })
    test('ignores zero-weight sources', () => {
      const m = mix(
        [
          { weight: 0, source: repeatedly(() => 'never') },
          { weight: 2, source: fromArray(['x']) },
        ],
        () => 0,
      )
      expect(drain(m)).toEqual(['x'])
    })
  })
  test('stagger() attaches delays uniform in [0, 2 * mean)', () => {
    const s = stagger(fromArray(['a', 'b', 'c']), 100, cycle([0, 0.5, 0.75]))
    expect(drain(s)).toEqual([
      { item: 'a', delayMs: 0 },
      { item: 'b', delayMs: 100 },
      { item: 'c', delayMs: 150 },
    ])
  })
  test('limit() caps the number of items and counts them', () => {
    const l = limit(repeatedly(() => 1), 4)
    expect(drain(l)).toEqual([1, 1, 1, 1])
    expect(l.emitted).toEqual(4)
    expect(l.budget).toEqual(4)
  })
  test('timeLimit() stops at the deadline and stays stopped', () => {
    let now = 0
    const t = timeLimit(repeatedly(() => 'x'), 10, () => now)
    expect(t.next()).toEqual('x')
    now = 10
    expect(t.next()).toBeUndefined()
    now = 5
    expect(t.next()).toBeUndefined()
  })
})
