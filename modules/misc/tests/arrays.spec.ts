import { groupBy, quantile, sortBy } from '../src'

describe('arrays', () => {
  describe('sortBy', () => {
    test('sorts by a numeric key', () => {
      expect(sortBy([{ n: 3 }, { n: 1 }, { n: 2 }], at => at.n)).toEqual([{ n: 1 }, { n: 2 }, { n: 3 }])
    })
    test('sorts by a string key', () => {
      expect(sortBy(['b10', 'a', 'b2'], at => at)).toEqual(['a', 'b10', 'b2'])
    })
    test('does not mutate its input', () => {
      const input = [2, 1]
      sortBy(input, at => at)
      expect(input).toEqual([2, 1])
    })
  })
  describe('groupBy', () => {
    test('keeps the order of items within a group and the order of first appearance across groups', () => {
      const g = groupBy(['b1', 'a1', 'b2', 'c1', 'a2'], s => s[0])
      expect([...g.keys()]).toEqual(['b', 'a', 'c'])
      expect(g.get('a')).toEqual(['a1', 'a2'])
      expect(g.get('b')).toEqual(['b1', 'b2'])
      expect(g.get('c')).toEqual(['c1'])
    })
    test('works with non-string keys', () => {
      const g = groupBy([1, 2, 3, 4, 5], n => n % 2 === 0)
      expect(g.get(true)).toEqual([2, 4])
      expect(g.get(false)).toEqual([1, 3, 5])
    })
  })
  describe('quantile', () => {
    test('returns undefined for an empty array', () => {
      expect(quantile([], 0.5)).toBeUndefined()
    })
    test('picks the nearest-rank value', () => {
      const sorted = [10, 20, 30, 40]
      expect(quantile(sorted, 0)).toEqual(10)
      expect(quantile(sorted, 0.5)).toEqual(20)
      expect(quantile(sorted, 0.75)).toEqual(30)
      expect(quantile(sorted, 1)).toEqual(40)
    })
  })
})
