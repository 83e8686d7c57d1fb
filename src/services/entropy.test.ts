import { describe, it, expect } from 'vitest'
import {
  shannonEntropy,
  markovEntropy,
  maxEntropy,
  redundancy,
  predictabilityIndex,
  slidingWindowEntropies,
} from './entropy'
import { InvalidArgumentError } from '../domain/errors'
import type { SequenceSymbol } from '../domain/types'

function repeat<T>(pattern: T[], times: number): T[] {
  const out: T[] = []
  for (let i = 0; i < times; i++) out.push(...pattern)
  return out
}

describe('entropy', () => {
  describe('shannonEntropy', () => {
    it('returns 0 for an empty sequence', () => {
      expect(shannonEntropy([])).toBe(0)
    })

    it('returns 0 for a constant sequence', () => {
      expect(shannonEntropy(repeat([1], 20))).toBe(0)
      expect(shannonEntropy(['C4', 'C4', 'C4'])).toBe(0)
    })

    it('returns log2(m) for m equiprobable symbols', () => {
      expect(shannonEntropy(repeat([0, 1, 2, 3], 5))).toBeCloseTo(2.0, 10)
      expect(shannonEntropy(repeat([60, 62, 64, 65, 67, 69, 71, 72], 3))).toBeCloseTo(3.0, 10)
    })

    it('computes a skewed distribution', () => {
      // p = [0.5, 0.25, 0.25] -> 0.5 + 0.5 + 0.5
      expect(shannonEntropy([0, 0, 1, 2])).toBeCloseTo(1.5, 10)
    })

    it('treats an integer and its numeric string as different symbols', () => {
      const mixed: SequenceSymbol[] = [60, '60']
      expect(shannonEntropy(mixed)).toBe(1)
    })

    it('does not depend on symbol order', () => {
      expect(shannonEntropy([2, 0, 1, 0])).toBeCloseTo(shannonEntropy([0, 0, 1, 2]), 12)
    })

    it('does not mutate its input', () => {
      const seq = [3, 1, 2, 1]
      shannonEntropy(seq)
      expect(seq).toEqual([3, 1, 2, 1])
    })
  })

  describe('markovEntropy', () => {
    it('equals the order-0 entropy for k <= 0', () => {
      const seq = [0, 0, 1, 2, 1, 0, 2, 2, 1, 0, 0, 1]
      expect(markovEntropy(seq, 0)).toBe(shannonEntropy(seq))
      expect(markovEntropy(seq, -2)).toBe(shannonEntropy(seq))
    })

    it('returns 0 when the sequence is not longer than k', () => {
      expect(markovEntropy([], 1)).toBe(0)
      expect(markovEntropy([1], 1)).toBe(0)
      expect(markovEntropy([1, 2, 3], 3)).toBe(0)
    })

    it('is zero for a deterministic alternation', () => {
      const alternating = repeat([0, 1], 20)
      expect(shannonEntropy(alternating)).toBe(1)
      expect(markovEntropy(alternating, 1)).toBe(0)
    })

    it('weights each context by its frequency', () => {
      // contexts: 0 -> [0, 1] (H=1, weight 2/3), 1 -> [1] (H=0, weight 1/3)
      expect(markovEntropy([0, 0, 1, 1], 1)).toBeCloseTo(2 / 3, 12)
    })

    it('uses tuples of k symbols as contexts', () => {
      // order 2 contexts: (0,1) -> [2, 3], (1,2) -> [0], (2,0) -> [1], (1,3) -> [0]
      // only (0,1) is uncertain: weight 2/5, H = 1
      const seq = [0, 1, 2, 0, 1, 3, 0]
      expect(markovEntropy(seq, 2)).toBeCloseTo(0.4, 12)
    })

    it('does not exceed the order-0 entropy on mixed material', () => {
      const sequences: SequenceSymbol[][] = [
        [0, 0, 1, 2, 1, 0, 2, 2, 1, 0, 0, 1],
        repeat([0, 1, 2, 3], 5),
        [60, 62, 64, 'X', 62, 60, 64, 'X', 60],
      ]
      for (const seq of sequences) {
        for (const k of [1, 2, 3]) {
          expect(markovEntropy(seq, k)).toBeLessThanOrEqual(shannonEntropy(seq))
        }
      }
    })

    it('keys contexts by value and type', () => {
      // contexts 60 and "60" are distinct, each with a single successor
      expect(markovEntropy([60, 1, '60', 2, 60, 1, '60', 2], 1)).toBeCloseTo(0, 12)
    })
  })

  describe('maxEntropy', () => {
    it('returns 0 for an empty alphabet', () => {
      expect(maxEntropy(0)).toBe(0)
      expect(maxEntropy(-3)).toBe(0)
    })

    it('returns log2 of the alphabet size', () => {
      expect(maxEntropy(1)).toBe(0)
      expect(maxEntropy(8)).toBe(3)
      expect(maxEntropy(12)).toBeCloseTo(3.585, 3)
    })
  })

  describe('redundancy', () => {
    it('returns the gap between maximum and observed entropy', () => {
      expect(redundancy(3, 1.25)).toBe(1.75)
    })

    it('never goes negative', () => {
      expect(redundancy(1, 2)).toBe(0)
      expect(redundancy(0, 0)).toBe(0)
    })
  })

  describe('predictabilityIndex', () => {
    it('returns 1 - H*/Hmax', () => {
      expect(predictabilityIndex(1, 4)).toBe(0.75)
    })

    it('returns 0 when Hmax is not positive', () => {
      expect(predictabilityIndex(0, 0)).toBe(0)
      expect(predictabilityIndex(1, -1)).toBe(0)
    })

    it('clamps to [0, 1]', () => {
      expect(predictabilityIndex(5, 2)).toBe(0)
      expect(predictabilityIndex(-1, 2)).toBe(1)
    })
  })

  describe('slidingWindowEntropies', () => {
    it('emits one pair per window in traversal order, keeping the short tail', () => {
      // windows: [0,1,0,1], [0,1,2,2], [2,2]
      const result = slidingWindowEntropies([0, 1, 0, 1, 2, 2], 4, 2, 1)
      expect(result).toHaveLength(3)
      expect(result[0]).toEqual({ h0: 1, hk: 0 })
      expect(result[1].h0).toBeCloseTo(1.5, 12)
      expect(result[1].hk).toBe(0)
      expect(result[2]).toEqual({ h0: 0, hk: 0 })
    })

    it('uses non-overlapping windows when step equals window size', () => {
      const result = slidingWindowEntropies(repeat([0, 1], 4), 4, 4)
      expect(result).toEqual([
        { h0: 1, hk: 0 },
        { h0: 1, hk: 0 },
      ])
    })

    it('returns a single window when the sequence is shorter than the window', () => {
      expect(slidingWindowEntropies([5, 6, 7], 16, 8)).toHaveLength(1)
    })

    it('returns nothing for an empty sequence', () => {
      expect(slidingWindowEntropies([], 4, 2)).toEqual([])
    })

    it('passes the order through to the conditional entropy', () => {
      const [first] = slidingWindowEntropies([0, 0, 1, 1], 4, 4, 0)
      expect(first.hk).toBe(first.h0)
    })

    it('rejects non-positive window size or step', () => {
      expect(() => slidingWindowEntropies([1, 2, 3], 0, 1)).toThrow(InvalidArgumentError)
      expect(() => slidingWindowEntropies([1, 2, 3], 4, -1)).toThrow(InvalidArgumentError)
      expect(() => slidingWindowEntropies([1, 2, 3], -4, 0)).toThrow(
        'windowSize and step must be positive integers.'
      )
    })

    it('rejects fractional window size or step', () => {
      expect(() => slidingWindowEntropies([1, 2, 3], 2.5, 1)).toThrow(InvalidArgumentError)
    })
  })
})
