// ─────────────────────────────────────────────────────────────────────────────
// Complexity Engine: Lempel-Ziv (LZ76) complexity of binary rhythm grids
// ─────────────────────────────────────────────────────────────────────────────

import type { Rhythm } from '../domain/types'

/**
 * Map rhythm values onto a binary alphabet: anything greater than zero is '1'.
 */
function toBinaryString(sequence: Rhythm): string {
  let s = ''
  for (const value of sequence) {
    s += Number(value) > 0 ? '1' : '0'
  }
  return s
}

/**
 * Lempel-Ziv complexity (LZ76): the number of phrases produced by the
 * incremental parse of the binarized sequence.
 *
 * State: `l` is the length of the parsed prefix, `i` the start of the
 * candidate match inside that prefix, and `k` the current match length.
 * A mismatch moves `i` forward; once every start in the prefix has been
 * tried a new phrase of length `k` is closed. Running past the end counts
 * the remaining tail as the last phrase.
 *
 * Returns 0 for an empty sequence and 1 for a single symbol.
 */
export function lempelZivComplexity(sequence: Rhythm): number {
  const s = toBinaryString(sequence)
  const n = s.length
  if (n === 0) return 0
  if (n === 1) return 1

  let c = 1
  let i = 0
  let k = 1
  let l = 1

  while (true) {
    if (l + k > n) {
      c += 1
      break
    }
    if (s[i + k - 1] === s[l + k - 1]) {
      k += 1
    } else {
      i += 1
      if (i === l) {
        c += 1
        l += k
        if (l >= n) break
        i = 0
        k = 1
      }
    }
  }

  return c
}

/**
 * Length-normalized LZ76 complexity: c(n) * log2(n) / n, capped at 1.
 * Returns 0 for an empty sequence.
 */
export function normalizedLzc(sequence: Rhythm): number {
  const n = sequence.length
  if (n === 0) return 0
  const c = lempelZivComplexity(sequence)
  return Math.min(1, (c * Math.log2(n)) / n)
}
