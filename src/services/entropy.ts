// ─────────────────────────────────────────────────────────────────────────────
// Entropy Engine: order-0 / order-k entropy and derived indices
// ─────────────────────────────────────────────────────────────────────────────

import type { Melody, SequenceSymbol, WindowEntropy } from '../domain/types'
import { InvalidArgumentError } from '../domain/errors'

// ─────────────────────────────────────────────────────────────────────────────
// Helper Functions
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Count occurrences of each symbol. Map keys compare by SameValueZero, so the
 * integer 60 and the string "60" are counted separately.
 */
function countSymbols(sequence: Melody): Map<SequenceSymbol, number> {
  const counts = new Map<SequenceSymbol, number>()
  for (const symbol of sequence) {
    counts.set(symbol, (counts.get(symbol) ?? 0) + 1)
  }
  return counts
}

/**
 * Stable key for a context tuple. JSON keeps numbers and strings apart
 * ([60] vs ["60"]) and preserves element order.
 */
function contextKey(context: Melody): string {
  return JSON.stringify(context)
}

// ─────────────────────────────────────────────────────────────────────────────
// Entropy Measures
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Order-0 Shannon entropy of the empirical symbol distribution, in bits.
 * Returns 0 for an empty sequence.
 */
export function shannonEntropy(sequence: Melody): number {
  if (sequence.length === 0) return 0

  const total = sequence.length
  let entropy = 0
  for (const count of countSymbols(sequence).values()) {
    const p = count / total
    entropy -= p * Math.log2(p)
  }
  return entropy
}

/**
 * Empirical conditional entropy H(X | previous k symbols).
 *
 * Every position i < n - k contributes the context seq[i..i+k) with successor
 * seq[i+k]. The result is the average of each context's successor entropy,
 * weighted by how often the context occurs. Plug-in estimate: biased low for
 * short sequences or large k.
 *
 * - k <= 0 falls back to the order-0 entropy
 * - n <= k returns 0 (no context/successor pair exists)
 */
export function markovEntropy(sequence: Melody, orderK: number): number {
  if (orderK <= 0) return shannonEntropy(sequence)

  const n = sequence.length
  if (n <= orderK) return 0

  const transitions = new Map<string, SequenceSymbol[]>()
  for (let i = 0; i < n - orderK; i++) {
    const key = contextKey(sequence.slice(i, i + orderK))
    const successors = transitions.get(key)
    if (successors) {
      successors.push(sequence[i + orderK])
    } else {
      transitions.set(key, [sequence[i + orderK]])
    }
  }

  const total = n - orderK
  let entropy = 0
  for (const successors of transitions.values()) {
    const weight = successors.length / total
    entropy += weight * shannonEntropy(successors)
  }
  return entropy
}

/**
 * Entropy of a uniform distribution over `alphabetSize` symbols.
 */
export function maxEntropy(alphabetSize: number): number {
  if (alphabetSize <= 0) return 0
  return Math.log2(alphabetSize)
}

/** R = Hmax - H*, floored at zero. */
export function redundancy(hMax: number, hStar: number): number {
  return Math.max(0, hMax - hStar)
}

/**
 * Predictability index IP = 1 - H* / Hmax, clamped to [0, 1].
 * Returns 0 when Hmax is not positive (single-symbol or empty alphabet).
 */
export function predictabilityIndex(hStar: number, hMax: number): number {
  if (hMax <= 0) return 0
  const ip = 1 - hStar / hMax
  return Math.min(1, Math.max(0, ip))
}

// ─────────────────────────────────────────────────────────────────────────────
// Local (Windowed) Entropy
// ─────────────────────────────────────────────────────────────────────────────

/**
 * H0 and Hk over windows of `windowSize` symbols starting at 0 and advancing
 * by `step`. The last window may be shorter than `windowSize`; it is kept as
 * long as it holds at least one symbol.
 *
 * @throws {InvalidArgumentError} when `windowSize` or `step` is not a positive integer
 */
export function slidingWindowEntropies(
  sequence: Melody,
  windowSize: number,
  step: number,
  orderK: number = 1
): WindowEntropy[] {
  if (!Number.isInteger(windowSize) || !Number.isInteger(step) || windowSize <= 0 || step <= 0) {
    throw new InvalidArgumentError('windowSize and step must be positive integers.')
  }

  const results: WindowEntropy[] = []
  for (let start = 0; start < sequence.length; start += step) {
    const window = sequence.slice(start, start + windowSize)
    if (window.length === 0) continue
    results.push({
      h0: shannonEntropy(window),
      hk: markovEntropy(window, orderK),
    })
  }
  return results
}
