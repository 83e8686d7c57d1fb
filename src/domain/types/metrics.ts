/**
 * Entropy pair for one sliding window, in bits.
 */
export interface WindowEntropy {
  /** Order-0 Shannon entropy of the window */
  h0: number
  /** Order-k conditional entropy of the window */
  hk: number
}

/** Window entropy tagged with its position in traversal order. */
export interface LocalWindowMetric extends WindowEntropy {
  window: number
}
