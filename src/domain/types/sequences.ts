/**
 * A discrete melodic symbol: a MIDI pitch code, or the raw text token when a
 * note name could not be resolved. `60` and `"60"` are different symbols.
 */
export type SequenceSymbol = number | string

/** Ordered melodic sequence as consumed by the entropy engine. */
export type Melody = readonly SequenceSymbol[]

/** A rhythm grid value; anything greater than zero counts as an activation. */
export type RhythmValue = number | boolean

export type Rhythm = readonly RhythmValue[]

/**
 * Melody and rhythm as read from a source file, before standardization.
 * Melody tokens may still be note names ("C#4") or numeric strings.
 */
export interface RawSequences {
  melody: SequenceSymbol[]
  rhythm: number[]
}

/** Melody with note names resolved to MIDI codes and a strictly binary rhythm. */
export interface StandardizedSequences {
  melody: SequenceSymbol[]
  rhythm: Array<0 | 1>
}
