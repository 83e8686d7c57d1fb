import { Note } from 'tonal'
import type { SequenceSymbol, StandardizedSequences } from '../domain/types'

// ─────────────────────────────────────────────────────────────────────────────
// Encoding: standardize raw melody/rhythm tokens into engine symbols
// ─────────────────────────────────────────────────────────────────────────────

// Letter, optional single accidental, signed octave (e.g. C#4, Db3, A-1)
const NOTE_NAME_PATTERN = /^[A-Ga-g][#b]?-?\d+$/

const INTEGER_PATTERN = /^[+-]?\d+$/

const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/

/**
 * Convert a note name with octave to its MIDI number ("C4" -> 60, "Db3" -> 49).
 * Returns undefined for anything that is not a single-accidental note name.
 * Names beyond the MIDI range are not clamped ("C-2" -> -12, "C10" -> 132).
 */
export function noteNameToMidi(noteName: string): number | undefined {
  const trimmed = noteName.trim()
  if (!NOTE_NAME_PATTERN.test(trimmed)) return undefined
  // Note.midi is null outside 0-127; height is the same number, unbounded
  const note = Note.get(trimmed)
  return note.empty ? undefined : note.height
}

/**
 * Resolve melody tokens to MIDI integers where possible.
 *
 * - integers are kept as they are
 * - integer strings ("60", " 62 ") become integers
 * - note names become MIDI numbers
 * - everything else is kept as a text token
 */
export function standardizeMelody(melody: Iterable<SequenceSymbol>): SequenceSymbol[] {
  const standardized: SequenceSymbol[] = []
  for (const item of melody) {
    if (typeof item === 'number' && Number.isInteger(item)) {
      standardized.push(item)
      continue
    }
    const text = String(item)
    if (INTEGER_PATTERN.test(text.trim())) {
      standardized.push(parseInt(text.trim(), 10))
      continue
    }
    standardized.push(noteNameToMidi(text) ?? text)
  }
  return standardized
}

/**
 * Parse a rhythm value the way a numeric cell is read: numbers and booleans
 * directly, strings only when they are plain decimal literals.
 */
function rhythmValueToNumber(item: unknown): number {
  if (typeof item === 'number') return item
  if (typeof item === 'boolean') return item ? 1 : 0
  if (typeof item === 'string') {
    const text = item.trim()
    return DECIMAL_PATTERN.test(text) ? parseFloat(text) : NaN
  }
  return NaN
}

/**
 * Force a rhythm to a binary activation grid. Values are truncated toward
 * zero first, so 0.9 is a rest and 1.5 an onset; unparseable values are rests.
 */
export function standardizeRhythm(rhythm: Iterable<unknown>): Array<0 | 1> {
  const clean: Array<0 | 1> = []
  for (const item of rhythm) {
    const value = Math.trunc(rhythmValueToNumber(item))
    clean.push(value > 0 ? 1 : 0)
  }
  return clean
}

export function encodeSequences(
  melody: Iterable<SequenceSymbol>,
  rhythm: Iterable<unknown>
): StandardizedSequences {
  return {
    melody: standardizeMelody(melody),
    rhythm: standardizeRhythm(rhythm),
  }
}
