import { readFile } from 'fs/promises'
import { Midi } from '@tonejs/midi'
import type { MidiLoadOptions, RawSequences } from '../domain/types'
import { InvalidArgumentError, SequenceFileNotFoundError } from '../domain/errors'
import { getLogger } from '../utils/logger'

const logger = getLogger('midiLoader')

// ─────────────────────────────────────────────────────────────────────────────
// MIDI Loader: melody pitches and a binary rhythm grid from a MIDI file
// ─────────────────────────────────────────────────────────────────────────────

export const DEFAULT_TIME_UNIT = 0.25 // sixteenth notes

/** Note onset/offset measured in beats. */
export interface BeatInterval {
  start: number
  end: number
}

// ─────────────────────────────────────────────────────────────────────────────
// Helper Functions
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Index of the track holding the most notes; the first one wins ties.
 */
export function selectMelodyTrack(midi: Midi): number {
  let bestIndex = 0
  let bestCount = -1
  midi.tracks.forEach((track, index) => {
    if (track.notes.length > bestCount) {
      bestIndex = index
      bestCount = track.notes.length
    }
  })
  return bestIndex
}

/**
 * Rasterize note intervals onto a grid of `timeUnit` beats.
 *
 * The grid spans `floor(totalBeats / timeUnit + 1)` steps (at least one). A note
 * switches on every step from the one containing its start up to the one
 * containing its end, and always at least its start step.
 */
export function intervalsToRhythm(
  intervals: readonly BeatInterval[],
  totalBeats: number,
  timeUnit: number
): Array<0 | 1> {
  if (!(timeUnit > 0)) {
    throw new InvalidArgumentError('timeUnit must be positive.')
  }

  const steps = Math.max(1, Math.floor(totalBeats / timeUnit + 1))
  const rhythm: Array<0 | 1> = new Array<0 | 1>(steps).fill(0)

  for (const { start, end } of intervals) {
    const startIdx = Math.max(0, Math.floor(start / timeUnit))
    const endIdx = Math.max(startIdx + 1, Math.floor(end / timeUnit + 0.9999))
    for (let idx = startIdx; idx < Math.min(endIdx, steps); idx++) {
      rhythm[idx] = 1
    }
  }

  return rhythm
}

// ─────────────────────────────────────────────────────────────────────────────
// Public API
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Extract melody and rhythm from MIDI bytes.
 *
 * The melody is the pitch of every note on the selected track in onset
 * order; the rhythm is that track's activation grid.
 */
export function parseMidi(
  bytes: ArrayLike<number> | ArrayBuffer,
  options: MidiLoadOptions = {}
): RawSequences {
  const timeUnit = options.timeUnit ?? DEFAULT_TIME_UNIT
  const midi = new Midi(bytes)

  const trackIndex = options.trackIndex ?? selectMelodyTrack(midi)
  if (!Number.isInteger(trackIndex) || trackIndex < 0 || trackIndex >= midi.tracks.length) {
    throw new InvalidArgumentError(
      `trackIndex ${trackIndex} out of bounds for MIDI with ${midi.tracks.length} tracks.`
    )
  }

  const ppq = midi.header.ppq
  const notes = midi.tracks[trackIndex].notes
  const melody = notes.map((note) => note.midi)
  const intervals = notes.map((note) => ({
    start: note.ticks / ppq,
    end: (note.ticks + note.durationTicks) / ppq,
  }))
  const totalBeats = intervals.reduce((latest, { end }) => Math.max(latest, end), 0)

  return { melody, rhythm: intervalsToRhythm(intervals, totalBeats, timeUnit) }
}

/**
 * Load a MIDI file and return its melody and rhythm sequences.
 */
export async function loadMidi(filePath: string, options: MidiLoadOptions = {}): Promise<RawSequences> {
  let bytes: Buffer
  try {
    bytes = await readFile(filePath)
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      throw new SequenceFileNotFoundError(filePath)
    }
    throw err
  }

  const sequences = parseMidi(bytes, options)
  logger.debug(
    `Loaded ${sequences.melody.length} notes and ${sequences.rhythm.length} grid steps from ${filePath}`
  )
  return sequences
}
