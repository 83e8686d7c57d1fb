import { readFile } from 'fs/promises'
import path from 'path'
import Papa from 'papaparse'
import type { RawSequences, SequenceSymbol } from '../domain/types'
import { SequenceFileNotFoundError, SequenceFormatError } from '../domain/errors'
import { getLogger } from '../utils/logger'

const logger = getLogger('textLoader')

// ─────────────────────────────────────────────────────────────────────────────
// Text Loader: melody and rhythm sequences from JSON or CSV
// ─────────────────────────────────────────────────────────────────────────────

export type TextFormat = 'json' | 'csv'

const INTEGER_TOKEN = /^[+-]?\d+$/

// ─────────────────────────────────────────────────────────────────────────────
// Token Helpers
// ─────────────────────────────────────────────────────────────────────────────

/** Split a cell on commas and/or whitespace, dropping empty tokens. */
function splitTokens(cell: string): string[] {
  return cell.split(/[,\s]+/).filter((token) => token.length > 0)
}

/** Integer tokens become numbers; everything else stays a string. */
function maybeInt(token: string): SequenceSymbol {
  return INTEGER_TOKEN.test(token) ? parseInt(token, 10) : token
}

function toRhythmNumber(value: unknown): number {
  if (typeof value === 'number' && Number.isFinite(value)) return Math.trunc(value)
  if (typeof value === 'boolean') return value ? 1 : 0
  if (typeof value === 'string' && INTEGER_TOKEN.test(value.trim())) {
    return parseInt(value.trim(), 10)
  }
  throw new SequenceFormatError(`Invalid rhythm value: ${JSON.stringify(value)}`)
}

// ─────────────────────────────────────────────────────────────────────────────
// JSON
// ─────────────────────────────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function parseJson(content: string): RawSequences {
  let data: unknown
  try {
    data = JSON.parse(content)
  } catch (err) {
    throw new SequenceFormatError(`Invalid JSON: ${err instanceof Error ? err.message : String(err)}`)
  }

  if (!isRecord(data) || !('melody' in data) || !('rhythm' in data)) {
    throw new SequenceFormatError("JSON must contain 'melody' and 'rhythm' keys.")
  }
  const { melody, rhythm } = data
  if (!Array.isArray(melody) || !Array.isArray(rhythm)) {
    throw new SequenceFormatError("JSON 'melody' and 'rhythm' must be arrays.")
  }

  return {
    melody: melody.map((item: unknown) => {
      if (typeof item === 'number' || typeof item === 'string') return item
      throw new SequenceFormatError(`Invalid melody value: ${JSON.stringify(item)}`)
    }),
    rhythm: rhythm.map(toRhythmNumber),
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// CSV
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Read a CSV in one of three layouts:
 *
 *   melody,rhythm            type,sequence           <any>,<any>
 *   C4 D4 E4,"1 1 0"         melody,"C4,D4,E4"        C4,1
 *                            rhythm,"1,1,0"           D4,0
 *
 * The first two tokenise every cell; the positional fallback reads one token
 * per cell from the first two columns.
 */
function parseCsv(content: string): RawSequences {
  const parsed = Papa.parse<string[]>(content, { delimiter: ',', skipEmptyLines: true })
  if (parsed.errors.length > 0) {
    const first = parsed.errors[0]
    throw new SequenceFormatError(`Invalid CSV at row ${first.row ?? '?'}: ${first.message}`)
  }
  if (parsed.data.length === 0) {
    throw new SequenceFormatError('CSV file is empty.')
  }

  const [header, ...rows] = parsed.data
  const columns = header.map((name) => name.trim())
  const cell = (row: string[], index: number): string => (row[index] ?? '').trim()

  // Appended per token: one cell can hold a whole grid
  const melody: SequenceSymbol[] = []
  const rhythm: number[] = []

  const melodyCol = columns.indexOf('melody')
  const rhythmCol = columns.indexOf('rhythm')
  if (melodyCol >= 0 && rhythmCol >= 0) {
    for (const row of rows) {
      for (const token of splitTokens(cell(row, melodyCol))) melody.push(maybeInt(token))
      for (const token of splitTokens(cell(row, rhythmCol))) rhythm.push(toRhythmNumber(token))
    }
    return { melody, rhythm }
  }

  const typeCol = columns.indexOf('type')
  const sequenceCol = columns.indexOf('sequence')
  if (typeCol >= 0 && sequenceCol >= 0) {
    for (const row of rows) {
      const kind = cell(row, typeCol).toLowerCase()
      const tokens = splitTokens(cell(row, sequenceCol))
      if (kind === 'melody') {
        for (const token of tokens) melody.push(maybeInt(token))
      } else if (kind === 'rhythm') {
        for (const token of tokens) rhythm.push(toRhythmNumber(token))
      }
    }
    if (melody.length === 0 || rhythm.length === 0) {
      throw new SequenceFormatError(
        'CSV with type/sequence must include both melody and rhythm rows.'
      )
    }
    return { melody, rhythm }
  }

  if (columns.length >= 2) {
    for (const row of rows) {
      const note = cell(row, 0)
      const beat = cell(row, 1)
      if (note) melody.push(maybeInt(note))
      if (beat) rhythm.push(toRhythmNumber(beat))
    }
    return { melody, rhythm }
  }

  throw new SequenceFormatError(
    'Unsupported CSV format. Include columns melody/rhythm or type/sequence.'
  )
}

// ─────────────────────────────────────────────────────────────────────────────
// Public API
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Parse in-memory JSON or CSV content into raw melody and rhythm sequences.
 */
export function parseTextSequence(content: string, format: TextFormat): RawSequences {
  return format === 'json' ? parseJson(content) : parseCsv(content)
}

/**
 * Load symbolic sequences from a .json or .csv file.
 *
 * JSON: `{"melody": ["C4", "D4", "E4"], "rhythm": [1, 1, 0]}`
 */
export async function loadTextSequence(filePath: string): Promise<RawSequences> {
  const suffix = path.extname(filePath).toLowerCase()
  if (suffix !== '.json' && suffix !== '.csv') {
    throw new SequenceFormatError('Unsupported text format. Use .json or .csv.')
  }

  let content: string
  try {
    content = await readFile(filePath, 'utf-8')
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      throw new SequenceFileNotFoundError(filePath)
    }
    throw err
  }

  const sequences = parseTextSequence(content, suffix === '.json' ? 'json' : 'csv')
  logger.debug(
    `Loaded ${sequences.melody.length} melody tokens and ${sequences.rhythm.length} rhythm steps from ${filePath}`
  )
  return sequences
}
