import { describe, it, expect, beforeAll, afterAll } from 'vitest'
import { mkdtemp, rm, writeFile } from 'fs/promises'
import os from 'os'
import path from 'path'
import { loadTextSequence, parseTextSequence } from './textLoader'
import { SequenceFileNotFoundError, SequenceFormatError } from '../domain/errors'

describe('textLoader', () => {
  describe('parseTextSequence (json)', () => {
    it('reads melody and rhythm arrays', () => {
      const result = parseTextSequence('{"melody": ["C4", 62, "E4"], "rhythm": [1, 0, "1"]}', 'json')
      expect(result).toEqual({ melody: ['C4', 62, 'E4'], rhythm: [1, 0, 1] })
    })

    it('truncates fractional rhythm values', () => {
      expect(parseTextSequence('{"melody": [], "rhythm": [1.7, 0.2]}', 'json').rhythm).toEqual([1, 0])
    })

    it('requires both keys', () => {
      expect(() => parseTextSequence('{"melody": ["C4"]}', 'json')).toThrow(
        "JSON must contain 'melody' and 'rhythm' keys."
      )
    })

    it('rejects malformed JSON', () => {
      expect(() => parseTextSequence('{melody', 'json')).toThrow(SequenceFormatError)
    })

    it('rejects non-array sequences and invalid values', () => {
      expect(() => parseTextSequence('{"melody": "C4", "rhythm": []}', 'json')).toThrow(
        SequenceFormatError
      )
      expect(() => parseTextSequence('{"melody": [], "rhythm": ["x"]}', 'json')).toThrow(
        'Invalid rhythm value: "x"'
      )
      expect(() => parseTextSequence('{"melody": [null], "rhythm": []}', 'json')).toThrow(
        'Invalid melody value: null'
      )
    })
  })

  describe('parseTextSequence (csv)', () => {
    it('reads melody/rhythm columns, tokenising each cell', () => {
      const csv = 'melody,rhythm\nC4 D4 E4,"1 1 0"\n"60,62",1\n'
      expect(parseTextSequence(csv, 'csv')).toEqual({
        melody: ['C4', 'D4', 'E4', 60, 62],
        rhythm: [1, 1, 0, 1],
      })
    })

    it('skips empty cells in melody/rhythm layout', () => {
      const csv = 'melody,rhythm\nC4,1\n,0\n'
      expect(parseTextSequence(csv, 'csv')).toEqual({ melody: ['C4'], rhythm: [1, 0] })
    })

    it('reads type/sequence rows', () => {
      const csv = 'type,sequence\nmelody,"C4,D4,E4"\nRhythm,"1,1,0"\n'
      expect(parseTextSequence(csv, 'csv')).toEqual({
        melody: ['C4', 'D4', 'E4'],
        rhythm: [1, 1, 0],
      })
    })

    it('requires both kinds of type/sequence rows', () => {
      const csv = 'type,sequence\nmelody,"C4,D4"\n'
      expect(() => parseTextSequence(csv, 'csv')).toThrow(
        'CSV with type/sequence must include both melody and rhythm rows.'
      )
    })

    it('falls back to the first two columns, one token per cell', () => {
      const csv = 'pitch,onset\nC4,1\n64,0\nG4,1\n'
      expect(parseTextSequence(csv, 'csv')).toEqual({ melody: ['C4', 64, 'G4'], rhythm: [1, 0, 1] })
    })

    it('rejects a single-column CSV', () => {
      expect(() => parseTextSequence('notes\nC4\nD4\n', 'csv')).toThrow(
        'Unsupported CSV format. Include columns melody/rhythm or type/sequence.'
      )
    })

    it('reads cells holding a very long grid', () => {
      const count = 200_000
      const cellText = Array(count).fill('1').join(' ')
      const result = parseTextSequence(`melody,rhythm\n"${cellText}","${cellText}"\n`, 'csv')
      expect(result.melody).toHaveLength(count)
      expect(result.rhythm).toHaveLength(count)
      expect(result.melody[count - 1]).toBe(1)
      expect(result.rhythm[count - 1]).toBe(1)

      const rows = parseTextSequence(
        `type,sequence\nmelody,"${cellText}"\nrhythm,"${cellText}"\n`,
        'csv'
      )
      expect(rows.melody).toHaveLength(count)
      expect(rows.rhythm).toHaveLength(count)
    })

    it('rejects an empty CSV', () => {
      expect(() => parseTextSequence('', 'csv')).toThrow('CSV file is empty.')
    })
  })

  describe('loadTextSequence', () => {
    let dir: string

    beforeAll(async () => {
      dir = await mkdtemp(path.join(os.tmpdir(), 'music-entropy-text-'))
      await writeFile(path.join(dir, 'piece.json'), '{"melody": ["C4", "D4"], "rhythm": [1, 0]}')
      await writeFile(path.join(dir, 'piece.CSV'), 'melody,rhythm\nE4 F4,1 1\n')
      await writeFile(path.join(dir, 'notes.txt'), 'C4 D4')
    })

    afterAll(async () => {
      await rm(dir, { recursive: true, force: true })
    })

    it('loads a JSON file', async () => {
      await expect(loadTextSequence(path.join(dir, 'piece.json'))).resolves.toEqual({
        melody: ['C4', 'D4'],
        rhythm: [1, 0],
      })
    })

    it('picks the parser from the suffix, case-insensitively', async () => {
      await expect(loadTextSequence(path.join(dir, 'piece.CSV'))).resolves.toEqual({
        melody: ['E4', 'F4'],
        rhythm: [1, 1],
      })
    })

    it('rejects unsupported suffixes', async () => {
      await expect(loadTextSequence(path.join(dir, 'notes.txt'))).rejects.toThrow(
        'Unsupported text format. Use .json or .csv.'
      )
    })

    it('reports missing files', async () => {
      await expect(loadTextSequence(path.join(dir, 'missing.json'))).rejects.toBeInstanceOf(
        SequenceFileNotFoundError
      )
    })
  })
})
