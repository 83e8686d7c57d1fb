import Papa from 'papaparse'
import type { AnalysisResult } from '../domain/types'

// ─────────────────────────────────────────────────────────────────────────────
// Reports: tabular, JSON and console renderings of analysis results
// ─────────────────────────────────────────────────────────────────────────────

export const GLOBAL_FIELDS = [
  'path',
  'h0',
  'hk',
  'hmax',
  'redundancy',
  'lzc',
  'lzc_normalized',
  'ip',
] as const

export const LOCAL_FIELDS = ['window', 'h0', 'hk', 'path'] as const

export type GlobalMetricRecord = Record<(typeof GLOBAL_FIELDS)[number], string | number>

/** Flat record of the global metrics, keyed by report column. */
export function resultToRecord(result: AnalysisResult): GlobalMetricRecord {
  return {
    path: result.path,
    h0: result.h0,
    hk: result.hk,
    hmax: result.hmax,
    redundancy: result.redundancy,
    lzc: result.lzc,
    lzc_normalized: result.lzcNormalized,
    ip: result.ip,
  }
}

/**
 * One CSV row of global metrics per result, with a header row.
 */
export function resultsToCsv(results: readonly AnalysisResult[]): string {
  const data = results.map((result) => {
    const record = resultToRecord(result)
    return GLOBAL_FIELDS.map((field) => record[field])
  })
  return Papa.unparse({ fields: [...GLOBAL_FIELDS], data }, { newline: '\n' })
}

/**
 * Per-window rows for every result that carries local metrics.
 * Returns undefined when no result has any.
 */
export function localResultsToCsv(results: readonly AnalysisResult[]): string | undefined {
  const data: Array<Array<string | number>> = []
  for (const result of results) {
    for (const entry of result.local ?? []) {
      data.push([entry.window, entry.h0, entry.hk, result.path])
    }
  }
  if (data.length === 0) return undefined
  return Papa.unparse({ fields: [...LOCAL_FIELDS], data }, { newline: '\n' })
}

export function resultToJson(result: AnalysisResult): string {
  return JSON.stringify({ ...resultToRecord(result), local: result.local ?? null }, null, 2)
}

/**
 * Human-readable summary of one result, four decimals per metric.
 */
export function formatResult(result: AnalysisResult): string {
  const lines = [
    `File: ${result.path}`,
    `  H0: ${result.h0.toFixed(4)}`,
    `  Hk (order): ${result.hk.toFixed(4)}`,
    `  Hmax: ${result.hmax.toFixed(4)}`,
    `  Redundancy: ${result.redundancy.toFixed(4)}`,
    `  LZC: ${result.lzc}`,
    `  LZC normalized: ${result.lzcNormalized.toFixed(4)}`,
    `  Predictability (IP): ${result.ip.toFixed(4)}`,
  ]
  if (result.local && result.local.length > 0) {
    lines.push(`  Local windows: ${result.local.length}`)
  }
  return lines.join('\n')
}
