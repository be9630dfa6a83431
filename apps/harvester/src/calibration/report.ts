/**
 * Calibration report
 *
 * Compares human labels with the latest stored prediction per listing and
 * sweeps score thresholds for the "certify as REAL" decision.
 */

import type { DealLabel, LatestPrediction } from '@dealcheck/db'
import { roundTo } from '../evaluator'
import type { HumanLabel, LabeledRow } from './labels'

const POSITIVE_HUMAN: ReadonlySet<HumanLabel> = new Set(['REAL'])
const POSITIVE_MODEL: ReadonlySet<DealLabel> = new Set(['REAL', 'LIKELY_REAL'])

/** Visible discount a sweep prediction needs besides the score */
export const SWEEP_MIN_VISIBLE_DISCOUNT = 0.1

export const DEFAULT_SWEEP_THRESHOLDS: number[] = Array.from({ length: 21 }, (_, i) => roundTo(0.5 + i / 100, 2))

export interface BinaryCounts {
  tp: number
  fp: number
  fn: number
  tn: number
}

export interface JoinedRow {
  human: LabeledRow
  prediction: LatestPrediction
}

export interface CalibrationReport {
  csvRows: number
  matchedRows: number
  missingRows: number
  exactMatchAccuracy: number
  precision: number
  recall: number
  binary: BinaryCounts
  /** human label -> predicted label -> count */
  confusion: Record<string, Record<string, number>>
  mismatches: string[]
  joined: JoinedRow[]
}

export interface SweepRow {
  threshold: number
  precision: number
  recall: number
  accuracy: number
  tp: number
  fp: number
}

function safeDiv(num: number, den: number): number {
  return den === 0 ? 0 : num / den
}

function tally(counts: BinaryCounts, humanPositive: boolean, predictedPositive: boolean): void {
  if (humanPositive && predictedPositive) counts.tp++
  else if (!humanPositive && predictedPositive) counts.fp++
  else if (humanPositive) counts.fn++
  else counts.tn++
}

function formatPct(value: number | null): string {
  return value === null ? 'null' : value.toFixed(4)
}

/**
 * Index predictions by (product url, retailer), the retailer being matched
 * case-insensitively by name or domain.
 */
export function indexPredictions(predictions: LatestPrediction[]): Map<string, LatestPrediction> {
  const index = new Map<string, LatestPrediction>()
  for (const prediction of predictions) {
    const url = prediction.productUrl.trim()
    index.set(`${url}|${prediction.retailerName.trim().toLowerCase()}`, prediction)
    index.set(`${url}|${prediction.retailerDomain.trim().toLowerCase()}`, prediction)
  }
  return index
}

export function buildCalibrationReport(labels: LabeledRow[], predictions: LatestPrediction[]): CalibrationReport {
  const index = indexPredictions(predictions)
  const binary: BinaryCounts = { tp: 0, fp: 0, fn: 0, tn: 0 }
  const confusion: Record<string, Record<string, number>> = {}
  const mismatches: string[] = []
  const joined: JoinedRow[] = []
  let exact = 0

  for (const human of labels) {
    const prediction = index.get(`${human.productUrl}|${human.retailer.toLowerCase()}`)
    if (!prediction) {
      mismatches.push(`MISSING prediction | retailer=${human.retailer} | url=${human.productUrl} | human=${human.labelHuman}`)
      continue
    }

    joined.push({ human, prediction })
    const row = (confusion[human.labelHuman] ??= {})
    row[prediction.label] = (row[prediction.label] ?? 0) + 1

    if (human.labelHuman === prediction.label) {
      exact++
    } else {
      mismatches.push(
        `MISMATCH | retailer=${human.retailer} | human=${human.labelHuman} | pred=${prediction.label}` +
          ` | score=${prediction.score.toFixed(4)} | discount=${formatPct(prediction.discountPct)}` +
          ` | cross=${formatPct(prediction.crossStoreDeltaPct)} | url=${human.productUrl}`
      )
    }

    tally(binary, POSITIVE_HUMAN.has(human.labelHuman), POSITIVE_MODEL.has(prediction.label))
  }

  return {
    csvRows: labels.length,
    matchedRows: joined.length,
    missingRows: labels.length - joined.length,
    exactMatchAccuracy: safeDiv(exact, joined.length),
    precision: safeDiv(binary.tp, binary.tp + binary.fp),
    recall: safeDiv(binary.tp, binary.tp + binary.fn),
    binary,
    confusion,
    mismatches,
    joined,
  }
}

/**
 * Ranked by precision desc, recall desc, threshold asc
 */
export function sweepThresholds(joined: JoinedRow[], thresholds: number[] = DEFAULT_SWEEP_THRESHOLDS): SweepRow[] {
  const rows = thresholds.map((threshold) => {
    const counts: BinaryCounts = { tp: 0, fp: 0, fn: 0, tn: 0 }
    for (const { human, prediction } of joined) {
      const visible = (prediction.discountPct ?? 0) >= SWEEP_MIN_VISIBLE_DISCOUNT
      tally(counts, POSITIVE_HUMAN.has(human.labelHuman), prediction.score >= threshold && visible)
    }
    return {
      threshold,
      precision: safeDiv(counts.tp, counts.tp + counts.fp),
      recall: safeDiv(counts.tp, counts.tp + counts.fn),
      accuracy: safeDiv(counts.tp + counts.tn, joined.length),
      tp: counts.tp,
      fp: counts.fp,
    }
  })

  return rows.sort((a, b) => b.precision - a.precision || b.recall - a.recall || a.threshold - b.threshold)
}

export function formatCalibrationReport(report: CalibrationReport, sweep: SweepRow[] = []): string {
  const lines = [
    'Calibration Summary',
    `- csv_rows: ${report.csvRows}`,
    `- matched_rows: ${report.matchedRows}`,
    `- missing_rows: ${report.missingRows}`,
    `- exact_match_accuracy: ${report.exactMatchAccuracy.toFixed(4)}`,
    `- positive_precision (REAL vs REAL/LIKELY_REAL): ${report.precision.toFixed(4)}`,
    `- positive_recall (REAL vs REAL/LIKELY_REAL): ${report.recall.toFixed(4)}`,
    '',
    'Binary Confusion (positive=human REAL, predicted REAL/LIKELY_REAL)',
    `- TP: ${report.binary.tp}`,
    `- FP: ${report.binary.fp}`,
    `- FN: ${report.binary.fn}`,
    `- TN: ${report.binary.tn}`,
    '',
    'Label Confusion Matrix (human -> predicted)',
  ]

  for (const human of Object.keys(report.confusion).sort()) {
    const counts = Object.entries(report.confusion[human] ?? {})
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([predicted, count]) => `${predicted}:${count}`)
    lines.push(`- ${human} -> ${counts.join(', ')}`)
  }

  if (report.mismatches.length > 0) {
    lines.push('', 'Mismatches', ...report.mismatches.map((m) => `- ${m}`))
  }

  const [best] = sweep
  if (best) {
    lines.push(
      '',
      `Threshold Sweep (positive if score >= t and visible discount >= ${SWEEP_MIN_VISIBLE_DISCOUNT})`,
      ...sweep.map(
        (row) =>
          `- t=${row.threshold.toFixed(2)} precision=${row.precision.toFixed(4)} recall=${row.recall.toFixed(4)}` +
          ` accuracy=${row.accuracy.toFixed(4)} tp=${row.tp} fp=${row.fp}`
      ),
      '',
      `Recommended threshold: ${best.threshold.toFixed(2)} (precision=${best.precision.toFixed(4)}, recall=${best.recall.toFixed(4)}, accuracy=${best.accuracy.toFixed(4)})`
    )
  }

  return lines.join('\n')
}
