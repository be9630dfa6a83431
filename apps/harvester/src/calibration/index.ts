/**
 * Label calibration: human labels vs stored predictions.
 */

import { readFile } from 'node:fs/promises'
import type { DealcheckStore } from '@dealcheck/db'
import { logger } from '../config/logger'
import { parseLabels } from './labels'
import { buildCalibrationReport, sweepThresholds, type CalibrationReport, type SweepRow } from './report'

const log = logger.calibration

export interface CalibrationResult {
  report: CalibrationReport
  sweep: SweepRow[]
}

export async function runCalibration(
  store: DealcheckStore,
  csvPath: string,
  options: { scoringVersion?: string; thresholds?: number[] } = {}
): Promise<CalibrationResult> {
  const labels = parseLabels(await readFile(csvPath, 'utf8'))
  const predictions = await store.evaluations.listLatestPredictions(options.scoringVersion)
  const report = buildCalibrationReport(labels, predictions)
  const sweep = report.joined.length > 0 ? sweepThresholds(report.joined, options.thresholds) : []

  log.info('CALIBRATION_COMPLETE', {
    csvPath,
    scoringVersion: options.scoringVersion ?? null,
    csvRows: report.csvRows,
    matchedRows: report.matchedRows,
    precision: report.precision,
    recall: report.recall,
    recommendedThreshold: sweep[0]?.threshold ?? null,
  })

  return { report, sweep }
}

export { parseLabels, CalibrationInputError, HUMAN_LABELS, type HumanLabel, type LabeledRow } from './labels'
export {
  buildCalibrationReport,
  DEFAULT_SWEEP_THRESHOLDS,
  formatCalibrationReport,
  sweepThresholds,
  type CalibrationReport,
  type SweepRow,
} from './report'
