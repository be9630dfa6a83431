/**
 * Pipeline Run Summary
 *
 * One PIPELINE_RUN_SUMMARY event per run. On-call can filter logs by
 * `event_name: 'PIPELINE_RUN_SUMMARY'` to see every run.
 */

import type { PipelineRun } from '@dealcheck/db'
import { rootLogger } from './logger'

const log = rootLogger.child('run-summary')

// ═══════════════════════════════════════════════════════════════════════════════
// Types
// ═══════════════════════════════════════════════════════════════════════════════

export interface RunTiming {
  fetchMs: number
  ingestMs: number
  evaluateMs: number
}

export interface PipelineRunSummary {
  runId: string
  status: PipelineRun['status']
  durationMs: number
  timing: RunTiming
  input: {
    /** Offers received from live sources */
    totalOffers: number
    liveSources: number
    failedSources: string[]
  }
  output: {
    snapshotsWritten: number
    deduplicated: number
    evaluationsWritten: number
    pendingReview: number
  }
  errors: {
    count: number
    /** Error code distribution over the stored offer errors */
    codes: Record<string, number>
    message: string | null
  }
}

export function buildRunSummary(run: PipelineRun, timing: RunTiming): PipelineRunSummary {
  const codes: Record<string, number> = {}
  for (const error of run.offerErrors) {
    codes[error.code] = (codes[error.code] ?? 0) + 1
  }

  const sources = Object.entries(run.sources)
  return {
    runId: run.id,
    status: run.status,
    durationMs: run.finishedAt.getTime() - run.startedAt.getTime(),
    timing,
    input: {
      totalOffers: run.totalOffers,
      liveSources: sources.filter(([, s]) => s.source === 'live' && s.count > 0).length,
      failedSources: sources.filter(([, s]) => s.source === 'error' || s.count === 0).map(([domain]) => domain),
    },
    output: {
      snapshotsWritten: run.totalSnapshots,
      deduplicated: run.totalDeduplicated,
      evaluationsWritten: run.totalEvaluations,
      pendingReview: run.totalPendingReview,
    },
    errors: {
      count: run.totalOfferErrors,
      codes,
      message: run.errorMessage,
    },
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Logging
// ═══════════════════════════════════════════════════════════════════════════════

export function emitPipelineRunSummary(summary: PipelineRunSummary): void {
  const logLevel = summary.status === 'FAILED' ? 'error' : summary.errors.count > 0 ? 'warn' : 'info'

  log[logLevel]('PIPELINE_RUN_SUMMARY', {
    event_name: 'PIPELINE_RUN_SUMMARY',
    runId: summary.runId,
    status: summary.status,

    // Timing
    durationMs: summary.durationMs,
    timing: summary.timing,

    // Counts
    totalOffers: summary.input.totalOffers,
    liveSources: summary.input.liveSources,
    ...(summary.input.failedSources.length > 0 && { failedSources: summary.input.failedSources }),
    snapshotsWritten: summary.output.snapshotsWritten,
    deduplicated: summary.output.deduplicated,
    evaluationsWritten: summary.output.evaluationsWritten,
    pendingReview: summary.output.pendingReview,

    // Errors
    errorCount: summary.errors.count,
    ...(Object.keys(summary.errors.codes).length > 0 && { errorCodes: summary.errors.codes }),
    ...(summary.errors.message && { errorMessage: summary.errors.message }),

    // Derived
    evaluationRate:
      summary.input.totalOffers > 0
        ? ((summary.output.evaluationsWritten / summary.input.totalOffers) * 100).toFixed(2)
        : '0.00',
  })
}
