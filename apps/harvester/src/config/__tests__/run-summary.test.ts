import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import type { PipelineRun } from '@dealcheck/db'
import { configureLogger, resetLoggerConfiguration, type LogEntry } from '@dealcheck/logger'
import { buildRunSummary, emitPipelineRunSummary } from '../run-summary'

const timing = { fetchMs: 120, ingestMs: 300, evaluateMs: 80 }

function run(overrides: Partial<PipelineRun> = {}): PipelineRun {
  return {
    id: 'run-1',
    startedAt: new Date('2026-03-01T10:00:00Z'),
    finishedAt: new Date('2026-03-01T10:00:05Z'),
    status: 'SUCCESS',
    totalOffers: 4,
    totalSnapshots: 3,
    totalDeduplicated: 1,
    totalEvaluations: 3,
    totalPendingReview: 1,
    totalOfferErrors: 0,
    sources: {
      'tienda-uno.example': { name: 'Tienda Uno', source: 'live', count: 4, error: null },
    },
    offerErrors: [],
    scoringVersion: 'v1',
    errorMessage: null,
    ...overrides,
  }
}

describe('buildRunSummary', () => {
  it('splits live and failed sources and counts error codes', () => {
    const summary = buildRunSummary(
      run({
        status: 'FAILED',
        sources: {
          'tienda-uno.example': { name: 'Tienda Uno', source: 'live', count: 4, error: null },
          'tienda-dos.example': { name: 'Tienda Dos', source: 'live', count: 0, error: null },
          'tienda-tres.example': { name: 'Tienda Tres', source: 'error', count: 0, error: 'HTTP 503' },
        },
        totalOfferErrors: 2,
        offerErrors: [
          { retailer: 'tienda-uno.example', retailerProductId: 'a', stage: 'ingest', code: 'INVALID_PRICE', message: 'x' },
          { retailer: 'tienda-uno.example', retailerProductId: 'b', stage: 'ingest', code: 'INVALID_PRICE', message: 'y' },
        ],
      }),
      timing
    )

    expect(summary.durationMs).toBe(5000)
    expect(summary.input).toEqual({
      totalOffers: 4,
      liveSources: 1,
      failedSources: ['tienda-dos.example', 'tienda-tres.example'],
    })
    expect(summary.errors.codes).toEqual({ INVALID_PRICE: 2 })
  })
})

describe('emitPipelineRunSummary', () => {
  let entries: LogEntry[]

  beforeEach(() => {
    entries = []
    configureLogger({ level: 'debug', format: 'json', sink: (entry) => entries.push(entry) })
  })

  afterEach(() => {
    resetLoggerConfiguration()
  })

  it('logs a clean run at info with the evaluation rate', () => {
    emitPipelineRunSummary(buildRunSummary(run(), timing))

    expect(entries).toHaveLength(1)
    expect(entries[0]).toMatchObject({
      level: 'info',
      message: 'PIPELINE_RUN_SUMMARY',
      runId: 'run-1',
      evaluationsWritten: 3,
      evaluationRate: '75.00',
    })
    expect(entries[0].failedSources).toBeUndefined()
  })

  it('logs a failed run at error with its message', () => {
    emitPipelineRunSummary(buildRunSummary(run({ status: 'FAILED', errorMessage: 'Source failed' }), timing))

    expect(entries[0]).toMatchObject({ level: 'error', errorMessage: 'Source failed' })
  })
})
