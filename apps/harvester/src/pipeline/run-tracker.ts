/**
 * Pipeline Run Tracker
 *
 * Collects per-retailer source status, counters and per-offer errors for
 * one run, then writes the pipeline_runs row exactly once.
 */

import { randomUUID } from 'node:crypto'
import {
  DealcheckError,
  type OfferError,
  type PipelineRun,
  type PipelineRunRepository,
  type SourceStatus,
} from '@dealcheck/db'
import type { RetailerInfo } from '../sources/types'

export const MAX_OFFER_ERRORS = 50

export type RunCounter =
  | 'totalOffers'
  | 'totalSnapshots'
  | 'totalDeduplicated'
  | 'totalEvaluations'
  | 'totalPendingReview'

export class RunAlreadyFinishedError extends DealcheckError {
  constructor(runId: string) {
    super('RUN_ALREADY_FINISHED', `Pipeline run ${runId} has already been recorded`)
  }
}

function errorText(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

export interface RunTrackerOptions {
  scoringVersion: string
  runId?: string
  now?: () => Date
}

export class PipelineRunTracker {
  readonly runId: string
  readonly startedAt: Date
  readonly scoringVersion: string

  private readonly now: () => Date
  private readonly sources: Record<string, SourceStatus> = {}
  private readonly counters: Record<RunCounter, number> = {
    totalOffers: 0,
    totalSnapshots: 0,
    totalDeduplicated: 0,
    totalEvaluations: 0,
    totalPendingReview: 0,
  }
  private readonly offerErrors: OfferError[] = []
  private totalOfferErrors = 0
  private fatalError: string | null = null
  private finished: PipelineRun | null = null

  constructor(
    private readonly runs: PipelineRunRepository,
    options: RunTrackerOptions
  ) {
    this.now = options.now ?? (() => new Date())
    this.runId = options.runId ?? randomUUID()
    this.startedAt = this.now()
    this.scoringVersion = options.scoringVersion
  }

  recordSourceLive(retailer: RetailerInfo, count: number): void {
    this.sources[retailer.domain] = { name: retailer.name, source: 'live', count, error: null }
  }

  recordSourceError(retailer: RetailerInfo, error: unknown): void {
    this.sources[retailer.domain] = { name: retailer.name, source: 'error', count: 0, error: errorText(error) }
  }

  increment(counter: RunCounter, by = 1): void {
    this.counters[counter] += by
  }

  count(counter: RunCounter): number {
    return this.counters[counter]
  }

  /** Every error is counted; only the first MAX_OFFER_ERRORS are kept */
  recordOfferError(error: OfferError): void {
    this.totalOfferErrors++
    if (this.offerErrors.length < MAX_OFFER_ERRORS) {
      this.offerErrors.push(error)
    }
  }

  /** Mark the run FAILED regardless of source status */
  fail(error: unknown): void {
    this.fatalError ??= errorText(error)
  }

  /** Retailers that errored or returned nothing */
  failedSources(): Array<{ domain: string; error: string | null }> {
    return Object.entries(this.sources)
      .filter(([, status]) => status.source === 'error' || status.count === 0)
      .map(([domain, status]) => ({ domain, error: status.error }))
  }

  hasFailed(): boolean {
    return this.fatalError !== null || this.failedSources().length > 0 || Object.keys(this.sources).length === 0
  }

  get isFinished(): boolean {
    return this.finished !== null
  }

  private errorMessage(): string | null {
    if (this.fatalError !== null) return this.fatalError
    const failed = this.failedSources()
    if (failed.length > 0) return `Source failed: ${failed.map((s) => s.domain).join(', ')}`
    if (Object.keys(this.sources).length === 0) return 'No retailer sources configured'
    return null
  }

  /**
   * Compute the final status and persist the run.
   *
   * @throws RunAlreadyFinishedError on a second call
   */
  async finish(): Promise<PipelineRun> {
    if (this.finished) {
      throw new RunAlreadyFinishedError(this.runId)
    }

    const run: PipelineRun = {
      id: this.runId,
      startedAt: this.startedAt,
      finishedAt: this.now(),
      status: this.hasFailed() ? 'FAILED' : 'SUCCESS',
      ...this.counters,
      totalOfferErrors: this.totalOfferErrors,
      sources: { ...this.sources },
      offerErrors: [...this.offerErrors],
      scoringVersion: this.scoringVersion,
      errorMessage: this.errorMessage(),
    }

    // A second finish() is refused even when this insert fails
    this.finished = run
    await this.runs.insert(run)
    return run
  }
}
