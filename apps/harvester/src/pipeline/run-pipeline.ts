/**
 * Pipeline orchestration
 *
 * One run:
 *   1. Fetch every retailer source concurrently. Any failed or empty source
 *      fails the run and nothing is processed.
 *   2. Pass 1, per offer in one transaction: raw product upsert, normalize,
 *      resolve to a canonical product, append the price snapshot.
 *   3. Pass 2, per ingested offer: load history and peer prices, evaluate
 *      R1..R6, score, record the evaluation.
 *   4. Persist the pipeline_runs row, emit the run summary, send alerts.
 *
 * Pass 2 starts after pass 1 has finished so cross-store comparisons see
 * every retailer's price from this run.
 */

import {
  ConstraintViolationError,
  DealcheckError,
  DuplicateSnapshotError,
  type DealcheckStore,
  type PipelineRun,
  type PriceSnapshot,
  type RawProduct,
} from '@dealcheck/db'
import { withRequestContext } from '@dealcheck/logger'
import {
  notifyPipelineRunFailed,
  notifyPipelineRunRecovered,
  type PipelineRunAlertInfo,
  type SlackResult,
} from '@dealcheck/notifications'
import { logger } from '../config/logger'
import { buildRunSummary, emitPipelineRunSummary } from '../config/run-summary'
import { evaluateRules } from '../evaluator'
import { normalizeOffer } from '../normalizer'
import { createPriceHistory, DEFAULT_PRICE_HISTORY_CONFIG, type PriceHistoryConfig } from '../pricehistory'
import { resolveRawProduct, type ResolverDeps } from '../resolver'
import { DEFAULT_SCORING_VERSION, getScoringPolicy, scoreEvaluation, type ScoringPolicy } from '../scoring'
import type { RawOffer, RetailerInfo, RetailerSource } from '../sources/types'
import { recordEvaluation, type RecordEvaluationInput } from '../writer'
import { PipelineRunTracker } from './run-tracker'

const log = logger.pipeline

const DAY_MS = 24 * 60 * 60 * 1000

// ═══════════════════════════════════════════════════════════════════════════════
// Types
// ═══════════════════════════════════════════════════════════════════════════════

export interface PipelineAlerts {
  runFailed(run: PipelineRunAlertInfo): Promise<SlackResult>
  runRecovered(run: PipelineRunAlertInfo, previousFailedRunId: string): Promise<SlackResult>
}

export const slackPipelineAlerts: PipelineAlerts = {
  runFailed: notifyPipelineRunFailed,
  runRecovered: notifyPipelineRunRecovered,
}

export interface PipelineOptions {
  store: DealcheckStore
  sources: RetailerSource[]
  scoringVersion?: string
  resolver?: ResolverDeps
  priceHistory?: PriceHistoryConfig
  alerts?: PipelineAlerts
  runId?: string
  now?: () => Date
  signal?: AbortSignal
}

interface IngestedOffer {
  retailer: RetailerInfo
  retailerId: number
  rawProduct: RawProduct
  productCanonicalId: number
  snapshot: PriceSnapshot
}

interface FetchedSource {
  source: RetailerSource
  offers: RawOffer[]
}

function errorCode(error: unknown): string {
  return error instanceof DealcheckError ? error.code : 'UNEXPECTED_ERROR'
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

// ═══════════════════════════════════════════════════════════════════════════════
// Stage 1: fetch
// ═══════════════════════════════════════════════════════════════════════════════

async function fetchSources(
  sources: RetailerSource[],
  tracker: PipelineRunTracker,
  signal?: AbortSignal
): Promise<FetchedSource[]> {
  const settled = await Promise.allSettled(sources.map((source) => source.fetchOffers(signal)))
  const fetched: FetchedSource[] = []

  settled.forEach((outcome, index) => {
    const source = sources[index]
    if (!source) return
    const { retailer } = source

    if (outcome.status === 'rejected') {
      tracker.recordSourceError(retailer, outcome.reason)
      log.warn('SOURCE_FAILED', { retailer: retailer.domain, code: errorCode(outcome.reason) }, outcome.reason)
      return
    }

    tracker.recordSourceLive(retailer, outcome.value.length)
    if (outcome.value.length === 0) {
      log.warn('SOURCE_EMPTY', { retailer: retailer.domain })
    }
    fetched.push({ source, offers: outcome.value })
  })

  return fetched
}

// ═══════════════════════════════════════════════════════════════════════════════
// Stage 2: ingest (pass 1)
// ═══════════════════════════════════════════════════════════════════════════════

async function ingestOffer(
  store: DealcheckStore,
  retailer: RetailerInfo,
  retailerId: number,
  offer: RawOffer,
  options: { runId: string; resolver?: ResolverDeps; priceHistory: PriceHistoryConfig }
): Promise<{ ingested: IngestedOffer; deduplicated: boolean; pendingReview: boolean }> {
  return store.transaction(async (tx) => {
    const rawProduct = await tx.rawProducts.upsert({
      retailerId,
      retailerProductId: offer.retailerProductId,
      productUrl: offer.productUrl,
      title: offer.title,
      brandRaw: offer.brandRaw,
      sizeRaw: offer.sizeRaw,
      categoryRaw: offer.categoryRaw,
      imageUrl: offer.imageUrl,
      eanRaw: offer.eanRaw,
      seenAt: offer.scrapedAt,
    })

    const { match } = await resolveRawProduct(
      tx,
      { rawProduct, normalized: normalizeOffer(offer), pipelineRunId: options.runId },
      options.resolver
    )

    const history = createPriceHistory(tx, options.priceHistory)
    let snapshot: PriceSnapshot
    let deduplicated: boolean
    try {
      const appended = await history.append(rawProduct, {
        scrapedAt: offer.scrapedAt,
        priceCurrent: offer.priceCurrent,
        priceList: offer.priceList,
        currency: offer.currency,
        promoText: offer.promoText,
        inStock: offer.inStock,
      })
      snapshot = appended.snapshot
      deduplicated = appended.status === 'deduplicated'
    } catch (error) {
      if (!(error instanceof DuplicateSnapshotError) || !error.existing) throw error
      snapshot = error.existing
      deduplicated = true
    }

    return {
      ingested: { retailer, retailerId, rawProduct, productCanonicalId: match.productCanonicalId, snapshot },
      deduplicated,
      pendingReview: match.status === 'PENDING_REVIEW',
    }
  })
}

async function ingestAll(
  store: DealcheckStore,
  fetched: FetchedSource[],
  tracker: PipelineRunTracker,
  options: { resolver?: ResolverDeps; priceHistory: PriceHistoryConfig }
): Promise<IngestedOffer[]> {
  const ingested: IngestedOffer[] = []
  // One match per raw product per run: a listing repeated in a feed is ingested once
  const seenListings = new Set<string>()

  for (const { source, offers } of fetched) {
    const { retailer } = source
    const retailerRow = await store.retailers.upsertByDomain(retailer)

    for (const offer of offers) {
      const listingKey = `${retailerRow.id}:${offer.retailerProductId}`
      if (seenListings.has(listingKey)) {
        log.warn('OFFER_REPEATED_IN_FEED', { retailer: retailer.domain, retailerProductId: offer.retailerProductId })
        continue
      }
      seenListings.add(listingKey)

      try {
        const outcome = await ingestOffer(store, retailer, retailerRow.id, offer, {
          runId: tracker.runId,
          ...options,
        })
        ingested.push(outcome.ingested)
        tracker.increment(outcome.deduplicated ? 'totalDeduplicated' : 'totalSnapshots')
        if (outcome.pendingReview) tracker.increment('totalPendingReview')
      } catch (error) {
        if (error instanceof DuplicateSnapshotError) {
          // Lost a race with a concurrent writer; the stored snapshot stands
          tracker.increment('totalDeduplicated')
          continue
        }
        tracker.recordOfferError({
          retailer: retailer.domain,
          retailerProductId: offer.retailerProductId,
          stage: 'ingest',
          code: errorCode(error),
          message: errorMessage(error),
        })
        log.error(
          'OFFER_INGEST_FAILED',
          { retailer: retailer.domain, retailerProductId: offer.retailerProductId, code: errorCode(error) },
          error
        )
      }
    }
  }

  return ingested
}

// ═══════════════════════════════════════════════════════════════════════════════
// Stage 3: evaluate (pass 2)
// ═══════════════════════════════════════════════════════════════════════════════

async function scoreOffer(
  store: DealcheckStore,
  offer: IngestedOffer,
  policy: ScoringPolicy,
  options: { runId: string; priceHistory: PriceHistoryConfig }
): Promise<RecordEvaluationInput> {
  const { snapshot } = offer
  const history = createPriceHistory(store, options.priceHistory)
  const maxPeerAgeMs = policy.rules.crossStoreMaxAgeDays * DAY_MS

  const [prior, peers] = await Promise.all([
    history.history(offer.rawProduct.id, { until: snapshot.scrapedAt, lookbackDays: policy.rules.lookbackDays }),
    history.latestPeerPrices(offer.productCanonicalId, {
      excludeRetailerId: offer.retailerId,
      since: new Date(snapshot.scrapedAt.getTime() - maxPeerAgeMs),
      until: new Date(snapshot.scrapedAt.getTime() + maxPeerAgeMs),
    }),
  ])

  const evaluation = evaluateRules(
    {
      current: snapshot,
      history: prior,
      peers: peers.map((peer) => ({
        retailerId: peer.retailerId,
        priceCurrent: peer.priceCurrent,
        scrapedAt: peer.scrapedAt,
      })),
    },
    policy.rules
  )

  return {
    productCanonicalId: offer.productCanonicalId,
    retailerId: offer.retailerId,
    snapshotId: snapshot.id,
    pipelineRunId: options.runId,
    result: scoreEvaluation(evaluation, policy),
  }
}

/**
 * Scores every ingested offer, then writes all evaluations in one
 * transaction. A ConstraintViolationError while writing rolls back the
 * whole batch and fails the run.
 */
async function evaluateAll(
  store: DealcheckStore,
  ingested: IngestedOffer[],
  policy: ScoringPolicy,
  tracker: PipelineRunTracker,
  priceHistory: PriceHistoryConfig
): Promise<void> {
  // A snapshot deduplicated twice in one run is evaluated once
  const seen = new Set<number>()
  const scored: RecordEvaluationInput[] = []

  for (const offer of ingested) {
    if (seen.has(offer.snapshot.id)) continue
    seen.add(offer.snapshot.id)

    try {
      scored.push(await scoreOffer(store, offer, policy, { runId: tracker.runId, priceHistory }))
    } catch (error) {
      tracker.recordOfferError({
        retailer: offer.retailer.domain,
        retailerProductId: offer.rawProduct.retailerProductId,
        stage: 'evaluate',
        code: errorCode(error),
        message: errorMessage(error),
      })
      log.error(
        'OFFER_EVALUATION_FAILED',
        { retailer: offer.retailer.domain, snapshotId: offer.snapshot.id, code: errorCode(error) },
        error
      )
    }
  }

  try {
    const written = await store.transaction(async (tx) => {
      let count = 0
      for (const input of scored) {
        const outcome = await recordEvaluation(tx, input)
        if (outcome.written) count++
      }
      return count
    })
    tracker.increment('totalEvaluations', written)
  } catch (error) {
    if (!(error instanceof ConstraintViolationError)) throw error
    // The recorder found the database inconsistent; nothing from this run is kept
    tracker.fail(error)
    log.error(
      'EVALUATION_CONSTRAINT_VIOLATION',
      { constraint: error.constraint, rolledBack: scored.length },
      error
    )
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Alerts
// ═══════════════════════════════════════════════════════════════════════════════

function toAlertInfo(run: PipelineRun): PipelineRunAlertInfo {
  return {
    runId: run.id,
    startedAt: run.startedAt,
    finishedAt: run.finishedAt,
    totalOffers: run.totalOffers,
    totalOfferErrors: run.totalOfferErrors,
    errorMessage: run.errorMessage,
    failedSources: Object.entries(run.sources)
      .filter(([, s]) => s.source === 'error' || s.count === 0)
      .map(([domain, s]) => ({ domain, error: s.error })),
  }
}

async function sendRunAlerts(run: PipelineRun, previous: PipelineRun | null, alerts: PipelineAlerts): Promise<void> {
  try {
    let result: SlackResult | null = null
    if (run.status === 'FAILED') {
      result = await alerts.runFailed(toAlertInfo(run))
    } else if (previous?.status === 'FAILED') {
      result = await alerts.runRecovered(toAlertInfo(run), previous.id)
    }
    if (result && !result.success) {
      log.warn('RUN_ALERT_NOT_DELIVERED', { runId: run.id, error: result.error })
    }
  } catch (error) {
    // Alert delivery never changes the run outcome
    log.error('RUN_ALERT_FAILED', { runId: run.id }, error)
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Run
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Execute one pipeline run and return its persisted record.
 *
 * @throws UnknownScoringVersionError before anything is written
 */
export async function runPipeline(options: PipelineOptions): Promise<PipelineRun> {
  const policy = getScoringPolicy(options.scoringVersion ?? DEFAULT_SCORING_VERSION)
  const priceHistory = options.priceHistory ?? DEFAULT_PRICE_HISTORY_CONFIG
  const alerts = options.alerts ?? slackPipelineAlerts
  const { store } = options

  const previous = await store.pipelineRuns.findLatest()
  const tracker = new PipelineRunTracker(store.pipelineRuns, {
    scoringVersion: policy.version,
    runId: options.runId,
    now: options.now,
  })

  return withRequestContext({ runId: tracker.runId }, async () => {
    log.info('PIPELINE_RUN_START', {
      scoringVersion: policy.version,
      sources: options.sources.map((s) => s.retailer.domain),
    })

    const timing = { fetchMs: 0, ingestMs: 0, evaluateMs: 0 }
    try {
      let stageStart = Date.now()
      const fetched = await fetchSources(options.sources, tracker, options.signal)
      tracker.increment(
        'totalOffers',
        fetched.reduce((sum, f) => sum + f.offers.length, 0)
      )
      timing.fetchMs = Date.now() - stageStart

      if (tracker.hasFailed()) {
        log.warn('PIPELINE_SKIPPED', { reason: 'source failure', failedSources: tracker.failedSources() })
      } else {
        stageStart = Date.now()
        const ingested = await ingestAll(store, fetched, tracker, { resolver: options.resolver, priceHistory })
        timing.ingestMs = Date.now() - stageStart

        stageStart = Date.now()
        await evaluateAll(store, ingested, policy, tracker, priceHistory)
        timing.evaluateMs = Date.now() - stageStart
      }
    } catch (error) {
      tracker.fail(error)
      log.error('PIPELINE_RUN_ERROR', { code: errorCode(error) }, error)
    }

    const run = await tracker.finish()
    emitPipelineRunSummary(buildRunSummary(run, timing))
    await sendRunAlerts(run, previous, alerts)
    return run
  })
}
