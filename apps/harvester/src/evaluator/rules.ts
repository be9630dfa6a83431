/**
 * Rule Evaluator
 *
 * Computes the six credibility signals for one price snapshot from its own
 * history and from other retailers' prices for the same canonical product.
 *
 * Pure: the caller loads history and peers (see pipeline/run-pipeline.ts).
 */

import { absent, fromCondition, type RuleSignals } from './signals'
import { median, relativeDelta, roundTo } from './stats'

const DAY_MS = 24 * 60 * 60 * 1000

export interface RuleThresholds {
  /** R1 is true when hist_delta_pct is at or below this */
  histDeltaMax: number
  /** R1 needs this many prior snapshots */
  minPriorSnapshots: number
  /** R2 is true when anchor_spike_pct is below this */
  anchorSpikeMax: number
  /** R3 is true when cross_store_delta_pct is at or below this */
  crossStoreDeltaMax: number
  /** Peer snapshots scraped further than this from the current one are ignored */
  crossStoreMaxAgeDays: number
  /** R4: snapshots in the window, counting the current one */
  minSnapshots: number
  /** R5: days from the earliest prior snapshot to the current one */
  minHistorySpanDays: number
  /** R6 */
  minVisibleDiscount: number
  /** History window */
  lookbackDays: number
}

export interface PricePoint {
  scrapedAt: Date
  priceCurrent: number
  priceList: number | null
}

export interface PeerPrice {
  retailerId: number
  priceCurrent: number
  scrapedAt: Date
}

/**
 * Reduces peers to the most recent price of each retailer, so a retailer
 * listing the product twice is not counted twice.
 */
export function latestPerRetailer(peers: readonly PeerPrice[]): PeerPrice[] {
  const latest = new Map<number, PeerPrice>()
  for (const peer of peers) {
    const seen = latest.get(peer.retailerId)
    if (!seen || peer.scrapedAt.getTime() > seen.scrapedAt.getTime()) latest.set(peer.retailerId, peer)
  }
  return [...latest.values()]
}

export interface RuleInput {
  current: PricePoint
  /** Prior snapshots of the same raw product; anything not before `current` is ignored */
  history: PricePoint[]
  /** Latest price of every other listing of the canonical product, either side of `current` */
  peers: PeerPrice[]
}

export interface RuleMetrics {
  discountPct: number | null
  histDeltaPct: number | null
  crossStoreDeltaPct: number | null
  anchorSpikePct: number | null
  peerCount: number
  historyCount: number
  historySpanDays: number | null
}

export interface RuleEvaluation {
  signals: RuleSignals
  metrics: RuleMetrics
}

/**
 * Evaluate R1..R6 for one snapshot.
 *
 * Percentages are signed relative deltas rounded to 4 decimals, so a
 * price 10% below its reference is -0.1.
 */
export function evaluateRules(input: RuleInput, thresholds: RuleThresholds): RuleEvaluation {
  const { current } = input
  const history = input.history.filter((point) => point.scrapedAt < current.scrapedAt)

  // Peers from the same run may be scraped after the current snapshot
  const maxPeerAgeMs = thresholds.crossStoreMaxAgeDays * DAY_MS
  const peers = input.peers.filter(
    (peer) => Math.abs(peer.scrapedAt.getTime() - current.scrapedAt.getTime()) <= maxPeerAgeMs
  )

  // R6: visible discount
  const discountPct =
    current.priceList !== null && current.priceList > 0
      ? roundTo((current.priceList - current.priceCurrent) / current.priceList, 4)
      : null
  const r6 =
    discountPct === null
      ? absent('no list price')
      : fromCondition(discountPct >= thresholds.minVisibleDiscount, discountPct)

  // R1: current price against the trailing median
  const histDeltaPct =
    history.length >= thresholds.minPriorSnapshots
      ? relativeDelta(current.priceCurrent, median(history.map((point) => point.priceCurrent)))
      : null
  const r1 =
    history.length < thresholds.minPriorSnapshots
      ? absent(`${history.length} prior snapshots, need ${thresholds.minPriorSnapshots}`)
      : histDeltaPct === null
        ? absent('no positive historical median')
        : fromCondition(histDeltaPct <= thresholds.histDeltaMax, histDeltaPct)

  // R2: list price against its own history
  const priorListPrices = history
    .map((point) => point.priceList)
    .filter((price): price is number => price !== null)
  const anchorSpikePct =
    current.priceList !== null && priorListPrices.length > 0
      ? relativeDelta(current.priceList, median(priorListPrices))
      : null
  const r2 =
    current.priceList === null
      ? absent('no list price')
      : anchorSpikePct === null
        ? absent('no prior list price')
        : fromCondition(anchorSpikePct < thresholds.anchorSpikeMax, anchorSpikePct)

  // R3: current price against other retailers, one price each
  const peerPrices = latestPerRetailer(peers).map((peer) => peer.priceCurrent)
  const crossStoreDeltaPct =
    peerPrices.length > 0 ? relativeDelta(current.priceCurrent, median(peerPrices)) : null
  const r3 =
    peerPrices.length === 0
      ? absent('no peer retailer')
      : crossStoreDeltaPct === null
        ? absent('no positive peer median')
        : fromCondition(crossStoreDeltaPct <= thresholds.crossStoreDeltaMax, crossStoreDeltaPct)

  // R4: corroborated by more than one observation
  const snapshotCount = history.length + 1
  const r4 = fromCondition(snapshotCount >= thresholds.minSnapshots, snapshotCount)

  // R5: history spans enough days
  const earliest = Math.min(...history.map((point) => point.scrapedAt.getTime()))
  const historySpanDays = history.length > 0 ? roundTo((current.scrapedAt.getTime() - earliest) / DAY_MS, 2) : null
  const r5 =
    historySpanDays === null
      ? absent('no prior snapshot')
      : fromCondition(historySpanDays >= thresholds.minHistorySpanDays, historySpanDays)

  return {
    signals: { R1: r1, R2: r2, R3: r3, R4: r4, R5: r5, R6: r6 },
    metrics: {
      discountPct,
      histDeltaPct,
      crossStoreDeltaPct,
      anchorSpikePct,
      peerCount: peerPrices.length,
      historyCount: history.length,
      historySpanDays,
    },
  }
}
