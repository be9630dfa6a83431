/**
 * Row shapes as returned by node-postgres, and their mappers.
 *
 * INTEGER, DOUBLE PRECISION, BOOLEAN and TIMESTAMPTZ arrive typed; NUMERIC
 * arrives as a string; JSONB arrives parsed. Text columns guarded by CHECK
 * constraints are typed with their enumeration.
 */

import type {
  CanonicalCandidate,
  CanonicalProduct,
  DealLabel,
  DealRow,
  DiscountEvaluation,
  JsonObject,
  LatestPrediction,
  MatchMethod,
  MatchStatus,
  OfferError,
  PeerSnapshot,
  PendingMatch,
  PipelineRun,
  PriceSnapshot,
  ProductMatch,
  RawProduct,
  Retailer,
  RunStatus,
  SourceStatus,
} from '../types'

export interface RetailerRow {
  id: number
  name: string
  domain: string
  active: boolean
}

export function toRetailer(row: RetailerRow): Retailer {
  return { id: row.id, name: row.name, domain: row.domain, active: row.active }
}

export interface RawProductRow {
  id: number
  retailer_id: number
  retailer_product_id: string
  product_url: string
  title: string
  brand_raw: string | null
  size_raw: string | null
  category_raw: string | null
  image_url: string | null
  ean_raw: string | null
  first_seen_at: Date
  last_seen_at: Date
}

export function toRawProduct(row: RawProductRow): RawProduct {
  return {
    id: row.id,
    retailerId: row.retailer_id,
    retailerProductId: row.retailer_product_id,
    productUrl: row.product_url,
    title: row.title,
    brandRaw: row.brand_raw,
    sizeRaw: row.size_raw,
    categoryRaw: row.category_raw,
    imageUrl: row.image_url,
    eanRaw: row.ean_raw,
    firstSeenAt: row.first_seen_at,
    lastSeenAt: row.last_seen_at,
  }
}

export interface CanonicalRow {
  id: number
  canonical_name: string
  brand_norm: string
  size_value: number | null
  size_unit: string | null
  category_norm: string
  ean: string | null
  created_at: Date
}

export function toCanonical(row: CanonicalRow): CanonicalProduct {
  return {
    id: row.id,
    canonicalName: row.canonical_name,
    brandNorm: row.brand_norm,
    sizeValue: row.size_value,
    sizeUnit: row.size_unit,
    categoryNorm: row.category_norm,
    ean: row.ean,
    createdAt: row.created_at,
  }
}

export interface CandidateRow extends CanonicalRow {
  history_count: number
}

export function toCandidate(row: CandidateRow): CanonicalCandidate {
  return { ...toCanonical(row), historyCount: row.history_count }
}

export interface MatchRow {
  id: number
  product_raw_id: number
  product_canonical_id: number
  match_confidence: number
  match_method: MatchMethod
  matcher_version: string
  status: MatchStatus
  evidence: JsonObject
  pipeline_run_id: string | null
  superseded_at: Date | null
  created_at: Date
}

export function toMatch(row: MatchRow): ProductMatch {
  return {
    id: row.id,
    productRawId: row.product_raw_id,
    productCanonicalId: row.product_canonical_id,
    matchConfidence: row.match_confidence,
    matchMethod: row.match_method,
    matcherVersion: row.matcher_version,
    status: row.status,
    evidence: row.evidence,
    pipelineRunId: row.pipeline_run_id,
    supersededAt: row.superseded_at,
    createdAt: row.created_at,
  }
}

export interface PendingMatchRow {
  match_id: number
  product_raw_id: number
  title: string
  retailer_name: string
  product_canonical_id: number
  canonical_name: string
  match_confidence: number
  created_at: Date
}

export function toPendingMatch(row: PendingMatchRow): PendingMatch {
  return {
    matchId: row.match_id,
    productRawId: row.product_raw_id,
    title: row.title,
    retailerName: row.retailer_name,
    productCanonicalId: row.product_canonical_id,
    canonicalName: row.canonical_name,
    matchConfidence: row.match_confidence,
    createdAt: row.created_at,
  }
}

export interface SnapshotRow {
  id: number
  product_raw_id: number
  scraped_at: Date
  price_current: string
  price_list: string | null
  currency: string
  promo_text: string | null
  in_stock: boolean
  source_hash: string
}

function toNumberOrNull(value: string | null): number | null {
  return value === null ? null : Number(value)
}

export function toSnapshot(row: SnapshotRow): PriceSnapshot {
  return {
    id: row.id,
    productRawId: row.product_raw_id,
    scrapedAt: row.scraped_at,
    priceCurrent: Number(row.price_current),
    priceList: toNumberOrNull(row.price_list),
    currency: row.currency,
    promoText: row.promo_text,
    inStock: row.in_stock,
    sourceHash: row.source_hash,
  }
}

export interface PeerSnapshotRow extends SnapshotRow {
  retailer_id: number
}

export function toPeerSnapshot(row: PeerSnapshotRow): PeerSnapshot {
  return { ...toSnapshot(row), retailerId: row.retailer_id }
}

export interface EvaluationRow {
  id: number
  product_canonical_id: number
  retailer_id: number
  snapshot_id: number
  pipeline_run_id: string | null
  score: number
  label: DealLabel
  discount_pct: number | null
  hist_delta_pct: number | null
  cross_store_delta_pct: number | null
  anchor_anomaly_flag: boolean
  rule_trace: JsonObject
  scoring_version: string
  created_at: Date
}

export function toEvaluation(row: EvaluationRow): DiscountEvaluation {
  return {
    id: row.id,
    productCanonicalId: row.product_canonical_id,
    retailerId: row.retailer_id,
    snapshotId: row.snapshot_id,
    pipelineRunId: row.pipeline_run_id,
    score: row.score,
    label: row.label,
    discountPct: row.discount_pct,
    histDeltaPct: row.hist_delta_pct,
    crossStoreDeltaPct: row.cross_store_delta_pct,
    anchorAnomalyFlag: row.anchor_anomaly_flag,
    ruleTrace: row.rule_trace,
    scoringVersion: row.scoring_version,
    createdAt: row.created_at,
  }
}

export interface DealQueryRow {
  evaluation_id: number
  product_raw_id: number
  product_canonical_id: number
  title: string
  product_url: string
  image_url: string | null
  retailer_name: string
  retailer_domain: string
  canonical_name: string
  brand_norm: string
  category_norm: string
  price_current: string
  price_list: string | null
  currency: string
  scraped_at: Date
  score: number
  label: DealLabel
  discount_pct: number | null
  hist_delta_pct: number | null
  cross_store_delta_pct: number | null
  anchor_anomaly_flag: boolean
  rule_trace: JsonObject
  scoring_version: string
  evaluated_at: Date
}

export function toDeal(row: DealQueryRow): DealRow {
  return {
    evaluationId: row.evaluation_id,
    productRawId: row.product_raw_id,
    productCanonicalId: row.product_canonical_id,
    title: row.title,
    productUrl: row.product_url,
    imageUrl: row.image_url,
    retailerName: row.retailer_name,
    retailerDomain: row.retailer_domain,
    canonicalName: row.canonical_name,
    brandNorm: row.brand_norm,
    categoryNorm: row.category_norm,
    priceCurrent: Number(row.price_current),
    priceList: toNumberOrNull(row.price_list),
    currency: row.currency,
    scrapedAt: row.scraped_at,
    score: row.score,
    label: row.label,
    discountPct: row.discount_pct,
    histDeltaPct: row.hist_delta_pct,
    crossStoreDeltaPct: row.cross_store_delta_pct,
    anchorAnomalyFlag: row.anchor_anomaly_flag,
    ruleTrace: row.rule_trace,
    scoringVersion: row.scoring_version,
    evaluatedAt: row.evaluated_at,
  }
}

export interface PredictionQueryRow {
  product_url: string
  retailer_name: string
  retailer_domain: string
  label: DealLabel
  score: number
  discount_pct: number | null
  cross_store_delta_pct: number | null
}

export function toPrediction(row: PredictionQueryRow): LatestPrediction {
  return {
    productUrl: row.product_url,
    retailerName: row.retailer_name,
    retailerDomain: row.retailer_domain,
    label: row.label,
    score: row.score,
    discountPct: row.discount_pct,
    crossStoreDeltaPct: row.cross_store_delta_pct,
  }
}

export interface PipelineRunRow {
  id: string
  started_at: Date
  finished_at: Date
  status: RunStatus
  total_offers: number
  total_snapshots: number
  total_deduplicated: number
  total_evaluations: number
  total_pending_review: number
  total_offer_errors: number
  sources: Record<string, SourceStatus>
  offer_errors: OfferError[]
  scoring_version: string
  error_message: string | null
}

export function toPipelineRun(row: PipelineRunRow): PipelineRun {
  return {
    id: row.id,
    startedAt: row.started_at,
    finishedAt: row.finished_at,
    status: row.status,
    totalOffers: row.total_offers,
    totalSnapshots: row.total_snapshots,
    totalDeduplicated: row.total_deduplicated,
    totalEvaluations: row.total_evaluations,
    totalPendingReview: row.total_pending_review,
    totalOfferErrors: row.total_offer_errors,
    sources: row.sources,
    offerErrors: row.offer_errors,
    scoringVersion: row.scoring_version,
    errorMessage: row.error_message,
  }
}
