/**
 * Domain row types shared by the harvester and the API.
 *
 * Column names are snake_case in SQL; repositories map them to these
 * camelCase shapes.
 */

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue }

export type JsonObject = { [key: string]: JsonValue }

// =============================================================================
// Enumerations (mirrored by CHECK constraints in migrations/)
// =============================================================================

export const MATCH_STATUSES = [
  'AUTO_ACCEPTED',
  'PENDING_REVIEW',
  'MANUAL_CONFIRMED',
  'REJECTED',
] as const
export type MatchStatus = (typeof MATCH_STATUSES)[number]

export const MATCH_METHODS = ['exact-ean', 'fuzzy-token', 'manual', 'new-canonical'] as const
export type MatchMethod = (typeof MATCH_METHODS)[number]

/** Ordered from least to most credible */
export const DEAL_LABELS = ['LIKELY_FAKE', 'SUSPICIOUS', 'LIKELY_REAL', 'REAL'] as const
export type DealLabel = (typeof DEAL_LABELS)[number]

export type RunStatus = 'SUCCESS' | 'FAILED'

// =============================================================================
// Rows
// =============================================================================

export interface Retailer {
  id: number
  name: string
  domain: string
  active: boolean
}

export interface RawProduct {
  id: number
  retailerId: number
  retailerProductId: string
  productUrl: string
  title: string
  brandRaw: string | null
  sizeRaw: string | null
  categoryRaw: string | null
  imageUrl: string | null
  eanRaw: string | null
  firstSeenAt: Date
  lastSeenAt: Date
}

export type RawProductInput = Omit<RawProduct, 'id' | 'firstSeenAt' | 'lastSeenAt'> & {
  seenAt: Date
}

export interface CanonicalProduct {
  id: number
  canonicalName: string
  brandNorm: string
  sizeValue: number | null
  sizeUnit: string | null
  categoryNorm: string
  ean: string | null
  createdAt: Date
}

export type NewCanonicalProduct = Omit<CanonicalProduct, 'id' | 'createdAt'>

/**
 * Canonical product offered to the matcher, with the amount of price
 * history behind it (used for tie-breaking).
 */
export interface CanonicalCandidate extends CanonicalProduct {
  historyCount: number
}

export interface ProductMatch {
  id: number
  productRawId: number
  productCanonicalId: number
  matchConfidence: number
  matchMethod: MatchMethod
  matcherVersion: string
  status: MatchStatus
  evidence: JsonObject
  pipelineRunId: string | null
  supersededAt: Date | null
  createdAt: Date
}

export type NewProductMatch = Omit<ProductMatch, 'id' | 'supersededAt' | 'createdAt'>

export interface PriceSnapshot {
  id: number
  productRawId: number
  scrapedAt: Date
  priceCurrent: number
  priceList: number | null
  currency: string
  promoText: string | null
  inStock: boolean
  sourceHash: string
}

export type NewPriceSnapshot = Omit<PriceSnapshot, 'id'>

/** Latest snapshot of another retailer's listing of the same canonical product */
export interface PeerSnapshot extends PriceSnapshot {
  retailerId: number
}

export interface DiscountEvaluation {
  id: number
  productCanonicalId: number
  retailerId: number
  snapshotId: number
  pipelineRunId: string | null
  score: number
  label: DealLabel
  discountPct: number | null
  histDeltaPct: number | null
  crossStoreDeltaPct: number | null
  anchorAnomalyFlag: boolean
  ruleTrace: JsonObject
  scoringVersion: string
  createdAt: Date
}

export type NewDiscountEvaluation = Omit<DiscountEvaluation, 'id' | 'createdAt'>

export interface SourceStatus {
  name: string
  source: 'live' | 'error'
  count: number
  error: string | null
}

export interface OfferError {
  retailer: string
  retailerProductId: string
  stage: 'ingest' | 'evaluate'
  code: string
  message: string
}

export interface PipelineRun {
  id: string
  startedAt: Date
  finishedAt: Date
  status: RunStatus
  totalOffers: number
  totalSnapshots: number
  totalDeduplicated: number
  totalEvaluations: number
  totalPendingReview: number
  totalOfferErrors: number
  /** Keyed by retailer domain */
  sources: Record<string, SourceStatus>
  offerErrors: OfferError[]
  scoringVersion: string
  errorMessage: string | null
}

// =============================================================================
// Read models
// =============================================================================

export interface DealFilter {
  minScore?: number
  label?: DealLabel
  /** Retailer name or domain, exact match (case-insensitive) */
  retailer?: string
  /** Substring of the normalized brand */
  brand?: string
  minDiscount?: number
  /** Only deals cheaper than the other retailers' median */
  crossStoreOnly?: boolean
  scoringVersion?: string
  limit: number
}

export interface DealRow {
  evaluationId: number
  productRawId: number
  productCanonicalId: number
  title: string
  productUrl: string
  imageUrl: string | null
  retailerName: string
  retailerDomain: string
  canonicalName: string
  brandNorm: string
  categoryNorm: string
  priceCurrent: number
  priceList: number | null
  currency: string
  scrapedAt: Date
  score: number
  label: DealLabel
  discountPct: number | null
  histDeltaPct: number | null
  crossStoreDeltaPct: number | null
  anchorAnomalyFlag: boolean
  ruleTrace: JsonObject
  scoringVersion: string
  evaluatedAt: Date
}

/** The latest label of one listing, as compared against human labels */
export interface LatestPrediction {
  productUrl: string
  retailerName: string
  retailerDomain: string
  label: DealLabel
  score: number
  discountPct: number | null
  crossStoreDeltaPct: number | null
}

export interface PendingMatch {
  matchId: number
  productRawId: number
  title: string
  retailerName: string
  productCanonicalId: number
  canonicalName: string
  matchConfidence: number
  createdAt: Date
}
