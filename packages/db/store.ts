/**
 * Repository contracts.
 *
 * The harvester and the API depend on these interfaces only. `createPgStore`
 * implements them on PostgreSQL; `createMemoryStore` (test-utils) implements
 * them in process for tests.
 */

import type {
  CanonicalCandidate,
  CanonicalProduct,
  DealFilter,
  DealRow,
  DiscountEvaluation,
  LatestPrediction,
  MatchStatus,
  NewCanonicalProduct,
  NewDiscountEvaluation,
  NewPriceSnapshot,
  NewProductMatch,
  PeerSnapshot,
  PendingMatch,
  PipelineRun,
  PriceSnapshot,
  ProductMatch,
  RawProduct,
  RawProductInput,
  Retailer,
} from './types'

export interface RetailerRepository {
  /** Insert by domain, or refresh the name of an existing retailer */
  upsertByDomain(input: { name: string; domain: string }): Promise<Retailer>
  findById(id: number): Promise<Retailer | null>
  findByDomain(domain: string): Promise<Retailer | null>
}

export interface RawProductRepository {
  /**
   * Insert or refresh by (retailer, retailer product id). `first_seen_at`
   * is set once; `last_seen_at` advances to `seenAt`.
   */
  upsert(input: RawProductInput): Promise<RawProduct>
  findById(id: number): Promise<RawProduct | null>
}

export interface CanonicalProductRepository {
  create(input: NewCanonicalProduct): Promise<CanonicalProduct>
  findById(id: number): Promise<CanonicalProduct | null>
  findByEan(ean: string, excludeIds: number[]): Promise<CanonicalCandidate[]>
  /** Canonical products sharing brand and category, excluding `excludeIds` */
  findCandidates(query: {
    brandNorm: string
    categoryNorm: string
    excludeIds: number[]
    limit: number
  }): Promise<CanonicalCandidate[]>
}

export interface ProductMatchRepository {
  /** The non-rejected, non-superseded match of a raw product */
  findActive(productRawId: number): Promise<ProductMatch | null>
  findById(id: number): Promise<ProductMatch | null>
  findRejectedCanonicalIds(productRawId: number): Promise<number[]>
  /**
   * Supersede the current active match (if any) and insert `input` as the
   * new active one.
   */
  record(input: NewProductMatch): Promise<ProductMatch>
  /**
   * Operator review of the active match: confirm pins it, reject excludes
   * the pairing. Throws NotFoundError for a superseded or rejected row.
   */
  setStatus(id: number, status: Extract<MatchStatus, 'MANUAL_CONFIRMED' | 'REJECTED'>): Promise<ProductMatch>
  listPendingReview(limit: number): Promise<PendingMatch[]>
}

export interface PriceSnapshotRepository {
  findById(id: number): Promise<PriceSnapshot | null>
  findByScrapedAt(productRawId: number, scrapedAt: Date): Promise<PriceSnapshot | null>
  /** A snapshot with the same hash scraped within [from, until] */
  findByHashBetween(productRawId: number, sourceHash: string, from: Date, until: Date): Promise<PriceSnapshot | null>
  /** @throws DuplicateSnapshotError when (raw product, scraped_at) exists */
  insert(input: NewPriceSnapshot): Promise<PriceSnapshot>
  /** Snapshots with scraped_at in [from, until), ascending */
  listBetween(productRawId: number, from: Date, until: Date): Promise<PriceSnapshot[]>
  /**
   * Latest snapshot (scraped_at in [since, until]) of every raw product at
   * another retailer whose active match points at the canonical product.
   */
  latestPeerSnapshots(query: {
    productCanonicalId: number
    excludeRetailerId: number
    since: Date
    until: Date
  }): Promise<PeerSnapshot[]>
}

export interface EvaluationRepository {
  /**
   * Insert unless an evaluation already exists for (snapshot, scoring
   * version). Returns `written: false` and the stored row in that case.
   */
  insertIfAbsent(input: NewDiscountEvaluation): Promise<{ written: boolean; evaluation: DiscountEvaluation }>
  findBySnapshot(snapshotId: number, scoringVersion: string): Promise<DiscountEvaluation | null>
  /** Latest evaluation per raw product, filtered, best score first */
  listDeals(filter: DealFilter): Promise<DealRow[]>
  /** Latest evaluation of every raw product, unfiltered and unlimited */
  listLatestPredictions(scoringVersion?: string): Promise<LatestPrediction[]>
}

export interface PipelineRunRepository {
  insert(run: PipelineRun): Promise<void>
  findLatest(): Promise<PipelineRun | null>
}

export interface DealcheckStore {
  retailers: RetailerRepository
  rawProducts: RawProductRepository
  canonicalProducts: CanonicalProductRepository
  productMatches: ProductMatchRepository
  priceSnapshots: PriceSnapshotRepository
  evaluations: EvaluationRepository
  pipelineRuns: PipelineRunRepository
  /**
   * Run `fn` atomically. Nested calls join the outer transaction.
   */
  transaction<T>(fn: (store: DealcheckStore) => Promise<T>): Promise<T>
}
