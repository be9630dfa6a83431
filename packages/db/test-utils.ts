/**
 * In-process DealcheckStore for tests.
 *
 * Mirrors the constraints of migrations/001_init.sql that the services rely
 * on: foreign keys, the (raw product, scraped_at) and (snapshot, scoring
 * version) uniqueness, and the single active match per raw product.
 * Transactions snapshot the tables and restore them on error.
 */

import { ConstraintViolationError, DuplicateSnapshotError, NotFoundError } from './errors'
import { MAX_DEALS_LIMIT } from './repositories/evaluations'
import type { DealcheckStore } from './store'
import {
  DEAL_LABELS,
  MATCH_STATUSES,
  type CanonicalCandidate,
  type CanonicalProduct,
  type DealRow,
  type DiscountEvaluation,
  type PeerSnapshot,
  type PipelineRun,
  type PriceSnapshot,
  type ProductMatch,
  type RawProduct,
  type Retailer,
} from './types'

export interface MemoryTables {
  retailers: Retailer[]
  rawProducts: RawProduct[]
  canonicalProducts: CanonicalProduct[]
  productMatches: ProductMatch[]
  priceSnapshots: PriceSnapshot[]
  evaluations: DiscountEvaluation[]
  pipelineRuns: PipelineRun[]
}

export interface MemoryStore extends DealcheckStore {
  /** Live view of the tables, for assertions */
  readonly tables: MemoryTables
}

function emptyTables(): MemoryTables {
  return {
    retailers: [],
    rawProducts: [],
    canonicalProducts: [],
    productMatches: [],
    priceSnapshots: [],
    evaluations: [],
    pipelineRuns: [],
  }
}

function nextId(rows: { id: number }[]): number {
  return rows.reduce((max, row) => Math.max(max, row.id), 0) + 1
}

const copy = <T>(value: T): T => structuredClone(value)

export function createMemoryStore(options: { now?: () => Date } = {}): MemoryStore {
  const now = options.now ?? (() => new Date())
  let tables = emptyTables()
  let depth = 0

  const isActive = (m: ProductMatch) => m.supersededAt === null && m.status !== 'REJECTED'

  function requireRow<T extends { id: number }>(rows: T[], id: number, table: string): T {
    const row = rows.find((r) => r.id === id)
    if (!row) {
      throw new ConstraintViolationError(`Key (id)=(${id}) is not present in table "${table}".`)
    }
    return row
  }

  function latestDeals(scoringVersion: string | undefined): DealRow[] {
    const latestByRaw = new Map<number, { evaluation: DiscountEvaluation; snapshot: PriceSnapshot }>()
    for (const evaluation of tables.evaluations) {
      if (scoringVersion !== undefined && evaluation.scoringVersion !== scoringVersion) continue
      const snapshot = requireRow(tables.priceSnapshots, evaluation.snapshotId, 'price_snapshots')
      const current = latestByRaw.get(snapshot.productRawId)
      const newer =
        !current ||
        snapshot.scrapedAt > current.snapshot.scrapedAt ||
        (snapshot.scrapedAt.getTime() === current.snapshot.scrapedAt.getTime() &&
          evaluation.id > current.evaluation.id)
      if (newer) latestByRaw.set(snapshot.productRawId, { evaluation, snapshot })
    }

    const rows: DealRow[] = []
    for (const { evaluation: e, snapshot: s } of latestByRaw.values()) {
      const raw = requireRow(tables.rawProducts, s.productRawId, 'products_raw')
      const retailer = requireRow(tables.retailers, raw.retailerId, 'retailers')
      const canonical = requireRow(tables.canonicalProducts, e.productCanonicalId, 'products_canonical')
      rows.push({
        evaluationId: e.id,
        productRawId: raw.id,
        productCanonicalId: canonical.id,
        title: raw.title,
        productUrl: raw.productUrl,
        imageUrl: raw.imageUrl,
        retailerName: retailer.name,
        retailerDomain: retailer.domain,
        canonicalName: canonical.canonicalName,
        brandNorm: canonical.brandNorm,
        categoryNorm: canonical.categoryNorm,
        priceCurrent: s.priceCurrent,
        priceList: s.priceList,
        currency: s.currency,
        scrapedAt: s.scrapedAt,
        score: e.score,
        label: e.label,
        discountPct: e.discountPct,
        histDeltaPct: e.histDeltaPct,
        crossStoreDeltaPct: e.crossStoreDeltaPct,
        anchorAnomalyFlag: e.anchorAnomalyFlag,
        ruleTrace: copy(e.ruleTrace),
        scoringVersion: e.scoringVersion,
        evaluatedAt: e.createdAt,
      })
    }
    return rows
  }

  function historyCount(canonicalId: number): number {
    const rawIds = new Set(
      tables.productMatches.filter((m) => m.productCanonicalId === canonicalId && isActive(m)).map((m) => m.productRawId)
    )
    return tables.priceSnapshots.filter((s) => rawIds.has(s.productRawId)).length
  }

  function toCandidate(c: CanonicalProduct): CanonicalCandidate {
    return { ...copy(c), historyCount: historyCount(c.id) }
  }

  const store: MemoryStore = {
    get tables() {
      return tables
    },

    retailers: {
      async upsertByDomain({ name, domain }) {
        const existing = tables.retailers.find((r) => r.domain === domain)
        if (existing) {
          existing.name = name
          return copy(existing)
        }
        const row: Retailer = { id: nextId(tables.retailers), name, domain, active: true }
        tables.retailers.push(row)
        return copy(row)
      },
      async findById(id) {
        const row = tables.retailers.find((r) => r.id === id)
        return row ? copy(row) : null
      },
      async findByDomain(domain) {
        const row = tables.retailers.find((r) => r.domain === domain)
        return row ? copy(row) : null
      },
    },

    rawProducts: {
      async upsert(input) {
        requireRow(tables.retailers, input.retailerId, 'retailers')
        const { seenAt, ...fields } = input
        const existing = tables.rawProducts.find(
          (r) => r.retailerId === input.retailerId && r.retailerProductId === input.retailerProductId
        )
        if (existing) {
          Object.assign(existing, fields)
          if (seenAt > existing.lastSeenAt) existing.lastSeenAt = seenAt
          return copy(existing)
        }
        const row: RawProduct = {
          id: nextId(tables.rawProducts),
          ...fields,
          firstSeenAt: seenAt,
          lastSeenAt: seenAt,
        }
        tables.rawProducts.push(row)
        return copy(row)
      },
      async findById(id) {
        const row = tables.rawProducts.find((r) => r.id === id)
        return row ? copy(row) : null
      },
    },

    canonicalProducts: {
      async create(input) {
        const row: CanonicalProduct = { id: nextId(tables.canonicalProducts), ...input, createdAt: now() }
        tables.canonicalProducts.push(row)
        return copy(row)
      },
      async findById(id) {
        const row = tables.canonicalProducts.find((c) => c.id === id)
        return row ? copy(row) : null
      },
      async findByEan(ean, excludeIds) {
        return tables.canonicalProducts
          .filter((c) => c.ean === ean && !excludeIds.includes(c.id))
          .sort((a, b) => a.id - b.id)
          .map(toCandidate)
      },
      async findCandidates({ brandNorm, categoryNorm, excludeIds, limit }) {
        return tables.canonicalProducts
          .filter((c) => c.brandNorm === brandNorm && c.categoryNorm === categoryNorm && !excludeIds.includes(c.id))
          .sort((a, b) => a.id - b.id)
          .slice(0, limit)
          .map(toCandidate)
      },
    },

    productMatches: {
      async findActive(productRawId) {
        const row = tables.productMatches.find((m) => m.productRawId === productRawId && isActive(m))
        return row ? copy(row) : null
      },
      async findById(id) {
        const row = tables.productMatches.find((m) => m.id === id)
        return row ? copy(row) : null
      },
      async findRejectedCanonicalIds(productRawId) {
        const ids = tables.productMatches
          .filter((m) => m.productRawId === productRawId && m.status === 'REJECTED')
          .map((m) => m.productCanonicalId)
        return [...new Set(ids)].sort((a, b) => a - b)
      },
      async record(input) {
        requireRow(tables.rawProducts, input.productRawId, 'products_raw')
        requireRow(tables.canonicalProducts, input.productCanonicalId, 'products_canonical')
        if (!MATCH_STATUSES.includes(input.status)) {
          throw new ConstraintViolationError(`Invalid match status ${input.status}`, 'product_matches_status_check')
        }
        const timestamp = now()
        for (const m of tables.productMatches) {
          if (m.productRawId === input.productRawId && isActive(m)) m.supersededAt = timestamp
        }
        const row: ProductMatch = {
          id: nextId(tables.productMatches),
          ...copy(input),
          supersededAt: null,
          createdAt: timestamp,
        }
        tables.productMatches.push(row)
        return copy(row)
      },
      async setStatus(id, status) {
        const row = tables.productMatches.find((m) => m.id === id && isActive(m))
        if (!row) throw new NotFoundError('Active ProductMatch', id)
        row.status = status
        return copy(row)
      },
      async listPendingReview(limit) {
        return tables.productMatches
          .filter((m) => m.status === 'PENDING_REVIEW' && m.supersededAt === null)
          .sort((a, b) => b.matchConfidence - a.matchConfidence || a.id - b.id)
          .slice(0, limit)
          .map((m) => {
            const raw = requireRow(tables.rawProducts, m.productRawId, 'products_raw')
            const retailer = requireRow(tables.retailers, raw.retailerId, 'retailers')
            const canonical = requireRow(tables.canonicalProducts, m.productCanonicalId, 'products_canonical')
            return {
              matchId: m.id,
              productRawId: m.productRawId,
              title: raw.title,
              retailerName: retailer.name,
              productCanonicalId: canonical.id,
              canonicalName: canonical.canonicalName,
              matchConfidence: m.matchConfidence,
              createdAt: m.createdAt,
            }
          })
      },
    },

    priceSnapshots: {
      async findById(id) {
        const row = tables.priceSnapshots.find((s) => s.id === id)
        return row ? copy(row) : null
      },
      async findByScrapedAt(productRawId, scrapedAt) {
        const row = tables.priceSnapshots.find(
          (s) => s.productRawId === productRawId && s.scrapedAt.getTime() === scrapedAt.getTime()
        )
        return row ? copy(row) : null
      },
      async findByHashBetween(productRawId, sourceHash, from, until) {
        const rows = tables.priceSnapshots
          .filter(
            (s) =>
              s.productRawId === productRawId &&
              s.sourceHash === sourceHash &&
              s.scrapedAt >= from &&
              s.scrapedAt <= until
          )
          .sort((a, b) => b.scrapedAt.getTime() - a.scrapedAt.getTime())
        return rows[0] ? copy(rows[0]) : null
      },
      async insert(input) {
        requireRow(tables.rawProducts, input.productRawId, 'products_raw')
        const clash = tables.priceSnapshots.some(
          (s) => s.productRawId === input.productRawId && s.scrapedAt.getTime() === input.scrapedAt.getTime()
        )
        if (clash) throw new DuplicateSnapshotError(input.productRawId, input.scrapedAt)
        const row: PriceSnapshot = { id: nextId(tables.priceSnapshots), ...copy(input) }
        tables.priceSnapshots.push(row)
        return copy(row)
      },
      async listBetween(productRawId, from, until) {
        return tables.priceSnapshots
          .filter((s) => s.productRawId === productRawId && s.scrapedAt >= from && s.scrapedAt < until)
          .sort((a, b) => a.scrapedAt.getTime() - b.scrapedAt.getTime() || a.id - b.id)
          .map(copy)
      },
      async latestPeerSnapshots({ productCanonicalId, excludeRetailerId, since, until }) {
        const peers: PeerSnapshot[] = []
        for (const match of tables.productMatches) {
          if (match.productCanonicalId !== productCanonicalId || !isActive(match)) continue
          const raw = tables.rawProducts.find((r) => r.id === match.productRawId)
          if (!raw || raw.retailerId === excludeRetailerId) continue
          const latest = tables.priceSnapshots
            .filter((s) => s.productRawId === raw.id && s.scrapedAt >= since && s.scrapedAt <= until)
            .sort((a, b) => b.scrapedAt.getTime() - a.scrapedAt.getTime() || b.id - a.id)[0]
          if (latest) peers.push({ ...copy(latest), retailerId: raw.retailerId })
        }
        return peers.sort((a, b) => a.productRawId - b.productRawId)
      },
    },

    evaluations: {
      async insertIfAbsent(input) {
        requireRow(tables.canonicalProducts, input.productCanonicalId, 'products_canonical')
        requireRow(tables.retailers, input.retailerId, 'retailers')
        requireRow(tables.priceSnapshots, input.snapshotId, 'price_snapshots')
        if (!DEAL_LABELS.includes(input.label)) {
          throw new ConstraintViolationError(`Invalid label ${input.label}`, 'discount_evaluations_label_check')
        }
        const existing = tables.evaluations.find(
          (e) => e.snapshotId === input.snapshotId && e.scoringVersion === input.scoringVersion
        )
        if (existing) return { written: false, evaluation: copy(existing) }

        const row: DiscountEvaluation = { id: nextId(tables.evaluations), ...copy(input), createdAt: now() }
        tables.evaluations.push(row)
        return { written: true, evaluation: copy(row) }
      },
      async findBySnapshot(snapshotId, scoringVersion) {
        const row = tables.evaluations.find((e) => e.snapshotId === snapshotId && e.scoringVersion === scoringVersion)
        return row ? copy(row) : null
      },
      async listLatestPredictions(scoringVersion) {
        return latestDeals(scoringVersion).map((d) => ({
          productUrl: d.productUrl,
          retailerName: d.retailerName,
          retailerDomain: d.retailerDomain,
          label: d.label,
          score: d.score,
          discountPct: d.discountPct,
          crossStoreDeltaPct: d.crossStoreDeltaPct,
        }))
      },
      async listDeals(filter) {
        const rows = latestDeals(filter.scoringVersion)
        const retailer = filter.retailer?.toLowerCase()
        const brand = filter.brand?.toLowerCase()
        return rows
          .filter((d) => filter.minScore === undefined || d.score >= filter.minScore)
          .filter((d) => filter.label === undefined || d.label === filter.label)
          .filter(
            (d) =>
              retailer === undefined ||
              d.retailerName.toLowerCase() === retailer ||
              d.retailerDomain.toLowerCase() === retailer
          )
          .filter((d) => brand === undefined || d.brandNorm.includes(brand))
          .filter((d) => filter.minDiscount === undefined || (d.discountPct !== null && d.discountPct >= filter.minDiscount))
          .filter((d) => !filter.crossStoreOnly || (d.crossStoreDeltaPct !== null && d.crossStoreDeltaPct < 0))
          .sort(
            (a, b) =>
              b.score - a.score ||
              (b.discountPct ?? Number.NEGATIVE_INFINITY) - (a.discountPct ?? Number.NEGATIVE_INFINITY) ||
              a.evaluationId - b.evaluationId
          )
          .slice(0, Math.min(Math.max(filter.limit, 1), MAX_DEALS_LIMIT))
      },
    },

    pipelineRuns: {
      async insert(run) {
        if (tables.pipelineRuns.some((r) => r.id === run.id)) {
          throw new ConstraintViolationError(`Key (id)=(${run.id}) already exists.`, 'pipeline_runs_pkey')
        }
        tables.pipelineRuns.push(copy(run))
      },
      async findLatest() {
        const [latest] = [...tables.pipelineRuns].reverse().sort((a, b) => b.startedAt.getTime() - a.startedAt.getTime())
        return latest ? copy(latest) : null
      },
    },

    async transaction(fn) {
      if (depth > 0) return fn(store)
      const backup = copy(tables)
      depth += 1
      try {
        return await fn(store)
      } catch (error) {
        tables = backup
        throw error
      } finally {
        depth -= 1
      }
    },
  }

  return store
}
