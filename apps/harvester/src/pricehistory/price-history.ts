/**
 * Price History Store
 *
 * Append-only snapshot log per raw product, on top of the db repositories.
 *
 * - An exact (raw product, scraped_at) repeat is a DuplicateSnapshotError
 *   carrying the stored snapshot.
 * - A snapshot whose source hash matches one within the dedupe window is
 *   not written; the stored snapshot is returned instead.
 */

import { createHash } from 'node:crypto'
import {
  DuplicateSnapshotError,
  type DealcheckStore,
  type PeerSnapshot,
  type PriceSnapshot,
  type RawProduct,
} from '@dealcheck/db'
import { logger } from '../config/logger'

const log = logger.pricehistory

const MINUTE_MS = 60_000
const DAY_MS = 24 * 60 * MINUTE_MS

export interface PriceHistoryConfig {
  dedupeWindowMinutes: number
  /** Default window for history() */
  lookbackDays: number
}

export const DEFAULT_PRICE_HISTORY_CONFIG: PriceHistoryConfig = {
  dedupeWindowMinutes: 15,
  lookbackDays: 90,
}

export interface SnapshotInput {
  scrapedAt: Date
  priceCurrent: number
  priceList: number | null
  currency: string
  promoText: string | null
  inStock: boolean
}

export type AppendResult =
  | { status: 'inserted'; snapshot: PriceSnapshot }
  | { status: 'deduplicated'; snapshot: PriceSnapshot }

/**
 * Compute the observation signature used for deduplication
 */
export function computeSourceHash(
  retailerProductId: string,
  snapshot: Pick<SnapshotInput, 'priceCurrent' | 'priceList' | 'promoText' | 'inStock'>
): string {
  const signatureData = JSON.stringify({
    retailerProductId,
    priceCurrent: snapshot.priceCurrent,
    priceList: snapshot.priceList,
    promoText: snapshot.promoText,
    inStock: snapshot.inStock,
  })
  return createHash('sha256').update(signatureData).digest('hex')
}

export interface PriceHistory {
  /** @throws DuplicateSnapshotError for an exact (raw product, scraped_at) repeat */
  append(rawProduct: Pick<RawProduct, 'id' | 'retailerProductId'>, snapshot: SnapshotInput): Promise<AppendResult>
  /** Snapshots in [until - lookbackDays, until), ascending */
  history(rawProductId: number, options: { until: Date; lookbackDays?: number }): Promise<PriceSnapshot[]>
  /** Latest snapshot per other-retailer listing of the canonical product */
  latestPeerPrices(
    productCanonicalId: number,
    options: { excludeRetailerId: number; since: Date; until: Date }
  ): Promise<PeerSnapshot[]>
}

export function createPriceHistory(
  store: DealcheckStore,
  config: PriceHistoryConfig = DEFAULT_PRICE_HISTORY_CONFIG
): PriceHistory {
  return {
    async append(rawProduct, snapshot) {
      const existing = await store.priceSnapshots.findByScrapedAt(rawProduct.id, snapshot.scrapedAt)
      if (existing) {
        throw new DuplicateSnapshotError(rawProduct.id, snapshot.scrapedAt, existing)
      }

      const sourceHash = computeSourceHash(rawProduct.retailerProductId, snapshot)
      const windowMs = config.dedupeWindowMinutes * MINUTE_MS
      const recent = await store.priceSnapshots.findByHashBetween(
        rawProduct.id,
        sourceHash,
        new Date(snapshot.scrapedAt.getTime() - windowMs),
        new Date(snapshot.scrapedAt.getTime() + windowMs)
      )

      if (recent) {
        log.debug('SNAPSHOT_DEDUPLICATED', {
          productRawId: rawProduct.id,
          scrapedAt: snapshot.scrapedAt.toISOString(),
          existingSnapshotId: recent.id,
          existingScrapedAt: recent.scrapedAt.toISOString(),
        })
        return { status: 'deduplicated', snapshot: recent }
      }

      const inserted = await store.priceSnapshots.insert({
        productRawId: rawProduct.id,
        sourceHash,
        ...snapshot,
      })
      return { status: 'inserted', snapshot: inserted }
    },

    async history(rawProductId, { until, lookbackDays = config.lookbackDays }) {
      const from = new Date(until.getTime() - lookbackDays * DAY_MS)
      return store.priceSnapshots.listBetween(rawProductId, from, until)
    },

    async latestPeerPrices(productCanonicalId, { excludeRetailerId, since, until }) {
      return store.priceSnapshots.latestPeerSnapshots({ productCanonicalId, excludeRetailerId, since, until })
    },
  }
}
