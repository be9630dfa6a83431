import type { Queryable } from '../client'
import { DuplicateSnapshotError, isUniqueViolation, SNAPSHOT_UNIQUE_CONSTRAINT, mapPgError } from '../errors'
import type { PriceSnapshotRepository } from '../store'
import { queryOne, queryRows } from './query'
import { toPeerSnapshot, toSnapshot, type PeerSnapshotRow, type SnapshotRow } from './rows'

const COLUMNS = `s.id, s.product_raw_id, s.scraped_at, s.price_current, s.price_list, s.currency,
  s.promo_text, s.in_stock, s.source_hash`

export function createPriceSnapshotRepository(db: Queryable): PriceSnapshotRepository {
  async function findByScrapedAt(productRawId: number, scrapedAt: Date) {
    const row = await queryOne<SnapshotRow>(
      db,
      `SELECT ${COLUMNS} FROM price_snapshots s WHERE s.product_raw_id = $1 AND s.scraped_at = $2`,
      [productRawId, scrapedAt]
    )
    return row ? toSnapshot(row) : null
  }

  return {
    findByScrapedAt,

    async findById(id) {
      const row = await queryOne<SnapshotRow>(db, `SELECT ${COLUMNS} FROM price_snapshots s WHERE s.id = $1`, [id])
      return row ? toSnapshot(row) : null
    },

    async findByHashBetween(productRawId, sourceHash, from, until) {
      const row = await queryOne<SnapshotRow>(
        db,
        `SELECT ${COLUMNS} FROM price_snapshots s
         WHERE s.product_raw_id = $1 AND s.source_hash = $2 AND s.scraped_at BETWEEN $3 AND $4
         ORDER BY s.scraped_at DESC
         LIMIT 1`,
        [productRawId, sourceHash, from, until]
      )
      return row ? toSnapshot(row) : null
    },

    async insert(input) {
      try {
        const result = await db.query<SnapshotRow>(
          `INSERT INTO price_snapshots AS s (
             product_raw_id, scraped_at, price_current, price_list, currency, promo_text, in_stock, source_hash
           )
           VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
           RETURNING ${COLUMNS}`,
          [
            input.productRawId,
            input.scrapedAt,
            input.priceCurrent,
            input.priceList,
            input.currency,
            input.promoText,
            input.inStock,
            input.sourceHash,
          ]
        )
        const row = result.rows[0]
        if (!row) throw new Error(`Snapshot insert returned no row for raw product ${input.productRawId}`)
        return toSnapshot(row)
      } catch (error) {
        if (isUniqueViolation(error, SNAPSHOT_UNIQUE_CONSTRAINT)) {
          throw new DuplicateSnapshotError(input.productRawId, input.scrapedAt)
        }
        throw mapPgError(error)
      }
    },

    async listBetween(productRawId, from, until) {
      const rows = await queryRows<SnapshotRow>(
        db,
        `SELECT ${COLUMNS} FROM price_snapshots s
         WHERE s.product_raw_id = $1 AND s.scraped_at >= $2 AND s.scraped_at < $3
         ORDER BY s.scraped_at ASC, s.id ASC`,
        [productRawId, from, until]
      )
      return rows.map(toSnapshot)
    },

    async latestPeerSnapshots({ productCanonicalId, excludeRetailerId, since, until }) {
      const rows = await queryRows<PeerSnapshotRow>(
        db,
        `SELECT DISTINCT ON (s.product_raw_id) ${COLUMNS}, r.retailer_id
         FROM product_matches m
         JOIN products_raw r ON r.id = m.product_raw_id
         JOIN price_snapshots s ON s.product_raw_id = r.id
         WHERE m.product_canonical_id = $1
           AND m.superseded_at IS NULL
           AND m.status <> 'REJECTED'
           AND r.retailer_id <> $2
           AND s.scraped_at BETWEEN $3 AND $4
         ORDER BY s.product_raw_id, s.scraped_at DESC, s.id DESC`,
        [productCanonicalId, excludeRetailerId, since, until]
      )
      return rows.map(toPeerSnapshot)
    },
  }
}
