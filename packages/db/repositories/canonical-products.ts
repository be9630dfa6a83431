import type { Queryable } from '../client'
import type { CanonicalProductRepository } from '../store'
import { queryOne, queryRows } from './query'
import { toCandidate, toCanonical, type CandidateRow, type CanonicalRow } from './rows'

const COLUMNS = 'c.id, c.canonical_name, c.brand_norm, c.size_value, c.size_unit, c.category_norm, c.ean, c.created_at'

// Snapshot count across the raw products actively matched to the canonical
const HISTORY_COUNT = `(
  SELECT COUNT(*)::int
  FROM product_matches m
  JOIN price_snapshots s ON s.product_raw_id = m.product_raw_id
  WHERE m.product_canonical_id = c.id
    AND m.superseded_at IS NULL
    AND m.status <> 'REJECTED'
) AS history_count`

export function createCanonicalProductRepository(db: Queryable): CanonicalProductRepository {
  return {
    async create(input) {
      const row = await queryOne<CanonicalRow>(
        db,
        `INSERT INTO products_canonical AS c (canonical_name, brand_norm, size_value, size_unit, category_norm, ean)
         VALUES ($1, $2, $3, $4, $5, $6)
         RETURNING ${COLUMNS}`,
        [input.canonicalName, input.brandNorm, input.sizeValue, input.sizeUnit, input.categoryNorm, input.ean]
      )
      if (!row) throw new Error(`Canonical product insert returned no row for ${input.canonicalName}`)
      return toCanonical(row)
    },

    async findById(id) {
      const row = await queryOne<CanonicalRow>(db, `SELECT ${COLUMNS} FROM products_canonical c WHERE c.id = $1`, [id])
      return row ? toCanonical(row) : null
    },

    async findByEan(ean, excludeIds) {
      const rows = await queryRows<CandidateRow>(
        db,
        `SELECT ${COLUMNS}, ${HISTORY_COUNT}
         FROM products_canonical c
         WHERE c.ean = $1 AND NOT (c.id = ANY($2::int[]))
         ORDER BY c.id`,
        [ean, excludeIds]
      )
      return rows.map(toCandidate)
    },

    async findCandidates({ brandNorm, categoryNorm, excludeIds, limit }) {
      const rows = await queryRows<CandidateRow>(
        db,
        `SELECT ${COLUMNS}, ${HISTORY_COUNT}
         FROM products_canonical c
         WHERE c.brand_norm = $1 AND c.category_norm = $2 AND NOT (c.id = ANY($3::int[]))
         ORDER BY c.id
         LIMIT $4`,
        [brandNorm, categoryNorm, excludeIds, limit]
      )
      return rows.map(toCandidate)
    },
  }
}
