import type { Queryable } from '../client'
import { NotFoundError } from '../errors'
import type { ProductMatchRepository } from '../store'
import { queryOne, queryRows } from './query'
import { toMatch, toPendingMatch, type MatchRow, type PendingMatchRow } from './rows'

const COLUMNS = `id, product_raw_id, product_canonical_id, match_confidence, match_method, matcher_version,
  status, evidence, pipeline_run_id, superseded_at, created_at`

const ACTIVE = `superseded_at IS NULL AND status <> 'REJECTED'`

/**
 * `record` must run inside a transaction (see `DealcheckStore.transaction`)
 * so the supersede and the insert land together.
 */
export function createProductMatchRepository(db: Queryable): ProductMatchRepository {
  return {
    async findActive(productRawId) {
      const row = await queryOne<MatchRow>(
        db,
        `SELECT ${COLUMNS} FROM product_matches WHERE product_raw_id = $1 AND ${ACTIVE}`,
        [productRawId]
      )
      return row ? toMatch(row) : null
    },

    async findById(id) {
      const row = await queryOne<MatchRow>(db, `SELECT ${COLUMNS} FROM product_matches WHERE id = $1`, [id])
      return row ? toMatch(row) : null
    },

    async findRejectedCanonicalIds(productRawId) {
      const rows = await queryRows<{ product_canonical_id: number }>(
        db,
        `SELECT DISTINCT product_canonical_id FROM product_matches
         WHERE product_raw_id = $1 AND status = 'REJECTED'
         ORDER BY product_canonical_id`,
        [productRawId]
      )
      return rows.map((r) => r.product_canonical_id)
    },

    async record(input) {
      await queryRows(
        db,
        `UPDATE product_matches SET superseded_at = now() WHERE product_raw_id = $1 AND ${ACTIVE}`,
        [input.productRawId]
      )
      const row = await queryOne<MatchRow>(
        db,
        `INSERT INTO product_matches (
           product_raw_id, product_canonical_id, match_confidence, match_method,
           matcher_version, status, evidence, pipeline_run_id
         )
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
         RETURNING ${COLUMNS}`,
        [
          input.productRawId,
          input.productCanonicalId,
          input.matchConfidence,
          input.matchMethod,
          input.matcherVersion,
          input.status,
          JSON.stringify(input.evidence),
          input.pipelineRunId,
        ]
      )
      if (!row) throw new Error(`Match insert returned no row for raw product ${input.productRawId}`)
      return toMatch(row)
    },

    async setStatus(id, status) {
      const row = await queryOne<MatchRow>(
        db,
        `UPDATE product_matches SET status = $2 WHERE id = $1 AND ${ACTIVE} RETURNING ${COLUMNS}`,
        [id, status]
      )
      // Superseded and already rejected rows are history, not reviewable
      if (!row) throw new NotFoundError('Active ProductMatch', id)
      return toMatch(row)
    },

    async listPendingReview(limit) {
      const rows = await queryRows<PendingMatchRow>(
        db,
        `SELECT m.id AS match_id, m.product_raw_id, r.title, rt.name AS retailer_name,
                m.product_canonical_id, c.canonical_name, m.match_confidence, m.created_at
         FROM product_matches m
         JOIN products_raw r ON r.id = m.product_raw_id
         JOIN retailers rt ON rt.id = r.retailer_id
         JOIN products_canonical c ON c.id = m.product_canonical_id
         WHERE m.status = 'PENDING_REVIEW' AND m.superseded_at IS NULL
         ORDER BY m.match_confidence DESC, m.id
         LIMIT $1`,
        [limit]
      )
      return rows.map(toPendingMatch)
    },
  }
}
