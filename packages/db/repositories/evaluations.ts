import type { Queryable } from '../client'
import type { EvaluationRepository } from '../store'
import type { DealFilter } from '../types'
import { queryOne, queryRows } from './query'
import {
  toDeal,
  toEvaluation,
  toPrediction,
  type DealQueryRow,
  type EvaluationRow,
  type PredictionQueryRow,
} from './rows'

export const MAX_DEALS_LIMIT = 200

const COLUMNS = `id, product_canonical_id, retailer_id, snapshot_id, pipeline_run_id, score, label,
  discount_pct, hist_delta_pct, cross_store_delta_pct, anchor_anomaly_flag, rule_trace,
  scoring_version, created_at`

/**
 * Build the WHERE clause for the deals listing. Exported for tests.
 */
export function buildDealConditions(filter: DealFilter): { versionClause: string; where: string; values: unknown[] } {
  const values: unknown[] = []
  const conditions: string[] = []

  let versionClause = ''
  if (filter.scoringVersion !== undefined) {
    values.push(filter.scoringVersion)
    versionClause = `WHERE e.scoring_version = $${values.length}`
  }
  if (filter.minScore !== undefined) {
    values.push(filter.minScore)
    conditions.push(`l.score >= $${values.length}`)
  }
  if (filter.label !== undefined) {
    values.push(filter.label)
    conditions.push(`l.label = $${values.length}`)
  }
  if (filter.retailer !== undefined) {
    values.push(filter.retailer.toLowerCase())
    conditions.push(`(lower(rt.name) = $${values.length} OR lower(rt.domain) = $${values.length})`)
  }
  if (filter.brand !== undefined) {
    // Plain substring match; % and _ in the filter are literal
    values.push(filter.brand.toLowerCase())
    conditions.push(`strpos(c.brand_norm, $${values.length}) > 0`)
  }
  if (filter.minDiscount !== undefined) {
    values.push(filter.minDiscount)
    conditions.push(`l.discount_pct >= $${values.length}`)
  }
  if (filter.crossStoreOnly) {
    conditions.push('l.cross_store_delta_pct < 0')
  }

  return {
    versionClause,
    where: conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '',
    values,
  }
}

export function createEvaluationRepository(db: Queryable): EvaluationRepository {
  async function findBySnapshot(snapshotId: number, scoringVersion: string) {
    const row = await queryOne<EvaluationRow>(
      db,
      `SELECT ${COLUMNS} FROM discount_evaluations WHERE snapshot_id = $1 AND scoring_version = $2`,
      [snapshotId, scoringVersion]
    )
    return row ? toEvaluation(row) : null
  }

  return {
    findBySnapshot,

    async insertIfAbsent(input) {
      const row = await queryOne<EvaluationRow>(
        db,
        `INSERT INTO discount_evaluations (
           product_canonical_id, retailer_id, snapshot_id, pipeline_run_id, score, label,
           discount_pct, hist_delta_pct, cross_store_delta_pct, anchor_anomaly_flag,
           rule_trace, scoring_version
         )
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12)
         ON CONFLICT (snapshot_id, scoring_version) DO NOTHING
         RETURNING ${COLUMNS}`,
        [
          input.productCanonicalId,
          input.retailerId,
          input.snapshotId,
          input.pipelineRunId,
          input.score,
          input.label,
          input.discountPct,
          input.histDeltaPct,
          input.crossStoreDeltaPct,
          input.anchorAnomalyFlag,
          JSON.stringify(input.ruleTrace),
          input.scoringVersion,
        ]
      )
      if (row) return { written: true, evaluation: toEvaluation(row) }

      const existing = await findBySnapshot(input.snapshotId, input.scoringVersion)
      if (!existing) {
        throw new Error(`Evaluation for snapshot ${input.snapshotId} conflicted but could not be read back`)
      }
      return { written: false, evaluation: existing }
    },

    async listDeals(filter) {
      const { versionClause, where, values } = buildDealConditions(filter)
      values.push(Math.min(Math.max(filter.limit, 1), MAX_DEALS_LIMIT))

      const rows = await queryRows<DealQueryRow>(
        db,
        `WITH latest AS (
           SELECT DISTINCT ON (s.product_raw_id)
             e.id AS evaluation_id, s.product_raw_id, e.product_canonical_id, e.score, e.label,
             e.discount_pct, e.hist_delta_pct, e.cross_store_delta_pct, e.anchor_anomaly_flag,
             e.rule_trace, e.scoring_version, e.created_at AS evaluated_at,
             s.price_current, s.price_list, s.currency, s.scraped_at
           FROM discount_evaluations e
           JOIN price_snapshots s ON s.id = e.snapshot_id
           ${versionClause}
           ORDER BY s.product_raw_id, s.scraped_at DESC, e.id DESC
         )
         SELECT l.*, r.title, r.product_url, r.image_url,
                rt.name AS retailer_name, rt.domain AS retailer_domain,
                c.canonical_name, c.brand_norm, c.category_norm
         FROM latest l
         JOIN products_raw r ON r.id = l.product_raw_id
         JOIN retailers rt ON rt.id = r.retailer_id
         JOIN products_canonical c ON c.id = l.product_canonical_id
         ${where}
         ORDER BY l.score DESC, l.discount_pct DESC NULLS LAST, l.evaluation_id
         LIMIT $${values.length}`,
        values
      )
      return rows.map(toDeal)
    },

    async listLatestPredictions(scoringVersion) {
      const rows = await queryRows<PredictionQueryRow>(
        db,
        `SELECT DISTINCT ON (s.product_raw_id)
           r.product_url, rt.name AS retailer_name, rt.domain AS retailer_domain,
           e.label, e.score, e.discount_pct, e.cross_store_delta_pct
         FROM discount_evaluations e
         JOIN price_snapshots s ON s.id = e.snapshot_id
         JOIN products_raw r ON r.id = s.product_raw_id
         JOIN retailers rt ON rt.id = r.retailer_id
         WHERE $1::text IS NULL OR e.scoring_version = $1
         ORDER BY s.product_raw_id, s.scraped_at DESC, e.id DESC`,
        [scoringVersion ?? null]
      )
      return rows.map(toPrediction)
    },
  }
}
