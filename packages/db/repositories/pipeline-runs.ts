import type { Queryable } from '../client'
import type { PipelineRunRepository } from '../store'
import { queryOne, queryRows } from './query'
import { toPipelineRun, type PipelineRunRow } from './rows'

const COLUMNS = `id, started_at, finished_at, status, total_offers, total_snapshots, total_deduplicated,
  total_evaluations, total_pending_review, total_offer_errors, sources, offer_errors,
  scoring_version, error_message`

export function createPipelineRunRepository(db: Queryable): PipelineRunRepository {
  return {
    async insert(run) {
      await queryRows(
        db,
        `INSERT INTO pipeline_runs (${COLUMNS})
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14)`,
        [
          run.id,
          run.startedAt,
          run.finishedAt,
          run.status,
          run.totalOffers,
          run.totalSnapshots,
          run.totalDeduplicated,
          run.totalEvaluations,
          run.totalPendingReview,
          run.totalOfferErrors,
          JSON.stringify(run.sources),
          JSON.stringify(run.offerErrors),
          run.scoringVersion,
          run.errorMessage,
        ]
      )
    },

    async findLatest() {
      const row = await queryOne<PipelineRunRow>(
        db,
        `SELECT ${COLUMNS} FROM pipeline_runs ORDER BY started_at DESC, created_at DESC LIMIT 1`
      )
      return row ? toPipelineRun(row) : null
    },
  }
}
