/**
 * Evaluation Recorder
 *
 * Writes one immutable discount_evaluations row per (snapshot, scoring
 * version). Re-recording the same pair is a no-op.
 */

import { ConstraintViolationError, type DealcheckStore, type DiscountEvaluation } from '@dealcheck/db'
import { logger } from '../config/logger'
import type { ScoreResult } from '../scoring'

const log = logger.writer

export interface RecordEvaluationInput {
  productCanonicalId: number
  retailerId: number
  snapshotId: number
  pipelineRunId: string | null
  result: ScoreResult
}

export interface RecordEvaluationResult {
  written: boolean
  evaluation: DiscountEvaluation
}

/**
 * @throws ConstraintViolationError when the canonical product, retailer or
 *   snapshot does not exist. Nothing is written in that case.
 */
export async function recordEvaluation(
  store: DealcheckStore,
  input: RecordEvaluationInput
): Promise<RecordEvaluationResult> {
  const [canonical, retailer, snapshot] = await Promise.all([
    store.canonicalProducts.findById(input.productCanonicalId),
    store.retailers.findById(input.retailerId),
    store.priceSnapshots.findById(input.snapshotId),
  ])

  if (!canonical) {
    throw new ConstraintViolationError(
      `products_canonical ${input.productCanonicalId} does not exist`,
      'discount_evaluations_product_canonical_id_fkey'
    )
  }
  if (!retailer) {
    throw new ConstraintViolationError(
      `retailers ${input.retailerId} does not exist`,
      'discount_evaluations_retailer_id_fkey'
    )
  }
  if (!snapshot) {
    throw new ConstraintViolationError(
      `price_snapshots ${input.snapshotId} does not exist`,
      'discount_evaluations_snapshot_id_fkey'
    )
  }

  const { result } = input
  const outcome = await store.evaluations.insertIfAbsent({
    productCanonicalId: input.productCanonicalId,
    retailerId: input.retailerId,
    snapshotId: input.snapshotId,
    pipelineRunId: input.pipelineRunId,
    score: result.score,
    label: result.label,
    discountPct: result.discountPct,
    histDeltaPct: result.histDeltaPct,
    crossStoreDeltaPct: result.crossStoreDeltaPct,
    anchorAnomalyFlag: result.anchorAnomalyFlag,
    ruleTrace: result.ruleTrace,
    scoringVersion: result.scoringVersion,
  })

  log.debug(outcome.written ? 'EVALUATION_RECORDED' : 'EVALUATION_EXISTS', {
    evaluationId: outcome.evaluation.id,
    snapshotId: input.snapshotId,
    scoringVersion: result.scoringVersion,
    label: outcome.evaluation.label,
    score: outcome.evaluation.score,
  })

  return outcome
}
