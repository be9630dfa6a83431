import { describe, it, expect, beforeEach } from 'vitest'
import { ConstraintViolationError } from '@dealcheck/db'
import { createMemoryStore, type MemoryStore } from '@dealcheck/db/test-utils'
import { evaluateRules } from '../../evaluator'
import { getScoringPolicy, scoreEvaluation } from '../../scoring'
import { seedCanonical, seedRawProduct, SEEN_AT } from '../../resolver/__tests__/factories'
import { recordEvaluation } from '../evaluation-recorder'

const policy = getScoringPolicy('v1')

function scoreFor(priceCurrent: number, priceList: number | null) {
  const evaluation = evaluateRules(
    { current: { scrapedAt: SEEN_AT, priceCurrent, priceList }, history: [], peers: [] },
    policy.rules
  )
  return scoreEvaluation(evaluation, policy)
}

describe('recordEvaluation', () => {
  let store: MemoryStore
  let ids: { productCanonicalId: number; retailerId: number; snapshotId: number }

  beforeEach(async () => {
    store = createMemoryStore()
    const raw = await seedRawProduct(store)
    const canonical = await seedCanonical(store)
    const snapshot = await store.priceSnapshots.insert({
      productRawId: raw.id,
      scrapedAt: SEEN_AT,
      priceCurrent: 8000,
      priceList: 10000,
      currency: 'CLP',
      promoText: null,
      inStock: true,
      sourceHash: 'hash-1',
    })
    ids = { productCanonicalId: canonical.id, retailerId: raw.retailerId, snapshotId: snapshot.id }
  })

  it('writes one evaluation with the rule trace', async () => {
    const result = scoreFor(8000, 10000)
    const outcome = await recordEvaluation(store, { ...ids, pipelineRunId: 'run-1', result })

    expect(outcome.written).toBe(true)
    expect(store.tables.evaluations).toHaveLength(1)
    expect(outcome.evaluation).toMatchObject({
      snapshotId: ids.snapshotId,
      pipelineRunId: 'run-1',
      label: result.label,
      score: result.score,
      discountPct: 0.2,
      scoringVersion: 'v1',
    })
    expect(outcome.evaluation.ruleTrace.R6_visible_discount_ge_10pct).toBe(true)
  })

  it('is a no-op for the same snapshot and scoring version', async () => {
    const first = await recordEvaluation(store, { ...ids, pipelineRunId: 'run-1', result: scoreFor(8000, 10000) })
    const second = await recordEvaluation(store, { ...ids, pipelineRunId: 'run-2', result: scoreFor(8000, 10000) })

    expect(second.written).toBe(false)
    expect(second.evaluation.id).toBe(first.evaluation.id)
    expect(second.evaluation.pipelineRunId).toBe('run-1')
    expect(store.tables.evaluations).toHaveLength(1)
  })

  it('refuses a missing canonical product and writes nothing', async () => {
    await expect(
      recordEvaluation(store, { ...ids, productCanonicalId: 999, pipelineRunId: null, result: scoreFor(8000, 10000) })
    ).rejects.toBeInstanceOf(ConstraintViolationError)
    expect(store.tables.evaluations).toHaveLength(0)
  })

  it('refuses a missing snapshot', async () => {
    await expect(
      recordEvaluation(store, { ...ids, snapshotId: 999, pipelineRunId: null, result: scoreFor(8000, 10000) })
    ).rejects.toThrow('price_snapshots 999 does not exist')
  })
})
