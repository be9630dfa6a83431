/**
 * SQL repository tests against a recording Queryable.
 *
 * These check parameter binding and row mapping; query semantics are
 * covered through the in-process store.
 */

import { describe, it, expect, vi } from 'vitest'
import { DatabaseError, type QueryResult, type QueryResultRow } from 'pg'
import type { Queryable } from '../client'
import { DuplicateSnapshotError, NotFoundError, SNAPSHOT_UNIQUE_CONSTRAINT } from '../errors'
import { buildDealConditions, createEvaluationRepository, MAX_DEALS_LIMIT } from '../repositories/evaluations'
import { createPriceSnapshotRepository } from '../repositories/price-snapshots'
import { createPipelineRunRepository } from '../repositories/pipeline-runs'
import { createProductMatchRepository } from '../repositories/product-matches'

function recordingDb(responses: QueryResultRow[][]) {
  const calls: { text: string; values: unknown[] | undefined }[] = []
  const db: Queryable = {
    async query<R extends QueryResultRow>(text: string, values?: unknown[]): Promise<QueryResult<R>> {
      calls.push({ text, values })
      const rows = responses.shift() ?? []
      const queryResult: QueryResult<QueryResultRow> = { rows, rowCount: rows.length, command: 'SELECT', oid: 0, fields: [] }
      return queryResult as QueryResult<R>
    },
  }
  return { db, calls }
}

const SCRAPED_AT = new Date('2026-03-01T10:00:00Z')

describe('price snapshot repository', () => {
  it('maps NUMERIC strings to numbers', async () => {
    const { db } = recordingDb([
      [
        {
          id: 3,
          product_raw_id: 1,
          scraped_at: SCRAPED_AT,
          price_current: '8990.00',
          price_list: null,
          currency: 'CLP',
          promo_text: null,
          in_stock: true,
          source_hash: 'h',
        },
      ],
    ])

    const snapshot = await createPriceSnapshotRepository(db).findById(3)

    expect(snapshot).toEqual({
      id: 3,
      productRawId: 1,
      scrapedAt: SCRAPED_AT,
      priceCurrent: 8990,
      priceList: null,
      currency: 'CLP',
      promoText: null,
      inStock: true,
      sourceHash: 'h',
    })
  })

  it('turns the (raw product, scraped_at) unique violation into DuplicateSnapshotError', async () => {
    const violation = new DatabaseError('duplicate key value', 0, 'error')
    violation.code = '23505'
    violation.constraint = SNAPSHOT_UNIQUE_CONSTRAINT
    const db: Queryable = { query: vi.fn().mockRejectedValue(violation) }

    await expect(
      createPriceSnapshotRepository(db).insert({
        productRawId: 1,
        scrapedAt: SCRAPED_AT,
        priceCurrent: 10,
        priceList: null,
        currency: 'CLP',
        promoText: null,
        inStock: true,
        sourceHash: 'h',
      })
    ).rejects.toBeInstanceOf(DuplicateSnapshotError)
  })
})

describe('evaluation repository', () => {
  it('reads back the stored row when the insert conflicts', async () => {
    const stored = {
      id: 11,
      product_canonical_id: 2,
      retailer_id: 1,
      snapshot_id: 5,
      pipeline_run_id: 'run-1',
      score: 0.7143,
      label: 'SUSPICIOUS',
      discount_pct: 0.2,
      hist_delta_pct: null,
      cross_store_delta_pct: null,
      anchor_anomaly_flag: false,
      rule_trace: {},
      scoring_version: 'v1',
      created_at: SCRAPED_AT,
    }
    const { db, calls } = recordingDb([[], [stored]])

    const outcome = await createEvaluationRepository(db).insertIfAbsent({
      productCanonicalId: 2,
      retailerId: 1,
      snapshotId: 5,
      pipelineRunId: 'run-2',
      score: 0.7143,
      label: 'SUSPICIOUS',
      discountPct: 0.2,
      histDeltaPct: null,
      crossStoreDeltaPct: null,
      anchorAnomalyFlag: false,
      ruleTrace: {},
      scoringVersion: 'v1',
    })

    expect(outcome.written).toBe(false)
    expect(outcome.evaluation.id).toBe(11)
    expect(outcome.evaluation.pipelineRunId).toBe('run-1')
    expect(calls[0]?.text).toContain('ON CONFLICT (snapshot_id, scoring_version) DO NOTHING')
    expect(calls[1]?.values).toEqual([5, 'v1'])
  })

  it('caps the deals limit', async () => {
    const { db, calls } = recordingDb([[]])

    await createEvaluationRepository(db).listDeals({ limit: 5000 })

    expect(calls[0]?.values).toEqual([MAX_DEALS_LIMIT])
  })
})

describe('product match repository', () => {
  it('only reviews the active row', async () => {
    const { db, calls } = recordingDb([[]])

    await expect(createProductMatchRepository(db).setStatus(4, 'REJECTED')).rejects.toThrow(
      new NotFoundError('Active ProductMatch', 4)
    )
    expect(calls[0]?.text).toContain("WHERE id = $1 AND superseded_at IS NULL AND status <> 'REJECTED'")
    expect(calls[0]?.values).toEqual([4, 'REJECTED'])
  })
})

describe('buildDealConditions', () => {
  it('numbers placeholders in filter order', () => {
    const built = buildDealConditions({
      scoringVersion: 'v1',
      minScore: 0.5,
      retailer: 'Shop-A.test',
      brand: 'Acme',
      crossStoreOnly: true,
      limit: 10,
    })

    expect(built.versionClause).toBe('WHERE e.scoring_version = $1')
    expect(built.where).toBe(
      'WHERE l.score >= $2 AND (lower(rt.name) = $3 OR lower(rt.domain) = $3) AND strpos(c.brand_norm, $4) > 0 AND l.cross_store_delta_pct < 0'
    )
    expect(built.values).toEqual(['v1', 0.5, 'shop-a.test', 'acme'])
  })

  it('passes brand wildcards through as literal text', () => {
    const built = buildDealConditions({ brand: '50%_off', limit: 10 })

    expect(built.where).toBe('WHERE strpos(c.brand_norm, $1) > 0')
    expect(built.values).toEqual(['50%_off'])
  })

  it('is empty without filters', () => {
    expect(buildDealConditions({ limit: 10 })).toEqual({ versionClause: '', where: '', values: [] })
  })
})

describe('pipeline run repository', () => {
  it('serializes sources and offer errors as JSON', async () => {
    const { db, calls } = recordingDb([[]])

    await createPipelineRunRepository(db).insert({
      id: 'run-1',
      startedAt: SCRAPED_AT,
      finishedAt: SCRAPED_AT,
      status: 'FAILED',
      totalOffers: 0,
      totalSnapshots: 0,
      totalDeduplicated: 0,
      totalEvaluations: 0,
      totalPendingReview: 0,
      totalOfferErrors: 0,
      sources: { 'shop-a.test': { name: 'Shop A', source: 'error', count: 0, error: 'timeout' } },
      offerErrors: [],
      scoringVersion: 'v1',
      errorMessage: 'Source failed: shop-a.test',
    })

    const values = calls[0]?.values ?? []
    expect(values[10]).toBe('{"shop-a.test":{"name":"Shop A","source":"error","count":0,"error":"timeout"}}')
    expect(values[11]).toBe('[]')
  })
})
