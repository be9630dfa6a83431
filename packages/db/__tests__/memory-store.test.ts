import { describe, it, expect, beforeEach } from 'vitest'
import { createMemoryStore, type MemoryStore } from '../test-utils'
import { ConstraintViolationError, DuplicateSnapshotError } from '../errors'
import type { NewPriceSnapshot, RawProduct } from '../types'

const T0 = new Date('2026-03-01T10:00:00Z')

describe('createMemoryStore', () => {
  let store: MemoryStore
  let raw: RawProduct

  beforeEach(async () => {
    store = createMemoryStore({ now: () => T0 })
    const retailer = await store.retailers.upsertByDomain({ name: 'Shop A', domain: 'shop-a.test' })
    raw = await store.rawProducts.upsert({
      retailerId: retailer.id,
      retailerProductId: 'sku-1',
      productUrl: 'https://shop-a.test/p/1',
      title: 'Hydra Gel 50 ml',
      brandRaw: 'Acme',
      sizeRaw: '50 ml',
      categoryRaw: 'Moisturizer',
      imageUrl: null,
      eanRaw: null,
      seenAt: T0,
    })
  })

  function snapshot(overrides: Partial<NewPriceSnapshot> = {}): NewPriceSnapshot {
    return {
      productRawId: raw.id,
      scrapedAt: T0,
      priceCurrent: 100,
      priceList: 120,
      currency: 'CLP',
      promoText: null,
      inStock: true,
      sourceHash: 'hash-a',
      ...overrides,
    }
  }

  it('upserts raw products without moving first_seen_at', async () => {
    const later = new Date('2026-03-05T10:00:00Z')
    const again = await store.rawProducts.upsert({
      retailerId: raw.retailerId,
      retailerProductId: 'sku-1',
      productUrl: raw.productUrl,
      title: 'Hydra Gel 50ml (new label)',
      brandRaw: 'Acme',
      sizeRaw: '50 ml',
      categoryRaw: 'Moisturizer',
      imageUrl: null,
      eanRaw: null,
      seenAt: later,
    })

    expect(again.id).toBe(raw.id)
    expect(again.firstSeenAt).toEqual(T0)
    expect(again.lastSeenAt).toEqual(later)
    expect(again.title).toBe('Hydra Gel 50ml (new label)')
    expect(store.tables.rawProducts).toHaveLength(1)
  })

  it('rejects a raw product for an unknown retailer', async () => {
    await expect(
      store.rawProducts.upsert({
        retailerId: 99,
        retailerProductId: 'x',
        productUrl: 'https://x.test',
        title: 'x',
        brandRaw: null,
        sizeRaw: null,
        categoryRaw: null,
        imageUrl: null,
        eanRaw: null,
        seenAt: T0,
      })
    ).rejects.toBeInstanceOf(ConstraintViolationError)
  })

  it('throws DuplicateSnapshotError for the same scraped_at', async () => {
    await store.priceSnapshots.insert(snapshot())
    await expect(store.priceSnapshots.insert(snapshot({ sourceHash: 'other' }))).rejects.toBeInstanceOf(
      DuplicateSnapshotError
    )
  })

  it('keeps a single active match per raw product', async () => {
    const c1 = await store.canonicalProducts.create({
      canonicalName: 'hydra gel',
      brandNorm: 'acme',
      sizeValue: 50,
      sizeUnit: 'ml',
      categoryNorm: 'moisturizer',
      ean: null,
    })
    const c2 = await store.canonicalProducts.create({ ...c1, canonicalName: 'hydra gel xl' })

    const base = {
      productRawId: raw.id,
      matchConfidence: 1,
      matchMethod: 'new-canonical' as const,
      matcherVersion: 'test',
      status: 'AUTO_ACCEPTED' as const,
      evidence: {},
      pipelineRunId: 'run-1',
    }
    const first = await store.productMatches.record({ ...base, productCanonicalId: c1.id })
    await store.productMatches.record({ ...base, productCanonicalId: c2.id, pipelineRunId: 'run-2' })

    const active = await store.productMatches.findActive(raw.id)
    expect(active?.productCanonicalId).toBe(c2.id)
    expect(store.tables.productMatches.find((m) => m.id === first.id)?.supersededAt).toEqual(T0)
    expect(store.tables.productMatches.filter((m) => m.supersededAt === null)).toHaveLength(1)
  })

  it('rolls back every write of a failed transaction', async () => {
    await expect(
      store.transaction(async (tx) => {
        await tx.priceSnapshots.insert(snapshot())
        await tx.retailers.upsertByDomain({ name: 'Shop B', domain: 'shop-b.test' })
        throw new Error('boom')
      })
    ).rejects.toThrow('boom')

    expect(store.tables.priceSnapshots).toHaveLength(0)
    expect(store.tables.retailers).toHaveLength(1)
  })

  it('joins nested transactions to the outer one', async () => {
    await store.transaction(async (tx) => {
      await tx.transaction(async (inner) => {
        await inner.priceSnapshots.insert(snapshot())
      })
    })

    expect(store.tables.priceSnapshots).toHaveLength(1)
  })

  it('lists the latest prediction of each raw product', async () => {
    const canonical = await store.canonicalProducts.create({
      canonicalName: 'hydra gel',
      brandNorm: 'acme',
      sizeValue: 50,
      sizeUnit: 'ml',
      categoryNorm: 'moisturizer',
      ean: null,
    })
    const older = await store.priceSnapshots.insert(snapshot())
    const newer = await store.priceSnapshots.insert(
      snapshot({ scrapedAt: new Date('2026-03-02T10:00:00Z'), priceCurrent: 90, sourceHash: 'hash-b' })
    )
    for (const [snap, label, score] of [
      [older, 'SUSPICIOUS', 0.5],
      [newer, 'LIKELY_REAL', 0.6],
    ] as const) {
      await store.evaluations.insertIfAbsent({
        productCanonicalId: canonical.id,
        retailerId: raw.retailerId,
        snapshotId: snap.id,
        pipelineRunId: null,
        score,
        label,
        discountPct: 0.25,
        histDeltaPct: null,
        crossStoreDeltaPct: null,
        anchorAnomalyFlag: false,
        ruleTrace: {},
        scoringVersion: 'v1',
      })
    }

    expect(await store.evaluations.listLatestPredictions()).toEqual([
      {
        productUrl: 'https://shop-a.test/p/1',
        retailerName: 'Shop A',
        retailerDomain: 'shop-a.test',
        label: 'LIKELY_REAL',
        score: 0.6,
        discountPct: 0.25,
        crossStoreDeltaPct: null,
      },
    ])
    expect(await store.evaluations.listLatestPredictions('v2')).toEqual([])
  })

  it('returns the most recently started pipeline run', async () => {
    const run = {
      finishedAt: T0,
      status: 'SUCCESS' as const,
      totalOffers: 0,
      totalSnapshots: 0,
      totalDeduplicated: 0,
      totalEvaluations: 0,
      totalPendingReview: 0,
      totalOfferErrors: 0,
      sources: {},
      offerErrors: [],
      scoringVersion: 'v1',
      errorMessage: null,
    }
    await store.pipelineRuns.insert({ ...run, id: 'b', startedAt: new Date('2026-03-02T00:00:00Z') })
    await store.pipelineRuns.insert({ ...run, id: 'a', startedAt: new Date('2026-03-01T00:00:00Z') })

    expect((await store.pipelineRuns.findLatest())?.id).toBe('b')
    await expect(store.pipelineRuns.insert({ ...run, id: 'a', startedAt: T0 })).rejects.toBeInstanceOf(
      ConstraintViolationError
    )
  })
})
