import { describe, it, expect, beforeEach } from 'vitest'
import { createMemoryStore, type MemoryStore } from '@dealcheck/db/test-utils'
import { MAX_OFFER_ERRORS, PipelineRunTracker, RunAlreadyFinishedError } from '../run-tracker'

const START = new Date('2026-03-01T10:00:00Z')
const END = new Date('2026-03-01T10:05:00Z')

const shopA = { name: 'Shop A', domain: 'shop-a.test' }
const shopB = { name: 'Shop B', domain: 'shop-b.test' }

describe('PipelineRunTracker', () => {
  let store: MemoryStore
  let tracker: PipelineRunTracker

  beforeEach(() => {
    store = createMemoryStore()
    const clock = [START, END]
    tracker = new PipelineRunTracker(store.pipelineRuns, {
      scoringVersion: 'v1',
      runId: 'run-1',
      now: () => clock.shift() ?? END,
    })
  })

  it('records a successful run with its counters', async () => {
    tracker.recordSourceLive(shopA, 3)
    tracker.recordSourceLive(shopB, 2)
    tracker.increment('totalOffers', 5)
    tracker.increment('totalSnapshots', 4)
    tracker.increment('totalDeduplicated')
    tracker.increment('totalEvaluations', 4)

    const run = await tracker.finish()

    expect(run).toMatchObject({
      id: 'run-1',
      startedAt: START,
      finishedAt: END,
      status: 'SUCCESS',
      totalOffers: 5,
      totalSnapshots: 4,
      totalDeduplicated: 1,
      totalEvaluations: 4,
      totalPendingReview: 0,
      totalOfferErrors: 0,
      errorMessage: null,
      scoringVersion: 'v1',
    })
    expect(run.sources['shop-a.test']).toEqual({ name: 'Shop A', source: 'live', count: 3, error: null })
    expect(store.tables.pipelineRuns).toHaveLength(1)
  })

  it('fails the run when any retailer errored', async () => {
    tracker.recordSourceLive(shopA, 3)
    tracker.recordSourceError(shopB, new Error('HTTP 503'))

    const run = await tracker.finish()

    expect(run.status).toBe('FAILED')
    expect(run.errorMessage).toBe('Source failed: shop-b.test')
    expect(run.sources['shop-b.test']).toEqual({ name: 'Shop B', source: 'error', count: 0, error: 'HTTP 503' })
    expect(tracker.failedSources()).toEqual([{ domain: 'shop-b.test', error: 'HTTP 503' }])
  })

  it('fails the run when a retailer returned zero offers', async () => {
    tracker.recordSourceLive(shopA, 0)

    expect((await tracker.finish()).status).toBe('FAILED')
  })

  it('fails the run when no source was configured', async () => {
    const run = await tracker.finish()

    expect(run.status).toBe('FAILED')
    expect(run.errorMessage).toBe('No retailer sources configured')
  })

  it('keeps the first fatal error message', async () => {
    tracker.recordSourceLive(shopA, 1)
    tracker.fail(new Error('constraint violated'))
    tracker.fail(new Error('later error'))

    const run = await tracker.finish()

    expect(run.status).toBe('FAILED')
    expect(run.errorMessage).toBe('constraint violated')
  })

  it('caps stored offer errors but counts all of them', async () => {
    tracker.recordSourceLive(shopA, 1)
    for (let i = 0; i < MAX_OFFER_ERRORS + 5; i++) {
      tracker.recordOfferError({
        retailer: 'shop-a.test',
        retailerProductId: `sku-${i}`,
        stage: 'evaluate',
        code: 'UNKNOWN',
        message: 'boom',
      })
    }

    const run = await tracker.finish()

    expect(run.totalOfferErrors).toBe(55)
    expect(run.offerErrors).toHaveLength(50)
    expect(run.offerErrors[0]?.retailerProductId).toBe('sku-0')
    expect(run.status).toBe('SUCCESS')
  })

  it('refuses a second finish', async () => {
    tracker.recordSourceLive(shopA, 1)
    await tracker.finish()

    await expect(tracker.finish()).rejects.toBeInstanceOf(RunAlreadyFinishedError)
    expect(store.tables.pipelineRuns).toHaveLength(1)
  })
})
