import type { Pool, PoolClient } from 'pg'
import { withTransaction, type Queryable } from './client'
import { createCanonicalProductRepository } from './repositories/canonical-products'
import { createEvaluationRepository } from './repositories/evaluations'
import { createPipelineRunRepository } from './repositories/pipeline-runs'
import { createPriceSnapshotRepository } from './repositories/price-snapshots'
import { createProductMatchRepository } from './repositories/product-matches'
import { createRawProductRepository } from './repositories/raw-products'
import { createRetailerRepository } from './repositories/retailers'
import type { DealcheckStore } from './store'

function repositories(db: Queryable): Omit<DealcheckStore, 'transaction'> {
  return {
    retailers: createRetailerRepository(db),
    rawProducts: createRawProductRepository(db),
    canonicalProducts: createCanonicalProductRepository(db),
    productMatches: createProductMatchRepository(db),
    priceSnapshots: createPriceSnapshotRepository(db),
    evaluations: createEvaluationRepository(db),
    pipelineRuns: createPipelineRunRepository(db),
  }
}

function createTransactionStore(client: PoolClient): DealcheckStore {
  const store: DealcheckStore = {
    ...repositories(client),
    transaction: (fn) => fn(store),
  }
  return store
}

/**
 * PostgreSQL-backed store. Queries outside `transaction` use the pool
 * directly; inside, every repository shares one client.
 */
export function createPgStore(pool: Pool): DealcheckStore {
  return {
    ...repositories(pool),
    transaction: (fn) => withTransaction(pool, (client) => fn(createTransactionStore(client))),
  }
}
