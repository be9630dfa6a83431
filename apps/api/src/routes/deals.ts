import { Router } from 'express'
import { z } from 'zod'
import { DEAL_LABELS, MAX_DEALS_LIMIT, type DealRow, type DealcheckStore } from '@dealcheck/db'
import { loggers } from '../config/logger'
import { explainRuleTrace, type DealExplanation } from '../services/explain'

const log = loggers.deals

export const DEFAULT_DEALS_LIMIT = 50

const booleanParam = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((value) => value === 'true' || value === '1')

// Query schema
export const listDealsSchema = z.object({
  min_score: z.coerce.number().min(0).max(1).default(0),
  limit: z.coerce.number().int().min(1).max(MAX_DEALS_LIMIT).default(DEFAULT_DEALS_LIMIT),
  label: z.enum(DEAL_LABELS).optional(),
  retailer: z.string().trim().min(1).optional(),
  brand: z.string().trim().toLowerCase().min(1).optional(),
  only_visible_discount_ge: z.coerce.number().min(0).max(1).optional(),
  only_cross_store_positive: booleanParam,
  scoring_version: z.string().trim().min(1).optional(),
})

export interface DealResponse extends DealRow {
  explanation: DealExplanation
}

export function toDealResponse(row: DealRow): DealResponse {
  return { ...row, explanation: explainRuleTrace(row.ruleTrace) }
}

export function createDealsRouter(store: DealcheckStore): Router {
  const router = Router()

  // GET /api/deals - Latest evaluation per listing, best score first
  router.get('/', async (req, res) => {
    try {
      const query = listDealsSchema.parse(req.query)

      const rows = await store.evaluations.listDeals({
        minScore: query.min_score,
        label: query.label,
        retailer: query.retailer,
        brand: query.brand,
        minDiscount: query.only_visible_discount_ge,
        crossStoreOnly: query.only_cross_store_positive,
        scoringVersion: query.scoring_version,
        limit: query.limit,
      })

      res.json({ items: rows.map(toDealResponse) })
    } catch (error) {
      if (error instanceof z.ZodError) {
        return res.status(400).json({ error: 'Invalid query parameters', details: error.issues })
      }
      log.error('DEALS_QUERY_FAILED', {}, error)
      res.status(500).json({ error: 'Failed to fetch deals' })
    }
  })

  return router
}
