import { Router } from 'express'
import type { DealcheckStore } from '@dealcheck/db'
import { loggers } from '../config/logger'

const log = loggers.status

export function createStatusRouter(store: DealcheckStore): Router {
  const router = Router()

  // GET /api/status/latest - Most recent pipeline run, or null before the first one
  router.get('/latest', async (_req, res) => {
    try {
      const run = await store.pipelineRuns.findLatest()
      res.json(run)
    } catch (error) {
      log.error('STATUS_QUERY_FAILED', {}, error)
      res.status(500).json({ error: 'Failed to fetch pipeline status' })
    }
  })

  return router
}
