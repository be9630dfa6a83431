/**
 * Harvester environment configuration.
 *
 * Parsed once at startup; an invalid value fails fast with the zod issues.
 */

import { z } from 'zod'

const harvesterEnvSchema = z.object({
  DATABASE_URL: z.string().min(1, 'DATABASE_URL is required'),
  SCORING_VERSION: z.string().default('v1'),
  SOURCES_CONFIG: z.string().default('config/sources.json'),
  SOURCE_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  SLACK_PIPELINE_ALERTS_WEBHOOK_URL: z.string().url().optional(),
})

export type HarvesterEnv = z.infer<typeof harvesterEnvSchema>

export class ConfigError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigError'
  }
}

export function loadHarvesterEnv(env: NodeJS.ProcessEnv = process.env): HarvesterEnv {
  // Empty strings from .env files mean "unset"
  const cleaned = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== ''))
  const parsed = harvesterEnvSchema.safeParse(cleaned)
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')
    throw new ConfigError(`Invalid harvester configuration: ${issues}`)
  }
  return parsed.data
}
