/**
 * API environment configuration.
 */

import { z } from 'zod'

const apiEnvSchema = z.object({
  DATABASE_URL: z.string().min(1, 'DATABASE_URL is required'),
  PORT: z.coerce.number().int().positive().default(8000),
  FRONTEND_URL: z.string().url().optional(),
})

export type ApiEnv = z.infer<typeof apiEnvSchema>

export class ConfigError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigError'
  }
}

export function loadApiEnv(env: NodeJS.ProcessEnv = process.env): ApiEnv {
  const cleaned = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== ''))
  const parsed = apiEnvSchema.safeParse(cleaned)
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')
    throw new ConfigError(`Invalid API configuration: ${issues}`)
  }
  return parsed.data
}
