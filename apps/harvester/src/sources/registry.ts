/**
 * Retailer source registry, loaded from the SOURCES_CONFIG JSON file.
 *
 * {
 *   "sources": [
 *     { "name": "Farmacia Uno", "domain": "farmaciauno.cl", "url": "feeds/farmaciauno.json" }
 *   ]
 * }
 *
 * Relative file locations resolve against the config file's directory.
 */

import { readFile } from 'node:fs/promises'
import { dirname, isAbsolute, resolve } from 'node:path'
import { z } from 'zod'
import { ConfigError } from '../config/env'
import { logger } from '../config/logger'
import { FeedSource, DEFAULT_FEED_SOURCE_OPTIONS, type FeedSourceOptions } from './feed-source'
import type { RetailerSource } from './types'

const log = logger.sources

const sourceEntrySchema = z.object({
  name: z.string().trim().min(1),
  domain: z
    .string()
    .trim()
    .toLowerCase()
    .regex(/^[a-z0-9.-]+$/, 'must be a bare domain'),
  url: z.string().trim().min(1),
  format: z.enum(['json', 'csv']).optional(),
  enabled: z.boolean().default(true),
})

export const sourcesConfigSchema = z.object({
  sources: z.array(sourceEntrySchema).min(1, 'at least one source is required'),
})

export type SourcesConfig = z.output<typeof sourcesConfigSchema>

export function buildSources(
  config: SourcesConfig,
  baseDir: string,
  options: FeedSourceOptions = DEFAULT_FEED_SOURCE_OPTIONS
): RetailerSource[] {
  const seen = new Set<string>()
  const sources: RetailerSource[] = []

  for (const entry of config.sources) {
    if (seen.has(entry.domain)) {
      throw new ConfigError(`Duplicate retailer domain in sources config: ${entry.domain}`)
    }
    seen.add(entry.domain)

    if (!entry.enabled) {
      log.info('SOURCE_DISABLED', { retailer: entry.domain })
      continue
    }

    const location = /^https?:\/\//i.test(entry.url) || isAbsolute(entry.url) ? entry.url : resolve(baseDir, entry.url)
    sources.push(
      new FeedSource({ name: entry.name, domain: entry.domain, location, format: entry.format }, options)
    )
  }

  return sources
}

/**
 * @throws ConfigError when the file is missing or invalid
 */
export async function loadSources(configPath: string, options?: FeedSourceOptions): Promise<RetailerSource[]> {
  const absolutePath = resolve(configPath)

  let raw: unknown
  try {
    raw = JSON.parse(await readFile(absolutePath, 'utf8'))
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error)
    throw new ConfigError(`Cannot read sources config ${absolutePath}: ${reason}`)
  }

  const parsed = sourcesConfigSchema.safeParse(raw)
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')
    throw new ConfigError(`Invalid sources config ${absolutePath}: ${issues}`)
  }

  return buildSources(parsed.data, dirname(absolutePath), options)
}
