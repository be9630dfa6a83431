/**
 * Feed Source
 *
 * Reads a retailer's offer feed (JSON or CSV) from a local file or an
 * http(s) URL and validates every record against rawOfferSchema.
 *
 * Outcomes:
 * - fetch/read failure or timeout  -> SourceError SOURCE_FAILED
 * - unparseable content           -> SourceError SOURCE_INVALID
 * - no records                    -> SourceError SOURCE_EMPTY
 * - records but none valid        -> SourceError SOURCE_INVALID
 *
 * Invalid records among valid ones are dropped and logged.
 */

import { readFile } from 'node:fs/promises'
import { extname } from 'node:path'
import { parse as parseCSV } from 'csv-parse/sync'
import { z } from 'zod'
import { logger } from '../config/logger'
import { rawOfferSchema, SourceError, type RawOffer, type RetailerInfo, type RetailerSource } from './types'

const log = logger.sources

export type FeedFormat = 'json' | 'csv'

export interface FeedSourceConfig extends RetailerInfo {
  /** Absolute file path or http(s) URL */
  location: string
  format?: FeedFormat
}

export interface FeedSourceOptions {
  timeoutMs: number
}

export const DEFAULT_FEED_SOURCE_OPTIONS: FeedSourceOptions = {
  timeoutMs: 30_000,
}

const jsonFeedSchema = z.union([
  z.array(z.unknown()),
  z.object({ offers: z.array(z.unknown()) }).transform((feed) => feed.offers),
])

const csvRecordsSchema = z.array(z.record(z.string()))

function isRemote(location: string): boolean {
  return /^https?:\/\//i.test(location)
}

export function detectFeedFormat(location: string): FeedFormat {
  const pathname = isRemote(location) ? new URL(location).pathname : location
  return extname(pathname).toLowerCase() === '.csv' ? 'csv' : 'json'
}

/**
 * Parse feed content into unvalidated records.
 * @throws Error when the content is not valid JSON/CSV of the expected shape
 */
export function parseFeedContent(content: string, format: FeedFormat): unknown[] {
  if (format === 'csv') {
    const records = parseCSV(content, {
      columns: true,
      skip_empty_lines: true,
      relax_column_count: true,
      trim: true,
      bom: true,
    })
    return csvRecordsSchema.parse(records)
  }
  return jsonFeedSchema.parse(JSON.parse(content))
}

export class FeedSource implements RetailerSource {
  readonly retailer: RetailerInfo
  private readonly format: FeedFormat

  constructor(
    private readonly config: FeedSourceConfig,
    private readonly options: FeedSourceOptions = DEFAULT_FEED_SOURCE_OPTIONS
  ) {
    this.retailer = { name: config.name, domain: config.domain }
    this.format = config.format ?? detectFeedFormat(config.location)
  }

  async fetchOffers(signal?: AbortSignal): Promise<RawOffer[]> {
    const { domain } = this.retailer
    const content = await this.read(signal)

    let records: unknown[]
    try {
      records = parseFeedContent(content, this.format)
    } catch (error) {
      throw new SourceError('SOURCE_INVALID', domain, `Unparseable ${this.format} feed for ${domain}`, {
        cause: error,
      })
    }

    if (records.length === 0) {
      throw new SourceError('SOURCE_EMPTY', domain, `Feed for ${domain} returned no offers`)
    }

    const offers: RawOffer[] = []
    records.forEach((record, index) => {
      const parsed = rawOfferSchema.safeParse(record)
      if (parsed.success) {
        offers.push(parsed.data)
        return
      }
      log.warn('OFFER_INVALID', {
        retailer: domain,
        row: index + 1,
        issues: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
      })
    })

    if (offers.length === 0) {
      throw new SourceError('SOURCE_INVALID', domain, `None of the ${records.length} records for ${domain} are valid`)
    }

    log.info('SOURCE_FETCHED', {
      retailer: domain,
      format: this.format,
      records: records.length,
      offers: offers.length,
      rejected: records.length - offers.length,
    })
    return offers
  }

  private async read(signal?: AbortSignal): Promise<string> {
    const { domain } = this.retailer
    const timeout = AbortSignal.timeout(this.options.timeoutMs)
    const combined = signal ? AbortSignal.any([signal, timeout]) : timeout

    try {
      if (!isRemote(this.config.location)) {
        return await readFile(this.config.location, { encoding: 'utf8', signal: combined })
      }

      const response = await fetch(this.config.location, {
        headers: { Accept: this.format === 'csv' ? 'text/csv' : 'application/json' },
        signal: combined,
      })
      if (!response.ok) {
        throw new Error(`Feed fetch failed: ${response.status} ${response.statusText}`)
      }
      return await response.text()
    } catch (error) {
      const reason = timeout.aborted ? `timed out after ${this.options.timeoutMs}ms` : errorMessage(error)
      throw new SourceError('SOURCE_FAILED', domain, `Feed for ${domain} failed: ${reason}`, { cause: error })
    }
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
