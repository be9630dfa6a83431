/**
 * Retailer source boundary types.
 *
 * Offers arrive as snake_case records (JSON or CSV) and are validated here
 * before anything downstream sees them.
 */

import { z } from 'zod'
import { DealcheckError } from '@dealcheck/db'

export const DEFAULT_CURRENCY = 'CLP'

// "$9.990" and "9990" are the same CLP price; "12,50" is a decimal comma
const CLP_THOUSANDS = /^\d{1,3}(\.\d{3})+$/

export function parsePriceValue(value: unknown): unknown {
  if (typeof value !== 'string') return value
  const compact = value.replace(/[^\d.,]/g, '')
  if (compact.length === 0) return undefined
  if (CLP_THOUSANDS.test(compact)) return Number(compact.replace(/\./g, ''))
  return Number(compact.replace(/\./g, '').replace(',', '.'))
}

function emptyToNull(value: unknown): unknown {
  if (value === undefined || value === '') return null
  return value
}

const optionalText = z.preprocess(emptyToNull, z.string().trim().nullable())

const booleanLike = z.preprocess((value) => {
  if (typeof value !== 'string') return value
  const normalized = value.trim().toLowerCase()
  if (['true', '1', 'yes', 'si', 'sí'].includes(normalized)) return true
  if (['false', '0', 'no'].includes(normalized)) return false
  return value
}, z.boolean())

export const rawOfferSchema = z
  .object({
    retailer_product_id: z.coerce.string().trim().min(1),
    product_url: z.string().trim().url(),
    title: z.string().trim().min(1),
    brand_raw: optionalText,
    size_raw: optionalText,
    category_raw: optionalText,
    image_url: optionalText,
    price_current: z.preprocess(parsePriceValue, z.number().positive()),
    price_list: z.preprocess(
      (value) => parsePriceValue(emptyToNull(value)) ?? null,
      z.number().positive().nullable()
    ),
    currency: z.preprocess(emptyToNull, z.string().trim().length(3).nullable()),
    promo_text: optionalText,
    in_stock: booleanLike.default(true),
    scraped_at: z.coerce.date(),
    ean: z.preprocess((value) => (typeof value === 'number' ? String(value) : value), optionalText),
  })
  .transform((offer) => ({
    retailerProductId: offer.retailer_product_id,
    productUrl: offer.product_url,
    title: offer.title,
    brandRaw: offer.brand_raw,
    sizeRaw: offer.size_raw,
    categoryRaw: offer.category_raw,
    imageUrl: offer.image_url,
    priceCurrent: offer.price_current,
    priceList: offer.price_list,
    currency: offer.currency?.toUpperCase() ?? DEFAULT_CURRENCY,
    promoText: offer.promo_text,
    inStock: offer.in_stock,
    scrapedAt: offer.scraped_at,
    eanRaw: offer.ean,
  }))

export type RawOfferRecord = z.input<typeof rawOfferSchema>
export type RawOffer = z.output<typeof rawOfferSchema>

export interface RetailerInfo {
  name: string
  domain: string
}

/**
 * A retailer feed. `fetchOffers` resolves with every offer of the current
 * crawl or rejects with a SourceError.
 */
export interface RetailerSource {
  readonly retailer: RetailerInfo
  fetchOffers(signal?: AbortSignal): Promise<RawOffer[]>
}

export type SourceErrorCode = 'SOURCE_FAILED' | 'SOURCE_EMPTY' | 'SOURCE_INVALID'

/**
 * A retailer could not produce live offers for this run.
 * Recorded on the run and never retried within it.
 */
export class SourceError extends DealcheckError {
  readonly retailerDomain: string

  constructor(
    code: SourceErrorCode,
    retailerDomain: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(code, message, options)
    this.retailerDomain = retailerDomain
  }
}
