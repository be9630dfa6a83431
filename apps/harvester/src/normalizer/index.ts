/**
 * Identity Normalizer
 *
 * Turns a validated retailer offer into the comparable identity used by the
 * resolver: brand, size, category, canonical name and barcode.
 */

import type { RawOffer } from '../sources/types'
import { normalizeBrand } from './brand'
import {
  normalizeCategory,
  normalizeEan,
  normalizeTitle,
  parseSize,
  type CategoryNorm,
  type ParsedSize,
} from './product-utils'

export { normalizeBrand, normalizeBrandString, BRAND_NORMALIZATION_VERSION } from './brand'
export {
  foldText,
  foldWords,
  gtinCheckDigit,
  normalizeCategory,
  normalizeEan,
  normalizeTitle,
  parseSize,
  sizesMatch,
  getCategoryNames,
  FALLBACK_CATEGORY,
  type CategoryNorm,
  type ParsedSize,
  type SizeLike,
  type SizeUnit,
} from './product-utils'

/** Brand used when a listing carries none */
export const UNKNOWN_BRAND = 'unknown'

export interface NormalizedOffer {
  brandNorm: string
  size: ParsedSize
  categoryNorm: CategoryNorm
  canonicalName: string
  ean: string | null
}

export function normalizeOffer(offer: Pick<RawOffer, 'title' | 'brandRaw' | 'sizeRaw' | 'categoryRaw' | 'eanRaw'>): NormalizedOffer {
  const brandNorm = normalizeBrand(offer.brandRaw) ?? UNKNOWN_BRAND

  // Many retailers only carry the size inside the title
  let size = parseSize(offer.sizeRaw)
  if (size.value === null) {
    size = parseSize(offer.title)
  }

  return {
    brandNorm,
    size,
    categoryNorm: normalizeCategory(offer.categoryRaw, offer.title),
    canonicalName: normalizeTitle(offer.title, brandNorm === UNKNOWN_BRAND ? null : brandNorm),
    ean: normalizeEan(offer.eanRaw),
  }
}
