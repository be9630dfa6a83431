/**
 * Product attribute extraction for retailer listings.
 *
 * Every function here is pure and total: malformed input yields null (or the
 * catch-all category), never an exception.
 */

import { readFileSync } from 'node:fs'
import { z } from 'zod'

// =============================================================================
// TEXT FOLDING
// =============================================================================

/** Lowercase and strip diacritics, keeping punctuation */
export function foldText(text: string): string {
  return text.normalize('NFKD').replace(/[\u0300-\u036f]/g, '').toLowerCase()
}

/** Fold and turn every non-alphanumeric run into a single space */
export function foldWords(text: string): string {
  return foldText(text)
    .replace(/[^a-z0-9]+/g, ' ')
    .trim()
}

function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals
  return Math.round(value * factor) / factor
}

// =============================================================================
// SIZE PARSING
// =============================================================================

export type SizeUnit = 'ml' | 'g' | 'un'

export interface ParsedSize {
  value: number | null
  unit: SizeUnit | null
}

/** Any size pair, including stored canonical columns */
export interface SizeLike {
  value: number | null
  unit: string | null
}

interface UnitConversion {
  unit: SizeUnit
  factor: number
  decimals: number
}

const UNIT_CONVERSIONS: Record<string, UnitConversion> = {
  ml: { unit: 'ml', factor: 1, decimals: 3 },
  cl: { unit: 'ml', factor: 10, decimals: 3 },
  l: { unit: 'ml', factor: 1000, decimals: 3 },
  lt: { unit: 'ml', factor: 1000, decimals: 3 },
  lts: { unit: 'ml', factor: 1000, decimals: 3 },
  litro: { unit: 'ml', factor: 1000, decimals: 3 },
  litros: { unit: 'ml', factor: 1000, decimals: 3 },
  oz: { unit: 'ml', factor: 29.5735, decimals: 1 },
  floz: { unit: 'ml', factor: 29.5735, decimals: 1 },
  g: { unit: 'g', factor: 1, decimals: 3 },
  gr: { unit: 'g', factor: 1, decimals: 3 },
  grs: { unit: 'g', factor: 1, decimals: 3 },
  gramo: { unit: 'g', factor: 1, decimals: 3 },
  gramos: { unit: 'g', factor: 1, decimals: 3 },
  kg: { unit: 'g', factor: 1000, decimals: 3 },
  mg: { unit: 'g', factor: 0.001, decimals: 3 },
  un: { unit: 'un', factor: 1, decimals: 0 },
  u: { unit: 'un', factor: 1, decimals: 0 },
  und: { unit: 'un', factor: 1, decimals: 0 },
  uds: { unit: 'un', factor: 1, decimals: 0 },
  unidad: { unit: 'un', factor: 1, decimals: 0 },
  unidades: { unit: 'un', factor: 1, decimals: 0 },
  caps: { unit: 'un', factor: 1, decimals: 0 },
  capsulas: { unit: 'un', factor: 1, decimals: 0 },
  comprimidos: { unit: 'un', factor: 1, decimals: 0 },
  tabletas: { unit: 'un', factor: 1, decimals: 0 },
}

// Longer spellings are listed before their prefixes
const SIZE_PATTERN =
  /(\d+(?:[.,]\d+)?)\s*(fl\.?\s?oz|ml|cl|lts?|litros?|l|kg|mg|grs?|gramos?|g|oz|unidades|unidad|und|uds|un|u|caps|capsulas|comprimidos|tabletas)(?![a-z])/
const SIZE_PATTERN_GLOBAL = new RegExp(SIZE_PATTERN.source, 'g')

// "x 30", "x30" (pack counts)
const COUNT_PATTERN = /(?:^|[^a-z0-9])x\s*(\d+)(?![\d.,])/
const COUNT_PATTERN_GLOBAL = /(?:^|[^a-z0-9])x\s*\d+(?![\d.,])/g

const EMPTY_SIZE: ParsedSize = { value: null, unit: null }

/**
 * Parse a size expression into a canonical value and unit.
 *
 * Volumes become ml, masses become g and counts become un.
 *
 * @example
 * parseSize('150 ml')  // { value: 150, unit: 'ml' }
 * parseSize('1,5 L')   // { value: 1500, unit: 'ml' }
 * parseSize('x 30')    // { value: 30, unit: 'un' }
 */
export function parseSize(raw?: string | null): ParsedSize {
  if (!raw) return { ...EMPTY_SIZE }

  const text = foldText(raw)

  const match = text.match(SIZE_PATTERN)
  if (match) {
    const amount = Number.parseFloat(match[1].replace(',', '.'))
    const unitKey = match[2].replace(/[.\s]/g, '')
    const conversion = UNIT_CONVERSIONS[unitKey]
    if (conversion && Number.isFinite(amount) && amount > 0) {
      return {
        value: roundTo(amount * conversion.factor, conversion.decimals),
        unit: conversion.unit,
      }
    }
  }

  const countMatch = text.match(COUNT_PATTERN)
  if (countMatch) {
    const count = Number.parseInt(countMatch[1], 10)
    if (count > 0) {
      return { value: count, unit: 'un' }
    }
  }

  return { ...EMPTY_SIZE }
}

/**
 * Two sizes match when they share a unit and differ by at most
 * `tolerance` relative to the larger value.
 */
export function sizesMatch(a: SizeLike, b: SizeLike, tolerance = 0.02): boolean {
  if (a.value === null || b.value === null || a.unit === null || b.unit === null) {
    return false
  }
  if (a.unit !== b.unit) return false
  const larger = Math.max(a.value, b.value)
  return Math.abs(a.value - b.value) <= larger * tolerance
}

// =============================================================================
// CATEGORY
// =============================================================================

const categoryTaxonomySchema = z.object({
  version: z.number().int(),
  fallback: z.string().min(1),
  categories: z
    .array(
      z.object({
        category: z.string().min(1),
        keywords: z.array(z.string().min(1)).min(1),
      })
    )
    .min(1),
})

export type CategoryNorm = string

interface CategoryRule {
  category: CategoryNorm
  keywords: string[]
}

function loadCategoryTaxonomy(): { fallback: CategoryNorm; rules: CategoryRule[] } {
  const raw = readFileSync(new URL('./data/category-taxonomy.json', import.meta.url), 'utf8')
  const taxonomy = categoryTaxonomySchema.parse(JSON.parse(raw))
  return {
    fallback: taxonomy.fallback,
    rules: taxonomy.categories.map((entry) => ({
      category: entry.category,
      keywords: entry.keywords.map(foldWords),
    })),
  }
}

const CATEGORY_TAXONOMY = loadCategoryTaxonomy()

export const FALLBACK_CATEGORY: CategoryNorm = CATEGORY_TAXONOMY.fallback

function matchCategory(text: string): CategoryNorm | null {
  const padded = ` ${foldWords(text)} `
  if (padded.trim().length === 0) return null

  for (const rule of CATEGORY_TAXONOMY.rules) {
    if (rule.keywords.some((keyword) => padded.includes(` ${keyword} `))) {
      return rule.category
    }
  }
  return null
}

/**
 * Map a retailer category (falling back to the title) onto the taxonomy.
 * Rules are tried in file order; the first keyword hit wins.
 */
export function normalizeCategory(categoryRaw?: string | null, title?: string | null): CategoryNorm {
  if (categoryRaw) {
    const fromCategory = matchCategory(categoryRaw)
    if (fromCategory) return fromCategory
  }
  if (title) {
    const fromTitle = matchCategory(title)
    if (fromTitle) return fromTitle
  }
  return FALLBACK_CATEGORY
}

export function getCategoryNames(): CategoryNorm[] {
  return [...CATEGORY_TAXONOMY.rules.map((rule) => rule.category), FALLBACK_CATEGORY]
}

// =============================================================================
// TITLE
// =============================================================================

/**
 * Build the canonical name used for fuzzy matching: folded title without
 * brand tokens or size expressions.
 *
 * @example
 * normalizeTitle('CeraVe Crema Hidratante 340 g', 'cerave') // 'crema hidratante'
 */
export function normalizeTitle(title: string, brandNorm?: string | null): string {
  const withoutSizes = foldText(title)
    .replace(SIZE_PATTERN_GLOBAL, ' ')
    .replace(COUNT_PATTERN_GLOBAL, ' ')

  let words = foldWords(withoutSizes)

  if (brandNorm) {
    const brandWords = foldWords(brandNorm)
    if (brandWords.length > 0) {
      words = ` ${words} `.split(` ${brandWords} `).join(' ')
    }
  }

  const collapsed = words.replace(/\s+/g, ' ').trim()
  // A title that is only brand and size still needs a name
  return collapsed.length > 0 ? collapsed : foldWords(title)
}

// =============================================================================
// EAN / GTIN
// =============================================================================

const GTIN_LENGTHS = new Set([8, 12, 13, 14])

/** GTIN check digit: weights 3,1,3,... from the rightmost data digit */
export function gtinCheckDigit(data: string): number {
  let sum = 0
  for (let i = 0; i < data.length; i++) {
    const digit = Number(data[data.length - 1 - i])
    sum += digit * (i % 2 === 0 ? 3 : 1)
  }
  return (10 - (sum % 10)) % 10
}

/**
 * Normalize a barcode to digits with a verified check digit.
 * UPC-A (12 digits) is padded to EAN-13.
 *
 * @example
 * normalizeEan('012345678905')   // '0012345678905'
 * normalizeEan('7801234567890')  // null (bad check digit)
 */
export function normalizeEan(raw?: string | null): string | null {
  if (!raw) return null

  const digits = raw.replace(/\D/g, '')
  if (!GTIN_LENGTHS.has(digits.length)) return null
  if (/^0+$/.test(digits)) return null

  const check = Number(digits[digits.length - 1])
  if (gtinCheckDigit(digits.slice(0, -1)) !== check) return null

  return digits.length === 12 ? `0${digits}` : digits
}
