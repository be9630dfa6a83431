/**
 * Brand Normalization
 *
 * Shared by the normalizer and the resolver so that brand comparison is
 * deterministic across retailers.
 *
 * Normalization rules:
 * - strip trademark symbols (TM, R, (C))
 * - Unicode normalization (NFKD) + strip diacritics
 * - lowercase
 * - normalize ampersand to "and"
 * - collapse punctuation/separators to whitespace
 * - strip trailing corporate suffix tokens
 * - map known variants through the alias table
 */

import { readFileSync } from 'node:fs'
import { z } from 'zod'

// Bump when rules or the alias table change
export const BRAND_NORMALIZATION_VERSION = 1

const CORPORATE_SUFFIXES = new Set([
  'inc',
  'incorporated',
  'llc',
  'ltd',
  'limited',
  'co',
  'corp',
  'corporation',
  'gmbh',
  'sarl',
  'sa',
  'spa',
  'srl',
  'ltda',
  'bv',
  'nv',
])

const brandAliasFileSchema = z.object({
  version: z.number().int(),
  aliases: z.record(z.string()),
})

function loadBrandAliases(): Map<string, string> {
  const raw = readFileSync(new URL('./data/brand-aliases.json', import.meta.url), 'utf8')
  const file = brandAliasFileSchema.parse(JSON.parse(raw))
  return new Map(Object.entries(file.aliases))
}

const BRAND_ALIASES = loadBrandAliases()

/**
 * Normalize a brand string without applying aliases.
 * Returns null for empty input or when nothing is left after stripping.
 */
export function normalizeBrandString(brand?: string | null): string | null {
  if (!brand || brand.trim().length === 0) {
    return null
  }

  let normalized = brand

  // NFKD turns ™ into "TM", so trademark symbols go first
  normalized = normalized.replace(/[\u2122\u00AE\u00A9]/g, '')
  normalized = normalized.replace(/\((tm|r|c)\)/gi, '')

  normalized = normalized.normalize('NFKD').replace(/[\u0300-\u036f]/g, '')
  normalized = normalized.toLowerCase()
  normalized = normalized.replace(/&/g, ' and ')
  normalized = normalized.replace(/[\/|\\\-_.,;:'"`!?()[\]{}+*]/g, ' ')
  normalized = normalized.replace(/\s+/g, ' ').trim()

  // Only the last two positions can hold a corporate suffix
  const tokens = normalized.split(' ')
  normalized = tokens
    .filter((token, index) => {
      if (index >= tokens.length - 2 && tokens.length > 1) {
        return !CORPORATE_SUFFIXES.has(token)
      }
      return true
    })
    .join(' ')
    .trim()

  return normalized.length > 0 ? normalized : null
}

/**
 * Normalize a raw brand and resolve it to its canonical alias.
 *
 * @example
 * normalizeBrand('La Roche-Posay®') // 'la roche posay'
 * normalizeBrand("L'Oréal Paris")    // 'loreal paris'
 */
export function normalizeBrand(raw?: string | null): string | null {
  const normalized = normalizeBrandString(raw)
  if (normalized === null) return null
  return BRAND_ALIASES.get(normalized) ?? normalized
}

export function getBrandAliasCount(): number {
  return BRAND_ALIASES.size
}
