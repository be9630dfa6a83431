import { describe, it, expect } from 'vitest'
import { normalizeBrand, normalizeBrandString, getBrandAliasCount } from '../brand'

describe('normalizeBrandString', () => {
  it('strips trademark symbols and punctuation', () => {
    expect(normalizeBrandString('La Roche-Posay®')).toBe('la roche posay')
    expect(normalizeBrandString('Neutrogena(TM)')).toBe('neutrogena')
  })

  it('strips diacritics', () => {
    expect(normalizeBrandString('Avène')).toBe('avene')
  })

  it('normalizes ampersand and trailing corporate suffixes', () => {
    expect(normalizeBrandString('Johnson & Johnson Inc.')).toBe('johnson and johnson')
  })

  it('keeps a brand that is only a suffix token', () => {
    expect(normalizeBrandString('Co')).toBe('co')
  })

  it('returns null for empty input', () => {
    expect(normalizeBrandString(null)).toBeNull()
    expect(normalizeBrandString('   ')).toBeNull()
    expect(normalizeBrandString('™')).toBeNull()
  })
})

describe('normalizeBrand', () => {
  it('maps known variants through the alias table', () => {
    expect(normalizeBrand("L'Oréal Paris")).toBe('loreal paris')
    expect(normalizeBrand('LRP')).toBe('la roche posay')
    expect(normalizeBrand('Eucerin Sun')).toBe('eucerin')
  })

  it('passes unknown brands through normalized', () => {
    expect(normalizeBrand('Marca Nueva SpA')).toBe('marca nueva')
  })

  it('loads the alias table', () => {
    expect(getBrandAliasCount()).toBeGreaterThan(10)
  })
})
