import { describe, it, expect } from 'vitest'
import type { CanonicalCandidate } from '@dealcheck/db'
import { createFuzzyTokenStrategy, DEFAULT_FUZZY_TOKEN_OPTIONS, FuzzyTokenStrategy } from '../fuzzy-token'
import { ExactEanStrategy } from '../exact-ean'
import { createNormalizedInput } from '../../__tests__/factories'

function candidate(overrides: Partial<CanonicalCandidate> = {}): CanonicalCandidate {
  return {
    id: 1,
    canonicalName: 'crema hidratante facial',
    brandNorm: 'cerave',
    sizeValue: 50,
    sizeUnit: 'ml',
    categoryNorm: 'moisturizer',
    ean: null,
    createdAt: new Date('2026-01-01T00:00:00Z'),
    historyCount: 0,
    ...overrides,
  }
}

describe('FuzzyTokenStrategy', () => {
  it('scores identical name and size as 1', () => {
    const result = FuzzyTokenStrategy.score(createNormalizedInput(), candidate())
    expect(result.score).toBeCloseTo(1, 10)
    expect(result.components.sizeFactor).toBe(1)
  })

  it('accepts sizes within 2%', () => {
    const result = FuzzyTokenStrategy.score(createNormalizedInput(), candidate({ sizeValue: 51 }))
    expect(result.components.sizeFactor).toBe(1)
  })

  it('penalizes a known size mismatch', () => {
    const result = FuzzyTokenStrategy.score(createNormalizedInput(), candidate({ sizeValue: 100 }))
    expect(result.components.sizeFactor).toBe(0.2)
    expect(result.score).toBeCloseTo(0.2, 10)
  })

  it('penalizes a unit mismatch', () => {
    const result = FuzzyTokenStrategy.score(createNormalizedInput(), candidate({ sizeUnit: 'g' }))
    expect(result.components.sizeFactor).toBe(0.2)
  })

  it('discounts an unknown size less than a mismatch', () => {
    const result = FuzzyTokenStrategy.score(
      createNormalizedInput(),
      candidate({ sizeValue: null, sizeUnit: null })
    )
    expect(result.components.sizeFactor).toBe(0.85)
  })

  it('blends cosine and jaccard', () => {
    const result = FuzzyTokenStrategy.score(
      createNormalizedInput({ canonicalName: 'crema hidratante' }),
      candidate({ canonicalName: 'crema facial' })
    )
    expect(result.components.cosine).toBeCloseTo(0.3361, 3)
    expect(result.components.jaccard).toBeCloseTo(1 / 3, 10)
    expect(result.score).toBeCloseTo(0.3353, 3)
  })

  it('rejects name weights that do not sum to 1', () => {
    expect(() =>
      createFuzzyTokenStrategy({ ...DEFAULT_FUZZY_TOKEN_OPTIONS, cosineWeight: 0.9 })
    ).toThrow('Name weights must sum to 1.0')
  })
})

describe('ExactEanStrategy', () => {
  it('scores 1 only for equal barcodes', () => {
    const input = createNormalizedInput({ ean: '7801234567894' })
    expect(ExactEanStrategy.score(input, candidate({ ean: '7801234567894' })).score).toBe(1)
    expect(ExactEanStrategy.score(input, candidate({ ean: '12345670' })).score).toBe(0)
    expect(ExactEanStrategy.score(createNormalizedInput(), candidate()).score).toBe(0)
  })
})
