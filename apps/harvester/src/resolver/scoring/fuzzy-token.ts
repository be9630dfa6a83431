/**
 * Fuzzy Token Strategy
 *
 * nameSimilarity × sizeFactor, where nameSimilarity blends TF-IDF cosine
 * and Jaccard over canonical-name tokens and sizeFactor penalizes a size
 * mismatch harder than a missing size.
 */

import type { SimilarityStrategy } from '../types'
import { sizesMatch } from '../../normalizer'
import { jaccard as jaccardOf, tfidfCosine, toBag, type TokenBag } from './text-similarity'

export interface FuzzyTokenOptions {
  cosineWeight: number
  jaccardWeight: number
  /** Relative difference under which two sizes are the same */
  sizeTolerance: number
  sizeMatchFactor: number
  sizeMismatchFactor: number
  sizeUnknownFactor: number
}

export const DEFAULT_FUZZY_TOKEN_OPTIONS: FuzzyTokenOptions = {
  cosineWeight: 0.7,
  jaccardWeight: 0.3,
  sizeTolerance: 0.02,
  sizeMatchFactor: 1.0,
  sizeMismatchFactor: 0.2,
  sizeUnknownFactor: 0.85,
}

/**
 * Create a fuzzy token strategy
 *
 * Keeps the input's token bag across calls, so scoring one offer against
 * many candidates tokenizes the offer once.
 */
export function createFuzzyTokenStrategy(
  options: FuzzyTokenOptions = DEFAULT_FUZZY_TOKEN_OPTIONS,
  version: string = '1.0.0'
): SimilarityStrategy {
  const sum = options.cosineWeight + options.jaccardWeight
  if (Math.abs(sum - 1.0) > 0.001) {
    throw new Error(`Name weights must sum to 1.0, got ${sum}`)
  }

  let cachedInputName: string | null = null
  let cachedInputBag: TokenBag = toBag('')

  return {
    method: 'fuzzy-token',
    version,

    score(input, candidate) {
      if (input.canonicalName !== cachedInputName) {
        cachedInputBag = toBag(input.canonicalName)
        cachedInputName = input.canonicalName
      }

      const candidateBag = toBag(candidate.canonicalName)
      const cosine = tfidfCosine(cachedInputBag, candidateBag)
      const jaccard = jaccardOf(cachedInputBag, candidateBag)
      const nameSimilarity = options.cosineWeight * cosine + options.jaccardWeight * jaccard

      const candidateSize = { value: candidate.sizeValue, unit: candidate.sizeUnit }
      let sizeFactor: number
      if (input.size.value === null || candidateSize.value === null) {
        sizeFactor = options.sizeUnknownFactor
      } else if (sizesMatch(input.size, candidateSize, options.sizeTolerance)) {
        sizeFactor = options.sizeMatchFactor
      } else {
        sizeFactor = options.sizeMismatchFactor
      }

      return {
        score: nameSimilarity * sizeFactor,
        components: { cosine, jaccard, nameSimilarity, sizeFactor },
      }
    },
  }
}

export const FuzzyTokenStrategy = createFuzzyTokenStrategy()
