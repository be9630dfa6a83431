/**
 * Similarity Strategy Registry
 */

export { ExactEanStrategy } from './exact-ean'
export { FuzzyTokenStrategy, createFuzzyTokenStrategy, DEFAULT_FUZZY_TOKEN_OPTIONS } from './fuzzy-token'
export type { FuzzyTokenOptions } from './fuzzy-token'
export { tfidfCosineSimilarity, jaccardSimilarity, tokenize, toBag } from './text-similarity'
export type { TokenBag } from './text-similarity'
