/**
 * Canonical Matcher
 *
 * Links each raw retailer listing to exactly one canonical product so
 * prices from several retailers can be compared.
 */

export { MATCHER_VERSION, resolveRawProduct, reviewMatch, rankCandidates, computeInputHash } from './resolver'
export type { ResolverDeps } from './resolver'
export { DEFAULT_RESOLVER_CONFIG } from './types'
export type {
  MatchEvidence,
  NormalizedInput,
  ResolveRequest,
  ResolverConfig,
  ResolverResult,
  ScoredCandidate,
  SimilarityResult,
  SimilarityStrategy,
} from './types'
export { ExactEanStrategy, FuzzyTokenStrategy, createFuzzyTokenStrategy } from './scoring'
