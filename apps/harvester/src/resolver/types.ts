/**
 * Canonical Matcher Types
 *
 * Type definitions for the resolver algorithm and evidence storage.
 */

import type { CanonicalCandidate, JsonObject, MatchMethod, MatchStatus, ProductMatch, RawProduct } from '@dealcheck/db'
import type { NormalizedOffer } from '../normalizer'

/**
 * Normalized identity of the raw product being matched
 */
export type NormalizedInput = NormalizedOffer

/**
 * Result of one strategy on one candidate
 */
export interface SimilarityResult {
  /** 0..1 */
  score: number
  /** Named sub-scores recorded in evidence */
  components: Record<string, number>
}

/**
 * Pluggable similarity metric. Strategies only score; acceptance
 * thresholds live in ResolverConfig.
 */
export interface SimilarityStrategy {
  readonly method: Extract<MatchMethod, 'exact-ean' | 'fuzzy-token'>
  readonly version: string
  score(input: NormalizedInput, candidate: CanonicalCandidate): SimilarityResult
}

export interface ScoredCandidate {
  candidate: CanonicalCandidate
  result: SimilarityResult
  /** Score rounded for ranking and threshold comparison */
  confidence: number
}

/**
 * Evidence stored in product_matches.evidence. A type alias (not an
 * interface) so it stays assignable to JsonObject.
 */
export type MatchEvidence = {
  matcherVersion: string
  strategy: string
  strategyVersion: string
  inputNormalized: {
    brandNorm: string
    categoryNorm: string
    canonicalName: string
    sizeValue: number | null
    sizeUnit: string | null
    ean: string | null
  }
  inputHash: string
  rulesFired: string[]
  candidates: JsonObject[]
  thresholds: {
    autoAccept: number
    review: number
  }
  previousMatchId: number | null
}

export interface ResolverResult {
  match: ProductMatch
  /** Canonical product inserted by this resolution, if any */
  createdCanonicalId: number | null
  rulesFired: string[]
}

export interface ResolveRequest {
  rawProduct: RawProduct
  normalized: NormalizedInput
  pipelineRunId: string | null
}

/**
 * Resolver configuration (runtime)
 */
export interface ResolverConfig {
  maxCandidates: number
  /** Candidates kept in evidence */
  topKCandidates: number
  autoAcceptThreshold: number
  reviewThreshold: number
  /** Decimals used when comparing confidences */
  confidenceDecimals: number
}

export const DEFAULT_RESOLVER_CONFIG: ResolverConfig = {
  maxCandidates: 200,
  topKCandidates: 5,
  autoAcceptThreshold: 0.9,
  reviewThreshold: 0.7,
  confidenceDecimals: 4,
}

