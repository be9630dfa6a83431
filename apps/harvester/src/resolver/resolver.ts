/**
 * Canonical Matcher Core Algorithm
 *
 * Deterministically links each raw retailer listing to one canonical
 * product so prices from several retailers can be compared.
 *
 * Algorithm priority:
 * 0. MANUAL_CONFIRMED matches are carried forward untouched, as is any
 *    match whose normalized input and matcher version are unchanged
 * 1. Exact EAN match (confidence 1.0)
 * 2. Fuzzy token match over candidates sharing brand and category
 * 3. No acceptable candidate: create a new canonical product
 *
 * Canonical products the operator REJECTED for a raw product are never
 * proposed for it again.
 */

import { createHash } from 'node:crypto'
import type { CanonicalCandidate, DealcheckStore, JsonObject, MatchStatus, NewProductMatch, ProductMatch } from '@dealcheck/db'
import { logger } from '../config/logger'
import { ExactEanStrategy, FuzzyTokenStrategy } from './scoring'
import {
  DEFAULT_RESOLVER_CONFIG,
  type MatchEvidence,
  type NormalizedInput,
  type ResolveRequest,
  type ResolverConfig,
  type ResolverResult,
  type ScoredCandidate,
  type SimilarityStrategy,
} from './types'

const log = logger.resolver

// Bump on algorithm or threshold changes
export const MATCHER_VERSION = '1.0.0'

export interface ResolverDeps {
  config?: ResolverConfig
  exactStrategy?: SimilarityStrategy
  fuzzyStrategy?: SimilarityStrategy
}

// ═══════════════════════════════════════════════════════════════════════════════
// Logging Helpers
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Resolver-scoped logger; every entry carries the raw product id
 */
function createResolverLog(productRawId: number, pipelineRunId: string | null) {
  return {
    debug: (event: string, meta?: Record<string, unknown>) =>
      log.debug(event, { productRawId, pipelineRunId, ...meta }),
    info: (event: string, meta?: Record<string, unknown>) =>
      log.info(event, { productRawId, pipelineRunId, ...meta }),
    warn: (event: string, meta?: Record<string, unknown>) =>
      log.warn(event, { productRawId, pipelineRunId, ...meta }),
  }
}

type ResolverLog = ReturnType<typeof createResolverLog>

// ═══════════════════════════════════════════════════════════════════════════════
// Helpers
// ═══════════════════════════════════════════════════════════════════════════════

function roundConfidence(value: number, decimals: number): number {
  const factor = 10 ** decimals
  return Math.round(value * factor) / factor
}

/**
 * Hash of the normalized identity, stored in evidence so a later run can
 * tell whether the listing changed.
 */
export function computeInputHash(normalized: NormalizedInput): string {
  const data = JSON.stringify({
    brandNorm: normalized.brandNorm,
    categoryNorm: normalized.categoryNorm,
    canonicalName: normalized.canonicalName,
    size: normalized.size,
    ean: normalized.ean,
    matcherVersion: MATCHER_VERSION,
  })
  return createHash('sha256').update(data).digest('hex')
}

/**
 * Best first: confidence, then most price history, then lowest id
 */
export function rankCandidates(scored: ScoredCandidate[]): ScoredCandidate[] {
  return [...scored].sort(
    (a, b) =>
      b.confidence - a.confidence ||
      b.candidate.historyCount - a.candidate.historyCount ||
      a.candidate.id - b.candidate.id
  )
}

function candidateEvidence(entry: ScoredCandidate): JsonObject {
  return {
    canonicalId: entry.candidate.id,
    canonicalName: entry.candidate.canonicalName,
    confidence: entry.confidence,
    historyCount: entry.candidate.historyCount,
    ...entry.result.components,
  }
}

interface EvidenceParts {
  strategy: SimilarityStrategy | null
  rulesFired: string[]
  candidates: ScoredCandidate[]
  previousMatchId: number | null
}

function buildEvidence(normalized: NormalizedInput, config: ResolverConfig, parts: EvidenceParts): MatchEvidence {
  return {
    matcherVersion: MATCHER_VERSION,
    strategy: parts.strategy?.method ?? 'carry-forward',
    strategyVersion: parts.strategy?.version ?? MATCHER_VERSION,
    inputNormalized: {
      brandNorm: normalized.brandNorm,
      categoryNorm: normalized.categoryNorm,
      canonicalName: normalized.canonicalName,
      sizeValue: normalized.size.value,
      sizeUnit: normalized.size.unit,
      ean: normalized.ean,
    },
    inputHash: computeInputHash(normalized),
    rulesFired: [...parts.rulesFired],
    candidates: parts.candidates.slice(0, config.topKCandidates).map(candidateEvidence),
    thresholds: {
      autoAccept: config.autoAcceptThreshold,
      review: config.reviewThreshold,
    },
    previousMatchId: parts.previousMatchId,
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Main entry point
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Resolve a raw product to a canonical product and record the match.
 *
 * Always writes exactly one product_matches row, superseding the previous
 * active one. May insert one canonical product.
 */
export async function resolveRawProduct(
  store: DealcheckStore,
  request: ResolveRequest,
  deps: ResolverDeps = {}
): Promise<ResolverResult> {
  const startTime = Date.now()
  const config = deps.config ?? DEFAULT_RESOLVER_CONFIG
  const exactStrategy = deps.exactStrategy ?? ExactEanStrategy
  const fuzzyStrategy = deps.fuzzyStrategy ?? FuzzyTokenStrategy
  const { rawProduct, normalized, pipelineRunId } = request
  const rulesFired: string[] = []
  const rlog = createResolverLog(rawProduct.id, pipelineRunId)

  rlog.debug('RESOLVER_START', {
    matcherVersion: MATCHER_VERSION,
    brandNorm: normalized.brandNorm,
    categoryNorm: normalized.categoryNorm,
    hasEan: normalized.ean !== null,
  })

  const record = async (
    canonicalId: number,
    fields: Pick<NewProductMatch, 'matchConfidence' | 'matchMethod' | 'status'>,
    evidence: MatchEvidence,
    createdCanonicalId: number | null = null
  ): Promise<ResolverResult> => {
    const match = await store.productMatches.record({
      productRawId: rawProduct.id,
      productCanonicalId: canonicalId,
      matcherVersion: MATCHER_VERSION,
      evidence,
      pipelineRunId,
      ...fields,
    })
    rlog.info('RESOLVER_END', {
      productCanonicalId: canonicalId,
      matchMethod: match.matchMethod,
      status: match.status,
      confidence: match.matchConfidence,
      rulesFired,
      durationMs: Date.now() - startTime,
    })
    return { match, createdCanonicalId, rulesFired }
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // STEP 0: Manual lock
  // ═══════════════════════════════════════════════════════════════════════════

  const active = await store.productMatches.findActive(rawProduct.id)

  if (active?.status === 'MANUAL_CONFIRMED') {
    rulesFired.push('MANUAL_LOCKED')
    rlog.info('MANUAL_LOCKED', {
      decision: 'carry_forward',
      productCanonicalId: active.productCanonicalId,
      previousMatchId: active.id,
    })
    return record(
      active.productCanonicalId,
      { matchConfidence: 1, matchMethod: 'manual', status: 'MANUAL_CONFIRMED' },
      buildEvidence(normalized, config, { strategy: null, rulesFired, candidates: [], previousMatchId: active.id })
    )
  }

  const previousMatchId = active?.id ?? null
  const inputHash = computeInputHash(normalized)

  const rejectedIds = await store.productMatches.findRejectedCanonicalIds(rawProduct.id)

  // Unchanged listing under the same matcher keeps its decision, unless an
  // operator has since rejected that pairing
  if (
    active &&
    active.matcherVersion === MATCHER_VERSION &&
    active.evidence.inputHash === inputHash &&
    !rejectedIds.includes(active.productCanonicalId)
  ) {
    rulesFired.push('SKIP_SAME_INPUT')
    rlog.debug('SKIP_SAME_INPUT', {
      productCanonicalId: active.productCanonicalId,
      previousMatchId: active.id,
      status: active.status,
    })
    return record(
      active.productCanonicalId,
      { matchConfidence: active.matchConfidence, matchMethod: active.matchMethod, status: active.status },
      buildEvidence(normalized, config, { strategy: null, rulesFired, candidates: [], previousMatchId })
    )
  }

  if (rejectedIds.length > 0) {
    rulesFired.push('REJECTED_EXCLUDED')
    rlog.debug('REJECTED_CANONICALS_EXCLUDED', { rejectedIds })
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // STEP 1: Exact EAN
  // ═══════════════════════════════════════════════════════════════════════════

  if (normalized.ean) {
    rulesFired.push('EAN_MATCH_ATTEMPTED')
    const byEan = await store.canonicalProducts.findByEan(normalized.ean, rejectedIds)
    const scored = rankCandidates(byEan.map((candidate) => score(exactStrategy, normalized, candidate, config)))
    const best = scored[0]

    if (best && best.confidence === 1) {
      rulesFired.push('EAN_MATCHED')
      return record(
        best.candidate.id,
        { matchConfidence: best.confidence, matchMethod: exactStrategy.method, status: 'AUTO_ACCEPTED' },
        buildEvidence(normalized, config, { strategy: exactStrategy, rulesFired, candidates: scored, previousMatchId })
      )
    }
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // STEP 2: Fuzzy candidates
  // ═══════════════════════════════════════════════════════════════════════════

  rulesFired.push('FUZZY_MATCH_ATTEMPTED')

  // +1 to detect overflow
  const fetched = await store.canonicalProducts.findCandidates({
    brandNorm: normalized.brandNorm,
    categoryNorm: normalized.categoryNorm,
    excludeIds: rejectedIds,
    limit: config.maxCandidates + 1,
  })

  if (fetched.length > config.maxCandidates) {
    rulesFired.push('CANDIDATE_OVERFLOW')
    rlog.warn('FUZZY_CANDIDATE_OVERFLOW', {
      candidateCount: fetched.length,
      maxCandidates: config.maxCandidates,
    })
  }

  // A different valid barcode is a different product
  const candidates = fetched.slice(0, config.maxCandidates).filter((candidate) => {
    return normalized.ean === null || candidate.ean === null || candidate.ean === normalized.ean
  })
  if (candidates.length < Math.min(fetched.length, config.maxCandidates)) {
    rulesFired.push('EAN_CONFLICT_EXCLUDED')
  }

  const ranked = rankCandidates(candidates.map((candidate) => score(fuzzyStrategy, normalized, candidate, config)))
  const best = ranked[0]

  rlog.debug('FUZZY_SCORING_COMPLETE', {
    candidateCount: ranked.length,
    bestConfidence: best?.confidence ?? null,
    topCandidates: ranked.slice(0, 3).map((entry) => ({
      canonicalId: entry.candidate.id,
      confidence: entry.confidence,
    })),
  })

  // ═══════════════════════════════════════════════════════════════════════════
  // STEP 3: Decide
  // ═══════════════════════════════════════════════════════════════════════════

  if (best && best.confidence >= config.reviewThreshold) {
    const status: MatchStatus = best.confidence >= config.autoAcceptThreshold ? 'AUTO_ACCEPTED' : 'PENDING_REVIEW'
    rulesFired.push(status === 'AUTO_ACCEPTED' ? 'FUZZY_MATCHED' : 'FUZZY_AMBIGUOUS')
    if (status === 'PENDING_REVIEW') {
      rlog.info('FUZZY_AMBIGUOUS', {
        decision: 'PENDING_REVIEW',
        productCanonicalId: best.candidate.id,
        confidence: best.confidence,
      })
    }
    return record(
      best.candidate.id,
      { matchConfidence: best.confidence, matchMethod: fuzzyStrategy.method, status },
      buildEvidence(normalized, config, { strategy: fuzzyStrategy, rulesFired, candidates: ranked, previousMatchId })
    )
  }

  rulesFired.push('CANONICAL_CREATED')
  const created = await store.canonicalProducts.create({
    canonicalName: normalized.canonicalName,
    brandNorm: normalized.brandNorm,
    sizeValue: normalized.size.value,
    sizeUnit: normalized.size.unit,
    categoryNorm: normalized.categoryNorm,
    ean: normalized.ean,
  })
  rlog.info('CANONICAL_CREATED', {
    productCanonicalId: created.id,
    canonicalName: created.canonicalName,
    bestRejectedConfidence: best?.confidence ?? null,
  })

  return record(
    created.id,
    { matchConfidence: 1, matchMethod: 'new-canonical', status: 'AUTO_ACCEPTED' },
    buildEvidence(normalized, config, { strategy: fuzzyStrategy, rulesFired, candidates: ranked, previousMatchId }),
    created.id
  )
}

function score(
  strategy: SimilarityStrategy,
  normalized: NormalizedInput,
  candidate: CanonicalCandidate,
  config: ResolverConfig
): ScoredCandidate {
  const result = strategy.score(normalized, candidate)
  return { candidate, result, confidence: roundConfidence(result.score, config.confidenceDecimals) }
}

/**
 * Operator review: confirm pins the active match, reject excludes the
 * pairing so the next run resolves the raw product elsewhere.
 */
export async function reviewMatch(
  store: DealcheckStore,
  matchId: number,
  decision: 'confirm' | 'reject'
): Promise<ProductMatch> {
  const status = decision === 'confirm' ? 'MANUAL_CONFIRMED' : 'REJECTED'
  const updated = await store.productMatches.setStatus(matchId, status)
  log.info('MATCH_REVIEWED', {
    matchId,
    productRawId: updated.productRawId,
    productCanonicalId: updated.productCanonicalId,
    status,
  })
  return updated
}
