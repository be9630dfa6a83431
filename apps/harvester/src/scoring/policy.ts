/**
 * Versioned scoring policies.
 *
 * Every evaluation records the version that produced it, so a policy is
 * never edited in place: recalibration adds a new version.
 */

import { DealcheckError } from '@dealcheck/db'
import type { RuleThresholds } from '../evaluator'

export const WEIGHTED_RULES = ['R1', 'R2', 'R3', 'R4', 'R5'] as const
export type WeightedRule = (typeof WEIGHTED_RULES)[number]

export interface LabelThresholds {
  /** REAL needs at least this score plus R1 and R3 true and R2 not false */
  realMinScore: number
  likelyRealMinScore: number
  /** Scores below this are LIKELY_FAKE */
  likelyFakeMaxScore: number
  /** anchor_spike_pct above this forces LIKELY_FAKE */
  anchorAnomalyMin: number
}

export interface ScoringPolicy {
  version: string
  weights: Record<WeightedRule, number>
  labels: LabelThresholds
  rules: RuleThresholds
}

export const DEFAULT_SCORING_VERSION = 'v1'

const V1: ScoringPolicy = {
  version: 'v1',
  weights: {
    R1: 0.35,
    R3: 0.3,
    R2: 0.15,
    R4: 0.1,
    R5: 0.1,
  },
  labels: {
    realMinScore: 0.75,
    likelyRealMinScore: 0.55,
    likelyFakeMaxScore: 0.3,
    anchorAnomalyMin: 0.25,
  },
  rules: {
    histDeltaMax: -0.15,
    minPriorSnapshots: 2,
    anchorSpikeMax: 0.1,
    crossStoreDeltaMax: -0.05,
    crossStoreMaxAgeDays: 7,
    minSnapshots: 2,
    minHistorySpanDays: 7,
    minVisibleDiscount: 0.1,
    lookbackDays: 90,
  },
}

export const SCORING_POLICIES: Readonly<Record<string, ScoringPolicy>> = {
  v1: V1,
}

export class UnknownScoringVersionError extends DealcheckError {
  constructor(version: string) {
    super(
      'UNKNOWN_SCORING_VERSION',
      `Unknown scoring version "${version}" (known: ${Object.keys(SCORING_POLICIES).join(', ')})`
    )
  }
}

export function getScoringPolicy(version: string = DEFAULT_SCORING_VERSION): ScoringPolicy {
  const policy = SCORING_POLICIES[version]
  if (!policy) throw new UnknownScoringVersionError(version)
  return policy
}
