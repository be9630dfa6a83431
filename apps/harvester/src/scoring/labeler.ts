/**
 * Scorer/Labeler
 *
 * Weighted score over the non-absent signals R1..R5, a base label from the
 * score, then hard gates that can only lower the label. Gates run after
 * the score so the trace can show "high score but gated".
 */

import { DEAL_LABELS, type DealLabel } from '@dealcheck/db'
import { isAbsent, isFalse, isTrue, roundTo, type RuleEvaluation } from '../evaluator'
import { WEIGHTED_RULES, type ScoringPolicy } from './policy'
import { buildRuleTrace, type LabelGate, type RuleTrace } from './rule-trace'

export interface ScoreResult {
  score: number
  label: DealLabel
  baseLabel: DealLabel
  gates: LabelGate[]
  anchorAnomalyFlag: boolean
  discountPct: number | null
  histDeltaPct: number | null
  crossStoreDeltaPct: number | null
  ruleTrace: RuleTrace
  scoringVersion: string
}

function labelRank(label: DealLabel): number {
  return DEAL_LABELS.indexOf(label)
}

/** Lower `label` to `ceiling` if it is above it */
export function capLabel(label: DealLabel, ceiling: DealLabel): DealLabel {
  return labelRank(label) > labelRank(ceiling) ? ceiling : label
}

/**
 * Σ wᵢ·[signalᵢ true] / Σ wᵢ over non-absent signals, in [0, 1]
 */
export function weightedScore(evaluation: RuleEvaluation, policy: ScoringPolicy): number {
  let earned = 0
  let available = 0

  for (const rule of WEIGHTED_RULES) {
    const weight = policy.weights[rule]
    const signal = evaluation.signals[rule]
    if (isAbsent(signal)) continue
    available += weight
    if (isTrue(signal)) earned += weight
  }

  return available === 0 ? 0 : roundTo(earned / available, 4)
}

export function baseLabelFor(score: number, evaluation: RuleEvaluation, policy: ScoringPolicy): DealLabel {
  const { signals } = evaluation
  const { labels } = policy

  if (score >= labels.realMinScore && isTrue(signals.R1) && isTrue(signals.R3) && !isFalse(signals.R2)) {
    return 'REAL'
  }
  if (score >= labels.likelyRealMinScore) return 'LIKELY_REAL'
  if (score < labels.likelyFakeMaxScore) return 'LIKELY_FAKE'
  return 'SUSPICIOUS'
}

export function scoreEvaluation(evaluation: RuleEvaluation, policy: ScoringPolicy): ScoreResult {
  const { signals, metrics } = evaluation
  const score = weightedScore(evaluation, policy)
  const baseLabel = baseLabelFor(score, evaluation, policy)
  const gates: LabelGate[] = []
  let label = baseLabel

  if (isFalse(signals.R6)) {
    gates.push('VISIBLE_DISCOUNT_BELOW_MIN')
    label = capLabel(label, 'SUSPICIOUS')
  } else if (isAbsent(signals.R6)) {
    gates.push('NO_VISIBLE_DISCOUNT')
    label = capLabel(label, 'SUSPICIOUS')
  }

  if (isAbsent(signals.R1) && isAbsent(signals.R3)) {
    gates.push('INSUFFICIENT_EVIDENCE')
    label = capLabel(label, 'SUSPICIOUS')
  }

  const anchorAnomalyFlag =
    metrics.anchorSpikePct !== null && metrics.anchorSpikePct > policy.labels.anchorAnomalyMin
  if (anchorAnomalyFlag) {
    gates.push('ANCHOR_ANOMALY')
    label = 'LIKELY_FAKE'
  }

  return {
    score,
    label,
    baseLabel,
    gates,
    anchorAnomalyFlag,
    discountPct: metrics.discountPct,
    histDeltaPct: metrics.histDeltaPct,
    crossStoreDeltaPct: metrics.crossStoreDeltaPct,
    ruleTrace: buildRuleTrace(evaluation, { score, baseLabel, gates }),
    scoringVersion: policy.version,
  }
}
