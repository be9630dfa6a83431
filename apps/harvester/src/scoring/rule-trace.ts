/**
 * rule_trace serialization.
 *
 * The R1..R6 keys and anchor_spike_pct are read by the explanation UI and
 * must keep their names across scoring versions. Other keys are additive.
 */

import type { DealLabel } from '@dealcheck/db'
import { signalToJson, type RuleEvaluation } from '../evaluator'

export const RULE_TRACE_CONTRACT_KEYS = [
  'R1_hist_delta_ge_15pct',
  'R2_anchor_spike_le_10pct',
  'R3_cross_store_ge_5pct',
  'R4_seen_multiple_snapshots',
  'R5_has_enough_history',
  'R6_visible_discount_ge_10pct',
  'anchor_spike_pct',
] as const

export type LabelGate = 'VISIBLE_DISCOUNT_BELOW_MIN' | 'NO_VISIBLE_DISCOUNT' | 'INSUFFICIENT_EVIDENCE' | 'ANCHOR_ANOMALY'

// Type alias so the trace is assignable to a JSON column
export type RuleTrace = {
  R1_hist_delta_ge_15pct: boolean | null
  R2_anchor_spike_le_10pct: boolean | null
  R3_cross_store_ge_5pct: boolean | null
  R4_seen_multiple_snapshots: boolean | null
  R5_has_enough_history: boolean | null
  R6_visible_discount_ge_10pct: boolean | null
  anchor_spike_pct: number | null
  discount_pct: number | null
  hist_delta_pct: number | null
  cross_store_delta_pct: number | null
  peer_count: number
  history_count: number
  history_span_days: number | null
  weighted_score: number
  base_label: DealLabel
  gates: LabelGate[]
}

export function buildRuleTrace(
  evaluation: RuleEvaluation,
  outcome: { score: number; baseLabel: DealLabel; gates: LabelGate[] }
): RuleTrace {
  const { signals, metrics } = evaluation
  return {
    R1_hist_delta_ge_15pct: signalToJson(signals.R1),
    R2_anchor_spike_le_10pct: signalToJson(signals.R2),
    R3_cross_store_ge_5pct: signalToJson(signals.R3),
    R4_seen_multiple_snapshots: signalToJson(signals.R4),
    R5_has_enough_history: signalToJson(signals.R5),
    R6_visible_discount_ge_10pct: signalToJson(signals.R6),
    anchor_spike_pct: metrics.anchorSpikePct,
    discount_pct: metrics.discountPct,
    hist_delta_pct: metrics.histDeltaPct,
    cross_store_delta_pct: metrics.crossStoreDeltaPct,
    peer_count: metrics.peerCount,
    history_count: metrics.historyCount,
    history_span_days: metrics.historySpanDays,
    weighted_score: outcome.score,
    base_label: outcome.baseLabel,
    gates: [...outcome.gates],
  }
}
