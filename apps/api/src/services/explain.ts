/**
 * Deal explanations
 *
 * Human-readable reasons for a label, derived from the stored rule_trace
 * alone so an explanation never disagrees with what was evaluated.
 */

import type { JsonObject } from '@dealcheck/db'

const RULE_KEYS = [
  'R1_hist_delta_ge_15pct',
  'R2_anchor_spike_le_10pct',
  'R3_cross_store_ge_5pct',
  'R4_seen_multiple_snapshots',
  'R5_has_enough_history',
  'R6_visible_discount_ge_10pct',
] as const

export type RuleKey = (typeof RULE_KEYS)[number]

export interface RuleCheck {
  key: RuleKey
  description: string
  /** null when the rule could not be evaluated */
  passed: boolean | null
}

export interface DealExplanation {
  reasons: string[]
  rules: RuleCheck[]
  anchorSpikePct: number | null
}

const RULE_DESCRIPTIONS: Record<RuleKey, string> = {
  R1_hist_delta_ge_15pct: 'Price at least 15% below its recent median',
  R2_anchor_spike_le_10pct: 'List price at most 10% above its usual level',
  R3_cross_store_ge_5pct: 'Price at least 5% below other retailers',
  R4_seen_multiple_snapshots: 'Seen in more than one snapshot',
  R5_has_enough_history: 'Price history spans enough days',
  R6_visible_discount_ge_10pct: 'Visible discount of at least 10%',
}

export const DEFAULT_REASON = 'The label follows the weighted score of the rules.'

function flag(trace: JsonObject, key: string): boolean | null {
  const value = trace[key]
  return typeof value === 'boolean' ? value : null
}

function numeric(trace: JsonObject, key: string): number | null {
  const value = trace[key]
  return typeof value === 'number' ? value : null
}

function gates(trace: JsonObject): string[] {
  const value = trace.gates
  return Array.isArray(value) ? value.filter((gate): gate is string => typeof gate === 'string') : []
}

export function explainRuleTrace(trace: JsonObject): DealExplanation {
  const reasons: string[] = []
  const traceGates = gates(trace)

  const visibleDiscount = flag(trace, 'R6_visible_discount_ge_10pct')
  if (visibleDiscount === false) {
    reasons.push('The visible discount is below 10%, so the deal cannot be LIKELY_REAL or REAL.')
  } else if (visibleDiscount === null) {
    reasons.push('No list price is shown, so there is no visible discount to verify.')
  }

  if (flag(trace, 'R3_cross_store_ge_5pct') === false && numeric(trace, 'cross_store_delta_pct') !== null) {
    reasons.push('The price is not at least 5% below other retailers.')
  }

  if (flag(trace, 'R2_anchor_spike_le_10pct') === false) {
    reasons.push('The list price looks inflated against its own history (possible artificial anchor).')
  }

  if (traceGates.includes('INSUFFICIENT_EVIDENCE')) {
    reasons.push('There is not enough price history or peer data to confirm the discount.')
  }

  if (reasons.length === 0) reasons.push(DEFAULT_REASON)

  return {
    reasons,
    rules: RULE_KEYS.map((key) => ({ key, description: RULE_DESCRIPTIONS[key], passed: flag(trace, key) })),
    anchorSpikePct: numeric(trace, 'anchor_spike_pct'),
  }
}
