import { describe, it, expect } from 'vitest'
import { DEFAULT_REASON, explainRuleTrace } from '../explain'

const PASSING_TRACE = {
  R1_hist_delta_ge_15pct: true,
  R2_anchor_spike_le_10pct: true,
  R3_cross_store_ge_5pct: true,
  R4_seen_multiple_snapshots: true,
  R5_has_enough_history: true,
  R6_visible_discount_ge_10pct: true,
  anchor_spike_pct: 0.02,
  cross_store_delta_pct: -0.08,
  gates: [],
}

describe('explainRuleTrace', () => {
  it('falls back to the default reason when every rule passes', () => {
    const explanation = explainRuleTrace(PASSING_TRACE)

    expect(explanation.reasons).toEqual([DEFAULT_REASON])
    expect(explanation.anchorSpikePct).toBe(0.02)
    expect(explanation.rules.map((rule) => rule.passed)).toEqual([true, true, true, true, true, true])
  })

  it('explains a small visible discount', () => {
    const explanation = explainRuleTrace({ ...PASSING_TRACE, R6_visible_discount_ge_10pct: false })

    expect(explanation.reasons).toEqual([
      'The visible discount is below 10%, so the deal cannot be LIKELY_REAL or REAL.',
    ])
  })

  it('explains a missing list price', () => {
    const explanation = explainRuleTrace({ ...PASSING_TRACE, R6_visible_discount_ge_10pct: null })

    expect(explanation.reasons).toEqual(['No list price is shown, so there is no visible discount to verify.'])
  })

  it('mentions peers only when a cross-store delta exists', () => {
    const withPeers = explainRuleTrace({ ...PASSING_TRACE, R3_cross_store_ge_5pct: false, cross_store_delta_pct: 0.11 })
    const withoutPeers = explainRuleTrace({ ...PASSING_TRACE, R3_cross_store_ge_5pct: false, cross_store_delta_pct: null })

    expect(withPeers.reasons).toEqual(['The price is not at least 5% below other retailers.'])
    expect(withoutPeers.reasons).toEqual([DEFAULT_REASON])
  })

  it('combines anchor and evidence reasons in order', () => {
    const explanation = explainRuleTrace({
      ...PASSING_TRACE,
      R2_anchor_spike_le_10pct: false,
      anchor_spike_pct: 0.35,
      gates: ['ANCHOR_ANOMALY', 'INSUFFICIENT_EVIDENCE'],
    })

    expect(explanation.reasons).toEqual([
      'The list price looks inflated against its own history (possible artificial anchor).',
      'There is not enough price history or peer data to confirm the discount.',
    ])
    expect(explanation.anchorSpikePct).toBe(0.35)
  })

  it('treats malformed values as not evaluated', () => {
    const explanation = explainRuleTrace({ R1_hist_delta_ge_15pct: 'yes', gates: 'none' })

    expect(explanation.rules[0]).toEqual({
      key: 'R1_hist_delta_ge_15pct',
      description: 'Price at least 15% below its recent median',
      passed: null,
    })
    expect(explanation.reasons).toEqual(['No list price is shown, so there is no visible discount to verify.'])
    expect(explanation.anchorSpikePct).toBeNull()
  })
})
