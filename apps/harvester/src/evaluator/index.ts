export { evaluateRules } from './rules'
export type { PeerPrice, PricePoint, RuleEvaluation, RuleInput, RuleMetrics, RuleThresholds } from './rules'
export { absent, fromCondition, isAbsent, isFalse, isTrue, signalToJson, RULE_IDS } from './signals'
export type { RuleId, RuleSignals, Signal } from './signals'
export { median, relativeDelta, roundTo } from './stats'
