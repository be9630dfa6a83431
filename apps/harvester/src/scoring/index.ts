export {
  DEFAULT_SCORING_VERSION,
  SCORING_POLICIES,
  UnknownScoringVersionError,
  WEIGHTED_RULES,
  getScoringPolicy,
  type LabelThresholds,
  type ScoringPolicy,
  type WeightedRule,
} from './policy'
export { baseLabelFor, capLabel, scoreEvaluation, weightedScore, type ScoreResult } from './labeler'
export { buildRuleTrace, RULE_TRACE_CONTRACT_KEYS, type LabelGate, type RuleTrace } from './rule-trace'
