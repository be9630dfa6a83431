export { recordEvaluation } from './evaluation-recorder'
export type { RecordEvaluationInput, RecordEvaluationResult } from './evaluation-recorder'
