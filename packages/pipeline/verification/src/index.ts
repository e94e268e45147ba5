export type {
  PremiseHypothesisPair,
  RawLabelScore,
  RawDistribution,
  ClassificationBackend,
  ThresholdPolicy,
  JudgeOptions,
  JudgeSummary,
} from './types'
export { LABEL_TABLE, canonicalLabel } from './labels'
export {
  DEFAULT_THRESHOLDS,
  resolveThresholds,
  isHallucination,
  argmaxLabel,
  toScores,
  judgeTriples,
  summarizeVerdicts,
} from './judge'
export { LLMNLIClassifier } from './llm-classifier'
