// types for claim verification

import type { InferenceVerdict, NLILabel } from "@claim-model"

export interface PremiseHypothesisPair {
  premise: string
  hypothesis: string
}

/** One label/score pair in the backend's own label spelling. */
export interface RawLabelScore {
  label: string
  score: number
}

export type RawDistribution = RawLabelScore[]

/** Three-way inference capability; one distribution per pair, in pair order. */
export interface ClassificationBackend {
  classifyBatch(pairs: PremiseHypothesisPair[]): Promise<RawDistribution[]>
}

export interface ThresholdPolicy {
  contradiction: number
  neutral: number
}

export interface JudgeOptions {
  thresholds?: Partial<ThresholdPolicy>
  /** Extra backend spellings, checked after the built-in table. */
  labelAliases?: Readonly<Record<string, NLILabel>>
}

export interface JudgeSummary {
  totalTriples: number
  hallucinatedTriples: number
  labelCounts: Record<NLILabel, number>
}

export type { InferenceVerdict }
