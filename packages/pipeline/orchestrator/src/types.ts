import type { ClaimGraphExport, NLILabel, TripleRecord } from "@claim-model"
import type { RepairEdit } from "@correction"
import type { ClaimExtractor } from "@extraction"
import type { CompletionBackend } from "@llm"
import type { ClassificationBackend, ThresholdPolicy } from "@verification"

export interface VerdictRecord {
  triple: TripleRecord
  label: NLILabel
  scores: Record<NLILabel, number>
  isHallucination: boolean
}

export interface CorrectionRecord {
  original: TripleRecord
  corrected: TripleRecord
}

export interface PipelineReport {
  originalOutput: string
  triples: TripleRecord[]
  hallucinatedTriples: VerdictRecord[]
  correctedTriples: CorrectionRecord[]
  correctedOutput: string
  thresholds: ThresholdPolicy
  edits: RepairEdit[]
  claimGraph: ClaimGraphExport
}

export interface TripleCheckPipelineConfig {
  /** Each extractor contributes one pass; passes are merged in this order. */
  extractors: ClaimExtractor | ClaimExtractor[]
  classifier: ClassificationBackend
  corrector: CompletionBackend
  thresholds?: Partial<ThresholdPolicy>
  labelAliases?: Readonly<Record<string, NLILabel>>
  /** Record entity mention spans against the LLM output (default true). */
  recordMentions?: boolean
}
