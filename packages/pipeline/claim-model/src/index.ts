export type {
  NLILabel,
  NLIScores,
  MentionSpan,
  Entity,
  RelationTriple,
  ExtractionResult,
  InferenceVerdict,
  Correction,
  TripleRecord,
} from "./types"
export { NLI_LABELS } from "./types"
export {
  DEFAULT_CONFIDENCE,
  createEntity,
  createTriple,
  clampConfidence,
  verbalizeTriple,
  toHypothesis,
  tripleKey,
  tripleToRecord,
  findMentions,
} from "./triple"
export type { EntityInit } from "./triple"
export { exportClaimGraph, mergeClaimGraphs } from "./graph-export"
export type { ClaimGraphExport, EntityRecord } from "./graph-export"
