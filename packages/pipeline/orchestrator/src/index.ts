export type {
  PipelineReport,
  VerdictRecord,
  CorrectionRecord,
  TripleCheckPipelineConfig,
} from "./types"
export { TripleCheckPipeline } from "./pipeline"
export { buildReport, verdictToRecord, correctionToRecord } from "./report"
export { createCompletionBackend, createClassificationBackend, createPipelineFromSettings } from "./factory"
