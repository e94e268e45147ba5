import { exportClaimGraph, tripleToRecord } from "@claim-model"
import type { Correction, ExtractionResult, InferenceVerdict } from "@claim-model"
import type { RepairEdit } from "@correction"
import type { ThresholdPolicy } from "@verification"
import type { CorrectionRecord, PipelineReport, VerdictRecord } from "./types"

export function verdictToRecord(verdict: InferenceVerdict): VerdictRecord {
  return {
    triple: tripleToRecord(verdict.triple),
    label: verdict.label,
    scores: { ...verdict.scores },
    isHallucination: verdict.isHallucination,
  }
}

export function correctionToRecord(correction: Correction): CorrectionRecord {
  return {
    original: tripleToRecord(correction.original),
    corrected: tripleToRecord(correction.corrected),
  }
}

export function buildReport(params: {
  originalOutput: string
  extraction: ExtractionResult
  verdicts: readonly InferenceVerdict[]
  corrections: readonly Correction[]
  correctedOutput: string
  thresholds: ThresholdPolicy
  edits: RepairEdit[]
}): PipelineReport {
  const { originalOutput, extraction, verdicts, corrections, correctedOutput, thresholds, edits } = params
  return {
    originalOutput,
    triples: extraction.triples.map(tripleToRecord),
    hallucinatedTriples: verdicts.filter((verdict) => verdict.isHallucination).map(verdictToRecord),
    correctedTriples: corrections.map(correctionToRecord),
    correctedOutput,
    thresholds: { ...thresholds },
    edits,
    claimGraph: exportClaimGraph(extraction),
  }
}
