import type { Correction, ExtractionResult, InferenceVerdict } from "@claim-model"
import { applyCorrections, correctTriples } from "@correction"
import type { RepairResult } from "@correction"
import { normalizeExtraction } from "@extraction"
import type { ClaimExtractor, ExtractionPass } from "@extraction"
import { PipelineStageError, toPipelineStageError } from "@pipeline-errors"
import type { PipelineStage } from "@pipeline-errors"
import { debugError, debugLog } from "@pipeline-logger"
import { judgeTriples, resolveThresholds, summarizeVerdicts } from "@verification"
import type { ThresholdPolicy } from "@verification"
import { buildReport } from "./report"
import type { PipelineReport, TripleCheckPipelineConfig } from "./types"

const STAGE_FAILURE_CODES: Record<PipelineStage, string> = {
  extract: "EXTRACTION_FAILED",
  normalize: "NORMALIZATION_FAILED",
  judge: "JUDGE_FAILED",
  correct: "CORRECTION_FAILED",
  repair: "REPAIR_FAILED",
  config: "PIPELINE_CONFIG_INVALID",
}

async function runStage<T>(stage: PipelineStage, work: () => Promise<T> | T): Promise<T> {
  const startTime = performance.now()
  try {
    const result = await work()
    debugLog(`[pipeline] ${stage} finished in ${Math.round(performance.now() - startTime)}ms`)
    return result
  } catch (error) {
    const stageError = toPipelineStageError(error, {
      code: STAGE_FAILURE_CODES[stage],
      message: `Pipeline stage "${stage}" failed`,
      recoverable: false,
      details: { stage },
    })
    debugError(`[pipeline] ${stage} failed with ${stageError.code}:`, stageError.message)
    throw stageError
  }
}

function resolveConfiguredThresholds(overrides: Partial<ThresholdPolicy> | undefined): ThresholdPolicy {
  try {
    return resolveThresholds(overrides)
  } catch (error) {
    throw new PipelineStageError(
      "PIPELINE_CONFIG_INVALID",
      error instanceof Error ? error.message : "Invalid threshold policy",
      false,
      { stage: "config" },
      { cause: error },
    )
  }
}

/**
 * Extract -> Normalize -> Judge -> Correct -> Repair -> Report.
 * Correct and Repair only run when at least one triple is judged a hallucination.
 */
export class TripleCheckPipeline {
  private readonly extractors: ClaimExtractor[]
  private readonly thresholds: ThresholdPolicy

  constructor(private readonly config: TripleCheckPipelineConfig) {
    this.extractors = Array.isArray(config.extractors) ? [...config.extractors] : [config.extractors]
    if (this.extractors.length === 0) {
      throw new PipelineStageError("PIPELINE_CONFIG_INVALID", "At least one claim extractor is required", false, {
        stage: "config",
      })
    }
    this.thresholds = resolveConfiguredThresholds(config.thresholds)
  }

  async run(llmOutput: string, context: string): Promise<PipelineReport> {
    debugLog(`[pipeline] run started: ${llmOutput.length} chars of output, ${context.length} chars of context`)

    const passes = await runStage("extract", async () => {
      const collected: ExtractionPass[] = []
      for (const extractor of this.extractors) {
        collected.push(await extractor.extract(llmOutput))
      }
      return collected
    })

    const extraction: ExtractionResult = await runStage("normalize", () =>
      normalizeExtraction(passes, {
        sourceText: this.config.recordMentions === false ? undefined : llmOutput,
      }),
    )

    const verdicts: InferenceVerdict[] = await runStage("judge", () =>
      judgeTriples(extraction.triples, context, this.config.classifier, {
        thresholds: this.thresholds,
        labelAliases: this.config.labelAliases,
      }),
    )
    const summary = summarizeVerdicts(verdicts)
    debugLog(`[pipeline] ${summary.hallucinatedTriples}/${summary.totalTriples} triples judged hallucinated`)

    const hallucinated = verdicts.filter((verdict) => verdict.isHallucination).map((verdict) => verdict.triple)
    if (hallucinated.length === 0) {
      return buildReport({
        originalOutput: llmOutput,
        extraction,
        verdicts,
        corrections: [],
        correctedOutput: llmOutput,
        thresholds: this.thresholds,
        edits: [],
      })
    }

    const corrections: Correction[] = await runStage("correct", () =>
      correctTriples(hallucinated, context, this.config.corrector),
    )

    const repaired: RepairResult = await runStage("repair", () =>
      applyCorrections(
        llmOutput,
        hallucinated,
        corrections.map((correction) => correction.corrected),
      ),
    )

    return buildReport({
      originalOutput: llmOutput,
      extraction,
      verdicts,
      corrections,
      correctedOutput: repaired.text,
      thresholds: this.thresholds,
      edits: repaired.edits,
    })
  }
}
