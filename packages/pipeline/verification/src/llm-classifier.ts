import { NLI_LABELS } from "@claim-model"
import { parseJsonObject, prompts } from "@llm"
import type { CompletionBackend } from "@llm"
import { PipelineStageError } from "@pipeline-errors"
import { canonicalLabel } from "./labels"
import type { ClassificationBackend, PremiseHypothesisPair, RawDistribution } from "./types"

/**
 * Uses a completion model as the NLI classifier.
 * Each pair is one request; the chosen label scores 1.0 and the other two 0.0.
 */
export class LLMNLIClassifier implements ClassificationBackend {
  constructor(private readonly backend: CompletionBackend) {}

  async classifyBatch(pairs: PremiseHypothesisPair[]): Promise<RawDistribution[]> {
    const results: RawDistribution[] = []
    for (const [index, pair] of pairs.entries()) {
      results.push(await this.classify(pair, index))
    }
    return results
  }

  async classify(pair: PremiseHypothesisPair, tripleIndex = 0): Promise<RawDistribution> {
    const version = prompts.nli.currentVersion
    let raw: string
    try {
      raw = await this.backend.complete(version.getUserPrompt(pair), {
        system: version.getSystemPrompt(),
        jsonSchema: { name: "NLIJudgement", schema: version.NLI_SCHEMA },
      })
    } catch (error) {
      throw new PipelineStageError(
        "NLI_BACKEND_FAILED",
        `LLM NLI request failed: ${error instanceof Error ? error.message : String(error)}`,
        false,
        { stage: "judge", tripleIndex },
        { cause: error },
      )
    }

    let data: Record<string, unknown>
    try {
      data = parseJsonObject(raw)
    } catch (error) {
      throw new PipelineStageError(
        "NLI_MALFORMED_RESPONSE",
        `Failed to parse LLM NLI response: ${error instanceof Error ? error.message : String(error)}`,
        false,
        { stage: "judge", tripleIndex },
      )
    }

    const rawLabel = typeof data.label === "string" ? data.label.trim() : ""
    if (!rawLabel) {
      throw new PipelineStageError("NLI_MALFORMED_RESPONSE", "LLM NLI response missing 'label' field", false, {
        stage: "judge",
        tripleIndex,
      })
    }

    const chosen = canonicalLabel(rawLabel, {}, tripleIndex)
    return NLI_LABELS.map((label) => ({
      label,
      score: label === chosen ? 1.0 : 0.0,
    }))
  }
}
