import { NLI_LABELS, toHypothesis } from "@claim-model"
import type { InferenceVerdict, NLILabel, NLIScores, RelationTriple } from "@claim-model"
import { DEFAULT_CONTRADICTION_THRESHOLD, DEFAULT_NEUTRAL_THRESHOLD } from "@pipeline-config"
import { PipelineStageError } from "@pipeline-errors"
import { debugLog, debugLogContent } from "@pipeline-logger"
import { canonicalLabel } from "./labels"
import type { ClassificationBackend, JudgeOptions, JudgeSummary, RawDistribution, ThresholdPolicy } from "./types"

export const DEFAULT_THRESHOLDS: Readonly<ThresholdPolicy> = Object.freeze({
  contradiction: DEFAULT_CONTRADICTION_THRESHOLD,
  neutral: DEFAULT_NEUTRAL_THRESHOLD,
})

function assertThreshold(value: number, name: string): void {
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw new PipelineStageError("INVALID_THRESHOLD", `${name} threshold must be a number in [0, 1], received ${value}`, false, {
      stage: "judge",
    })
  }
}

export function resolveThresholds(overrides: Partial<ThresholdPolicy> = {}): ThresholdPolicy {
  const thresholds = {
    contradiction: overrides.contradiction ?? DEFAULT_THRESHOLDS.contradiction,
    neutral: overrides.neutral ?? DEFAULT_THRESHOLDS.neutral,
  }
  assertThreshold(thresholds.contradiction, "contradiction")
  assertThreshold(thresholds.neutral, "neutral")
  return thresholds
}

// inclusive on both bounds: a score sitting exactly on a threshold is flagged
export function isHallucination(scores: NLIScores, thresholds: ThresholdPolicy): boolean {
  return scores.contradiction >= thresholds.contradiction || scores.neutral >= thresholds.neutral
}

// ties resolve in NLI_LABELS order: entailment, contradiction, neutral
export function argmaxLabel(scores: NLIScores): NLILabel {
  let best: NLILabel = NLI_LABELS[0]
  for (const label of NLI_LABELS) {
    if (scores[label] > scores[best]) best = label
  }
  return best
}

export function toScores(
  distribution: RawDistribution,
  aliases: JudgeOptions["labelAliases"],
  tripleIndex: number,
): NLIScores {
  const scores: Record<NLILabel, number> = { entailment: 0, contradiction: 0, neutral: 0 }
  const seen = new Set<NLILabel>()
  for (const { label, score } of distribution) {
    const canonical = canonicalLabel(label, aliases, tripleIndex)
    if (seen.has(canonical)) {
      throw new PipelineStageError("NLI_MALFORMED_RESPONSE", `Label "${canonical}" appears twice in one distribution`, false, {
        stage: "judge",
        tripleIndex,
      })
    }
    if (!Number.isFinite(score) || score < 0 || score > 1) {
      throw new PipelineStageError("NLI_MALFORMED_RESPONSE", `Score for "${canonical}" must be in [0, 1], received ${score}`, false, {
        stage: "judge",
        tripleIndex,
      })
    }
    seen.add(canonical)
    scores[canonical] = score
  }
  return Object.freeze(scores)
}

/**
 * Judges every triple against the context with one batched classifier call.
 * Verdicts line up with `triples` by position.
 */
export async function judgeTriples(
  triples: readonly RelationTriple[],
  context: string,
  classifier: ClassificationBackend,
  options: JudgeOptions = {},
): Promise<InferenceVerdict[]> {
  const thresholds = resolveThresholds(options.thresholds)
  if (triples.length === 0) {
    return []
  }

  const pairs = triples.map((triple) => ({ premise: context, hypothesis: toHypothesis(triple) }))
  debugLog(`[judge] classifying ${pairs.length} hypotheses`)
  debugLogContent("[judge] hypotheses:", pairs.map((pair) => pair.hypothesis))

  const distributions = await classifier.classifyBatch(pairs)
  if (distributions.length !== pairs.length) {
    throw new PipelineStageError(
      "NLI_SHAPE_MISMATCH",
      `Classifier returned ${distributions.length} distributions for ${pairs.length} pairs`,
      false,
      { stage: "judge" },
    )
  }

  return triples.map((triple, index) => {
    const scores = toScores(distributions[index], options.labelAliases, index)
    return Object.freeze({
      triple,
      scores,
      label: argmaxLabel(scores),
      isHallucination: isHallucination(scores, thresholds),
    })
  })
}

export function summarizeVerdicts(verdicts: readonly InferenceVerdict[]): JudgeSummary {
  const labelCounts: Record<NLILabel, number> = { entailment: 0, contradiction: 0, neutral: 0 }
  for (const verdict of verdicts) {
    labelCounts[verdict.label] += 1
  }
  return {
    totalTriples: verdicts.length,
    hallucinatedTriples: verdicts.filter((verdict) => verdict.isHallucination).length,
    labelCounts,
  }
}
