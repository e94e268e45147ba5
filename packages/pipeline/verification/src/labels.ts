import type { NLILabel } from "@claim-model"
import { PipelineStageError } from "@pipeline-errors"

/** Recognized backend spellings; anything else is rejected rather than coerced. */
export const LABEL_TABLE: Readonly<Record<string, NLILabel>> = Object.freeze({
  entailment: "entailment",
  ENTAILMENT: "entailment",
  Entailment: "entailment",
  contradiction: "contradiction",
  CONTRADICTION: "contradiction",
  Contradiction: "contradiction",
  neutral: "neutral",
  NEUTRAL: "neutral",
  Neutral: "neutral",
})

export function canonicalLabel(
  rawLabel: string,
  aliases: Readonly<Record<string, NLILabel>> = {},
  tripleIndex?: number,
): NLILabel {
  const label = rawLabel.trim()
  if (Object.hasOwn(LABEL_TABLE, label)) {
    return LABEL_TABLE[label]
  }
  if (Object.hasOwn(aliases, label)) {
    return aliases[label]
  }
  throw new PipelineStageError("NLI_UNKNOWN_LABEL", `Unexpected NLI label: ${rawLabel}`, false, {
    stage: "judge",
    tripleIndex,
    label: rawLabel,
  })
}
