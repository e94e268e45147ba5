/**
 * NLI Classification Prompt - Version 1
 * Used when a completion model stands in for a dedicated NLI classifier
 */

export interface NLIPromptParams {
  premise: string
  hypothesis: string
}

export const PROMPT_VERSION = "v1"

export const NLI_SCHEMA = {
  type: "object",
  properties: {
    label: { type: "string", enum: ["entailment", "contradiction", "neutral"] },
  },
  required: ["label"],
  additionalProperties: false,
} as const

export function getSystemPrompt(): string {
  return `You are a natural language inference (NLI) classifier. Given a premise and a hypothesis, decide whether the hypothesis is ENTAILMENT, CONTRADICTION, or NEUTRAL with respect to the premise.

Respond ONLY with a JSON object of the form {"label": "entailment" | "contradiction" | "neutral"}.`
}

export function getUserPrompt(params: NLIPromptParams): string {
  return `Premise: ${params.premise}
Hypothesis: ${params.hypothesis}`
}

export const PROMPT_METADATA = {
  version: PROMPT_VERSION,
  created_at: "2026-09-28",
  description: "Three-way NLI label as a JSON object",
  changelog: ["Initial release"],
} as const
