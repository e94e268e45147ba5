/**
 * Claim Correction Prompt - Version 1
 * Asks for a replacement triple consistent with the reference context
 */

export interface CorrectionPromptParams {
  context: string
  claim: string
}

export const PROMPT_VERSION = "v1"

export const CORRECTION_SCHEMA = {
  type: "object",
  properties: {
    head: { type: "string", description: "Subject entity of the corrected fact" },
    relation: { type: "string", description: "Relation of the corrected fact" },
    tail: { type: "string", description: "Object entity of the corrected fact" },
  },
  required: ["head", "relation", "tail"],
  additionalProperties: false,
} as const

export function getSystemPrompt(): string {
  return `You are a fact-checking assistant. Given a context paragraph and a possibly hallucinated fact expressed as a triple, you propose a corrected triple that is consistent with the context.

Return ONLY a JSON object with exactly three keys: head, relation, tail.
Keep any part of the original triple that the context supports unchanged.`
}

export function getUserPrompt(params: CorrectionPromptParams): string {
  return `Context:
${params.context}

Original triple sentence:
${params.claim}`
}

export const PROMPT_METADATA = {
  version: PROMPT_VERSION,
  created_at: "2026-09-28",
  description: "Single-triple correction returning head, relation and tail",
  changelog: ["Initial release"],
} as const
