/**
 * Claim Extraction Prompt - Version 1
 * Turns a model answer into entities and (head, relation, tail) triples
 */

export interface ExtractionPromptParams {
  text: string
}

export const PROMPT_VERSION = "v1"

export const EXTRACTION_SCHEMA = {
  type: "object",
  properties: {
    entities: {
      type: "array",
      description: "Named entities mentioned in the text",
      items: {
        type: "object",
        properties: {
          text: { type: "string", description: "Surface form exactly as written in the text" },
          type: { type: "string", description: "Semantic category such as PERSON, ORGANIZATION, LOCATION, DATE" },
        },
        required: ["text"],
      },
    },
    triples: {
      type: "array",
      description: "Factual relations between entities",
      items: {
        type: "object",
        properties: {
          head: { type: "string" },
          relation: { type: "string" },
          tail: { type: "string" },
        },
        required: ["head", "relation", "tail"],
      },
    },
  },
  required: ["entities", "triples"],
  additionalProperties: false,
} as const

export function getSystemPrompt(): string {
  return `You are an information extraction system. Given an answer written by a language model, you extract the named entities it mentions and the semantic relations it asserts between them.

OUTPUT FORMAT:
- Return a JSON object with exactly two keys: "entities" and "triples"
- "entities" is a list of objects with fields: text, type
- "triples" is a list of objects with fields: head, relation, tail
- Copy head and tail text exactly as it appears in the answer
- Write the relation as the words that connect head and tail in the answer, so that "head relation tail" reads as the original phrase
- Do NOT add markdown formatting, code fences, or explanatory text`
}

export function getUserPrompt(params: ExtractionPromptParams): string {
  return `Extract entities and triples from this answer.

ANSWER:
${params.text}`
}

export const PROMPT_METADATA = {
  version: PROMPT_VERSION,
  created_at: "2026-09-28",
  description: "Entity and triple extraction as a single JSON object",
  changelog: ["Initial release"],
} as const
