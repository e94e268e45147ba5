import { createEntity, createTriple, toHypothesis } from "@claim-model"
import type { Correction, RelationTriple } from "@claim-model"
import { parseJsonObject, prompts } from "@llm"
import type { CompletionBackend } from "@llm"
import { PipelineStageError } from "@pipeline-errors"
import { debugLog, debugLogContent } from "@pipeline-logger"

export function buildCorrectionPrompt(triple: RelationTriple, context: string): { system: string; prompt: string } {
  const version = prompts.correction.currentVersion
  return {
    system: version.getSystemPrompt(),
    prompt: version.getUserPrompt({ context, claim: toHypothesis(triple) }),
  }
}

function readField(data: Record<string, unknown>, field: "head" | "relation" | "tail", fallback: string, tripleIndex: number): string {
  const value = data[field]
  if (value === undefined || value === null) return fallback
  if (typeof value === "number" || typeof value === "boolean") return String(value)
  if (typeof value !== "string") {
    throw new PipelineStageError(
      "CORRECTION_MALFORMED_RESPONSE",
      `Correction field "${field}" must be a string, received ${Array.isArray(value) ? "array" : typeof value}`,
      false,
      { stage: "correct", tripleIndex },
    )
  }
  const trimmed = value.trim()
  return trimmed.length > 0 ? trimmed : fallback
}

/**
 * Builds the corrected triple from a correction response.
 * Missing or blank fields keep the original's value; the new entities carry the original types.
 */
export function parseCorrectionResponse(raw: string, original: RelationTriple, tripleIndex = 0): RelationTriple {
  let data: Record<string, unknown>
  try {
    data = parseJsonObject(raw)
  } catch (error) {
    throw new PipelineStageError(
      "CORRECTION_MALFORMED_RESPONSE",
      `Failed to parse corrected triple as JSON: ${error instanceof Error ? error.message : String(error)}`,
      false,
      { stage: "correct", tripleIndex },
    )
  }

  const headText = readField(data, "head", original.head.text, tripleIndex)
  const relation = readField(data, "relation", original.relation, tripleIndex)
  const tailText = readField(data, "tail", original.tail.text, tripleIndex)

  const head = createEntity(headText, { type: original.head.type })
  const tail = createEntity(tailText, { type: original.tail.type })
  return createTriple(head, relation, tail)
}

/**
 * Requests one correction per rejected triple, sequentially and in order.
 * Identical triples still get their own request.
 */
export async function correctTriples(
  hallucinated: readonly RelationTriple[],
  context: string,
  backend: CompletionBackend,
): Promise<Correction[]> {
  const schema = prompts.correction.currentVersion.CORRECTION_SCHEMA
  const corrections: Correction[] = []

  for (const [index, original] of hallucinated.entries()) {
    const { system, prompt } = buildCorrectionPrompt(original, context)
    debugLogContent(`[correct] requesting correction ${index + 1}/${hallucinated.length}:`, toHypothesis(original))
    let raw: string
    try {
      raw = await backend.complete(prompt, {
        system,
        jsonSchema: { name: "CorrectedTriple", schema },
      })
    } catch (error) {
      throw new PipelineStageError(
        "CORRECTION_BACKEND_FAILED",
        `Correction request ${index + 1}/${hallucinated.length} failed: ${error instanceof Error ? error.message : String(error)}`,
        false,
        { stage: "correct", tripleIndex: index },
        { cause: error },
      )
    }
    const corrected = parseCorrectionResponse(raw, original, index)
    corrections.push(Object.freeze({ original, corrected }))
  }

  debugLog(`[correct] ${corrections.length} corrections`)
  return corrections
}
