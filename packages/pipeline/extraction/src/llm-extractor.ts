import { parseJsonObject, prompts } from "@llm"
import type { CompletionBackend } from "@llm"
import { PipelineStageError } from "@pipeline-errors"
import { debugLog, debugLogContent } from "@pipeline-logger"
import { extractionResponseSchema } from "./schema"
import type { ClaimExtractor, ExtractionPass } from "./types"

export function parseExtractionResponse(responseText: string): ExtractionPass {
  let data: Record<string, unknown>
  try {
    data = parseJsonObject(responseText)
  } catch (error) {
    throw new PipelineStageError(
      "EXTRACTION_MALFORMED_RESPONSE",
      `Failed to parse extraction response as JSON: ${error instanceof Error ? error.message : String(error)}`,
      false,
      { stage: "extract" },
    )
  }

  const parsed = extractionResponseSchema.safeParse(data)
  if (!parsed.success) {
    throw new PipelineStageError(
      "EXTRACTION_MALFORMED_RESPONSE",
      `Extraction response does not match the expected shape: ${parsed.error.issues.map((issue) => issue.message).join("; ")}`,
      false,
      { stage: "extract" },
    )
  }

  return {
    entities: parsed.data.entities.map((entity) => ({ text: entity.text, type: entity.type })),
    triples: parsed.data.triples.map((triple) => ({
      head: triple.head,
      relation: triple.relation,
      tail: triple.tail,
      confidence: triple.confidence,
    })),
  }
}

/** Extracts entities and triples by asking a completion model for JSON. */
export class LLMClaimExtractor implements ClaimExtractor {
  constructor(private readonly backend: CompletionBackend) {}

  async extract(text: string): Promise<ExtractionPass> {
    const version = prompts.extraction.currentVersion
    debugLog(`[extract] llm extraction with prompt ${version.PROMPT_VERSION}, ${text.length} chars`)
    const raw = await this.backend.complete(version.getUserPrompt({ text }), {
      system: version.getSystemPrompt(),
      jsonSchema: { name: "ClaimGraph", schema: version.EXTRACTION_SCHEMA },
    })
    debugLogContent("[extract] raw response:", raw)
    return parseExtractionResponse(raw)
  }
}
