import assert from "node:assert/strict"
import test from "node:test"
import type { CompletionBackend, CompletionOptions } from "@llm"
import { PipelineStageError } from "@pipeline-errors"
import { LLMClaimExtractor, parseExtractionResponse } from "../llm-extractor.js"

function fakeBackend(response: string) {
  const calls: Array<{ prompt: string; options?: CompletionOptions }> = []
  const backend: CompletionBackend = {
    async complete(prompt, options) {
      calls.push({ prompt, options })
      return response
    },
  }
  return { backend, calls }
}

test("LLMClaimExtractor sends the answer and decodes entities and triples", async () => {
  const { backend, calls } = fakeBackend(
    '```json\n{"entities": [{"text": "Ada", "type": "PERSON"}], "triples": [{"head": "Ada", "relation": "wrote", "tail": "Notes", "confidence": 0.8}]}\n```',
  )
  const pass = await new LLMClaimExtractor(backend).extract("Ada wrote Notes.")

  assert.deepEqual(pass, {
    entities: [{ text: "Ada", type: "PERSON" }],
    triples: [{ head: "Ada", relation: "wrote", tail: "Notes", confidence: 0.8 }],
  })
  assert.equal(calls.length, 1)
  assert.ok(calls[0].prompt.endsWith("ANSWER:\nAda wrote Notes."))
  assert.equal(calls[0].options?.jsonSchema?.name, "ClaimGraph")
})

test("parseExtractionResponse tolerates missing lists and noisy fields", () => {
  assert.deepEqual(parseExtractionResponse('{"triples": [{"head": 3, "relation": "r", "tail": "B", "confidence": "high"}]}'), {
    entities: [],
    triples: [{ head: "", relation: "r", tail: "B", confidence: undefined }],
  })
})

test("parseExtractionResponse rejects non-JSON output", () => {
  assert.throws(
    () => parseExtractionResponse("Sure! Here are the triples."),
    (error: unknown) =>
      error instanceof PipelineStageError &&
      error.code === "EXTRACTION_MALFORMED_RESPONSE" &&
      error.details?.stage === "extract",
  )
})

test("parseExtractionResponse rejects a triples field that is not a list", () => {
  assert.throws(
    () => parseExtractionResponse('{"triples": "none"}'),
    (error: unknown) => error instanceof PipelineStageError && error.code === "EXTRACTION_MALFORMED_RESPONSE",
  )
})
