import assert from "node:assert/strict"
import test from "node:test"
import { createEntity, createTriple } from "@claim-model"
import type { CompletionBackend, CompletionOptions } from "@llm"
import { PipelineStageError } from "@pipeline-errors"
import { buildCorrectionPrompt, correctTriples, parseCorrectionResponse } from "../corrector.js"

const CONTEXT = "Queen Victoria was succeeded by Edward VII."

const victoria = createEntity("Queen Victoria", { type: "PERSON" })
const edward = createEntity("Edward VII", { type: "PERSON" })
const preceded = createTriple(victoria, "preceded by", edward)

function replying(...responses: string[]) {
  const calls: Array<{ prompt: string; options?: CompletionOptions }> = []
  const backend: CompletionBackend = {
    async complete(prompt, options) {
      calls.push({ prompt, options })
      return responses[calls.length - 1] ?? "{}"
    },
  }
  return { backend, calls }
}

test("buildCorrectionPrompt includes the context and the hypothesis sentence", () => {
  const { prompt, system } = buildCorrectionPrompt(preceded, CONTEXT)

  assert.equal(prompt, `Context:\n${CONTEXT}\n\nOriginal triple sentence:\nQueen Victoria preceded by Edward VII.`)
  assert.ok(!system.includes(CONTEXT))
})

test("missing fields fall back to the original triple", () => {
  const corrected = parseCorrectionResponse('{"relation": "succeeded by"}', preceded)

  assert.equal(corrected.head.text, "Queen Victoria")
  assert.equal(corrected.relation, "succeeded by")
  assert.equal(corrected.tail.text, "Edward VII")
  assert.equal(corrected.head.type, "PERSON")
  assert.notEqual(corrected.head, victoria)
  assert.equal(corrected.confidence, 1)
})

test("blank and null fields fall back, scalars are stringified", () => {
  const corrected = parseCorrectionResponse('{"head": "  ", "relation": null, "tail": 1901}', preceded)

  assert.equal(corrected.head.text, "Queen Victoria")
  assert.equal(corrected.relation, "preceded by")
  assert.equal(corrected.tail.text, "1901")
})

test("a structured field value is malformed", () => {
  assert.throws(
    () => parseCorrectionResponse('{"tail": ["Edward", "VII"]}', preceded, 3),
    (error: unknown) =>
      error instanceof PipelineStageError &&
      error.code === "CORRECTION_MALFORMED_RESPONSE" &&
      error.details?.tripleIndex === 3 &&
      /received array/.test(error.message),
  )
})

test("correctTriples asks once per triple, identical triples included", async () => {
  const { backend, calls } = replying('{"relation": "succeeded by"}', '{"relation": "followed by"}')

  const corrections = await correctTriples([preceded, preceded], CONTEXT, backend)

  assert.equal(calls.length, 2)
  assert.equal(calls[0].options?.jsonSchema?.name, "CorrectedTriple")
  assert.deepEqual(
    corrections.map((correction) => [correction.original, correction.corrected.relation]),
    [
      [preceded, "succeeded by"],
      [preceded, "followed by"],
    ],
  )
})

test("correctTriples reports the index of the malformed response", async () => {
  const { backend } = replying('{"relation": "succeeded by"}', "I cannot correct this.")

  await assert.rejects(
    () => correctTriples([preceded, preceded], CONTEXT, backend),
    (error: unknown) =>
      error instanceof PipelineStageError &&
      error.code === "CORRECTION_MALFORMED_RESPONSE" &&
      error.details?.tripleIndex === 1,
  )
})

test("correctTriples reports the index of a rejected correction request", async () => {
  const cause = new Error("rate limited")
  const backend: CompletionBackend = {
    async complete() {
      throw cause
    },
  }

  await assert.rejects(
    () => correctTriples([preceded], CONTEXT, backend),
    (error: unknown) =>
      error instanceof PipelineStageError &&
      error.code === "CORRECTION_BACKEND_FAILED" &&
      error.details?.tripleIndex === 0 &&
      error.cause === cause &&
      error.message === "Correction request 1/1 failed: rate limited",
  )
})
