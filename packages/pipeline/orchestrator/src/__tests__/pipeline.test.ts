import assert from "node:assert/strict"
import test from "node:test"
import { GenerativeClaimExtractor } from "@extraction"
import { PipelineStageError } from "@pipeline-errors"
import { TripleCheckPipeline } from "../pipeline.js"
import { hypothesisClassifier, recordingBackend, staticExtractor } from "./fakes.js"

const OUTPUT = "X wrote Y. Y wrote Z."
const CONTEXT = "X authored Y. Y wrote Z."

const extractor = staticExtractor({
  triples: [
    { head: "X", relation: "wrote", tail: "Y" },
    { head: "Y", relation: "wrote", tail: "Z" },
  ],
})

test("a contradicted triple is corrected and repaired in the output", async () => {
  const { classifier, calls } = hypothesisClassifier(["X wrote Y."])
  const corrector = recordingBackend(() => '{"relation": "authored"}')
  const pipeline = new TripleCheckPipeline({ extractors: extractor, classifier, corrector: corrector.backend })

  const report = await pipeline.run(OUTPUT, CONTEXT)

  assert.equal(calls.length, 1)
  assert.equal(corrector.calls.length, 1)
  assert.deepEqual(report, {
    originalOutput: OUTPUT,
    triples: [
      { head: "X", relation: "wrote", tail: "Y", confidence: 1 },
      { head: "Y", relation: "wrote", tail: "Z", confidence: 1 },
    ],
    hallucinatedTriples: [
      {
        triple: { head: "X", relation: "wrote", tail: "Y", confidence: 1 },
        label: "contradiction",
        scores: { entailment: 0.05, contradiction: 0.9, neutral: 0.05 },
        isHallucination: true,
      },
    ],
    correctedTriples: [
      {
        original: { head: "X", relation: "wrote", tail: "Y", confidence: 1 },
        corrected: { head: "X", relation: "authored", tail: "Y", confidence: 1 },
      },
    ],
    correctedOutput: "X authored Y. Y wrote Z.",
    thresholds: { contradiction: 0.5, neutral: 0.5 },
    edits: [{ original: "X wrote Y", corrected: "X authored Y", occurrences: 1 }],
    claimGraph: {
      entities: [
        { text: "X", type: null, id: null },
        { text: "Y", type: null, id: null },
        { text: "Z", type: null, id: null },
      ],
      triples: [
        { head: "X", relation: "wrote", tail: "Y", confidence: 1 },
        { head: "Y", relation: "wrote", tail: "Z", confidence: 1 },
      ],
    },
  })
})

test("when every triple is entailed the corrector is never called", async () => {
  const { classifier } = hypothesisClassifier([])
  const corrector = recordingBackend(() => "{}")
  const pipeline = new TripleCheckPipeline({ extractors: [extractor], classifier, corrector: corrector.backend })

  const report = await pipeline.run(OUTPUT, CONTEXT)

  assert.equal(corrector.calls.length, 0)
  assert.equal(report.correctedOutput, OUTPUT)
  assert.deepEqual(report.hallucinatedTriples, [])
  assert.deepEqual(report.correctedTriples, [])
  assert.deepEqual(report.edits, [])
})

test("identical inputs and backends produce identical reports", async () => {
  const build = () =>
    new TripleCheckPipeline({
      extractors: extractor,
      classifier: hypothesisClassifier(["Y wrote Z."]).classifier,
      corrector: recordingBackend(() => '{"tail": "W"}').backend,
    })

  const first = await build().run(OUTPUT, CONTEXT)
  const second = await build().run(OUTPUT, CONTEXT)

  assert.equal(JSON.stringify(first), JSON.stringify(second))
  assert.equal(first.correctedOutput, "X wrote Y. Y wrote W.")
})

test("passes from several extractors merge into one claim graph", async () => {
  const typed = staticExtractor({
    entities: [{ text: "X", type: "PERSON" }],
    triples: [{ head: "X", relation: "wrote", tail: "Y" }],
  })
  const generative = new GenerativeClaimExtractor({
    async generate() {
      return "<s><triplet> X <subj> Y <obj> wrote</s>"
    },
  })
  const { classifier } = hypothesisClassifier([])
  const pipeline = new TripleCheckPipeline({
    extractors: [typed, generative],
    classifier,
    corrector: recordingBackend(() => "{}").backend,
  })

  const report = await pipeline.run("X wrote Y.", "X wrote Y.")

  assert.deepEqual(report.claimGraph.entities, [
    { text: "X", type: "PERSON", id: null },
    { text: "Y", type: null, id: null },
  ])
  assert.equal(report.triples.length, 2)
})

test("a malformed correction fails the correct stage with the triple index", async () => {
  const { classifier } = hypothesisClassifier(["X wrote Y."])
  const pipeline = new TripleCheckPipeline({
    extractors: extractor,
    classifier,
    corrector: recordingBackend(() => "I am not sure.").backend,
  })

  await assert.rejects(
    () => pipeline.run(OUTPUT, CONTEXT),
    (error: unknown) =>
      error instanceof PipelineStageError &&
      error.code === "CORRECTION_MALFORMED_RESPONSE" &&
      error.details?.stage === "correct" &&
      error.details.tripleIndex === 0,
  )
})

test("a correction backend failure carries the index of the triple being corrected", async () => {
  const { classifier } = hypothesisClassifier(["X wrote Y.", "Y wrote Z."])
  const cause = new Error("socket hang up")
  let requests = 0
  const pipeline = new TripleCheckPipeline({
    extractors: extractor,
    classifier,
    corrector: {
      async complete() {
        requests += 1
        if (requests === 2) throw cause
        return '{"relation": "authored"}'
      },
    },
  })

  await assert.rejects(
    () => pipeline.run(OUTPUT, CONTEXT),
    (error: unknown) =>
      error instanceof PipelineStageError &&
      error.code === "CORRECTION_BACKEND_FAILED" &&
      error.details?.stage === "correct" &&
      error.details.tripleIndex === 1 &&
      error.cause === cause,
  )
  assert.equal(requests, 2)
})

test("an extractor failure is reported against the extract stage", async () => {
  const cause = new Error("model offline")
  const pipeline = new TripleCheckPipeline({
    extractors: {
      async extract() {
        throw cause
      },
    },
    classifier: hypothesisClassifier([]).classifier,
    corrector: recordingBackend(() => "{}").backend,
  })

  await assert.rejects(
    () => pipeline.run(OUTPUT, CONTEXT),
    (error: unknown) =>
      error instanceof PipelineStageError &&
      error.code === "EXTRACTION_FAILED" &&
      error.message === "model offline" &&
      error.details?.stage === "extract" &&
      error.cause === cause,
  )
})

test("a classifier that drops distributions fails the judge stage", async () => {
  const pipeline = new TripleCheckPipeline({
    extractors: extractor,
    classifier: {
      async classifyBatch() {
        return []
      },
    },
    corrector: recordingBackend(() => "{}").backend,
  })

  await assert.rejects(
    () => pipeline.run(OUTPUT, CONTEXT),
    (error: unknown) =>
      error instanceof PipelineStageError && error.code === "NLI_SHAPE_MISMATCH" && error.details?.stage === "judge",
  )
})

test("the pipeline rejects an invalid configuration up front", () => {
  const { classifier } = hypothesisClassifier([])
  const corrector = recordingBackend(() => "{}").backend

  assert.throws(
    () => new TripleCheckPipeline({ extractors: [], classifier, corrector }),
    (error: unknown) => error instanceof PipelineStageError && error.code === "PIPELINE_CONFIG_INVALID",
  )
  assert.throws(
    () => new TripleCheckPipeline({ extractors: extractor, classifier, corrector, thresholds: { neutral: 2 } }),
    (error: unknown) =>
      error instanceof PipelineStageError && error.code === "PIPELINE_CONFIG_INVALID" && error.details?.stage === "config",
  )
})
