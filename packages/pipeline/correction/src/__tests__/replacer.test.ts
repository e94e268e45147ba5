import assert from "node:assert/strict"
import test from "node:test"
import { createEntity, createTriple } from "@claim-model"
import type { RelationTriple } from "@claim-model"
import { PipelineStageError } from "@pipeline-errors"
import { applyCorrections, repairOutput } from "../replacer.js"

function triple(head: string, relation: string, tail: string): RelationTriple {
  return createTriple(createEntity(head), relation, createEntity(tail))
}

test("only the verbalized rejected triple is rewritten", () => {
  const text = repairOutput("X wrote Y. Y wrote Z.", [triple("X", "wrote", "Y")], [triple("X", "authored", "Y")])
  assert.equal(text, "X authored Y. Y wrote Z.")
})

test("every occurrence is replaced and counted", () => {
  const result = applyCorrections("A r B; A r B.", [triple("A", "r", "B")], [triple("A", "s", "B")])
  assert.deepEqual(result, {
    text: "A s B; A s B.",
    edits: [{ original: "A r B", corrected: "A s B", occurrences: 2 }],
  })
})

test("later pairs see the text produced by earlier pairs", () => {
  const result = applyCorrections(
    "A r B",
    [triple("A", "r", "B"), triple("C", "r", "D")],
    [triple("C", "r", "D"), triple("E", "r", "F")],
  )
  assert.equal(result.text, "E r F")
  assert.deepEqual(
    result.edits.map((edit) => edit.occurrences),
    [1, 1],
  )
})

test("a triple that does not appear verbatim leaves the text unchanged", () => {
  const result = applyCorrections("Ada wrote notes.", [triple("Ada", "authored", "notes")], [triple("Ada", "wrote", "code")])
  assert.equal(result.text, "Ada wrote notes.")
  assert.equal(result.edits[0].occurrences, 0)
})

test("replacement patterns in corrected text stay literal", () => {
  const text = repairOutput("The shop is Smith and Sons.", [triple("The shop", "is", "Smith and Sons")], [triple("The shop", "is", "Smith $& Sons")])
  assert.equal(text, "The shop is Smith $& Sons.")
})

test("mismatched lengths are rejected", () => {
  assert.throws(
    () => applyCorrections("A r B", [triple("A", "r", "B")], []),
    (error: unknown) =>
      error instanceof PipelineStageError && error.code === "REPAIR_SHAPE_MISMATCH" && error.details?.stage === "repair",
  )
})
