import assert from "node:assert/strict"
import test from "node:test"
import { parseJsonObject, stripMarkdownFences } from "../json.js"

test("stripMarkdownFences removes a json code fence", () => {
  assert.equal(stripMarkdownFences('```json\n{"head": "A"}\n```'), '{"head": "A"}')
  assert.equal(stripMarkdownFences('```\n{"head": "A"}\n```'), '{"head": "A"}')
  assert.equal(stripMarkdownFences('  {"head": "A"}  '), '{"head": "A"}')
})

test("parseJsonObject decodes fenced objects", () => {
  assert.deepEqual(parseJsonObject('```json\n{"relation": "founded"}\n```'), { relation: "founded" })
})

test("parseJsonObject rejects invalid JSON and non-object values", () => {
  assert.throws(() => parseJsonObject("not json"), /Response is not valid JSON/)
  assert.throws(() => parseJsonObject("[1, 2]"), /received array/)
  assert.throws(() => parseJsonObject("null"), /received null/)
  assert.throws(() => parseJsonObject('"text"'), /received string/)
})
