import assert from "node:assert/strict"
import { afterEach, beforeEach, describe, it } from "node:test"
import { createOpenAIBackend, runLLMRequest } from "../index.js"

describe("completion backends without credentials", () => {
  const saved = { anthropic: process.env.ANTHROPIC_API_KEY, openai: process.env.OPENAI_API_KEY }

  beforeEach(() => {
    delete process.env.ANTHROPIC_API_KEY
    delete process.env.OPENAI_API_KEY
  })

  afterEach(() => {
    if (saved.anthropic !== undefined) process.env.ANTHROPIC_API_KEY = saved.anthropic
    if (saved.openai !== undefined) process.env.OPENAI_API_KEY = saved.openai
  })

  it("runLLMRequest rejects before any request when no Anthropic key is available", async () => {
    await assert.rejects(() => runLLMRequest({ system: "s", prompt: "p" }), /ANTHROPIC_API_KEY/)
  })

  it("createOpenAIBackend throws when no OpenAI key is available", () => {
    assert.throws(() => createOpenAIBackend(), /OPENAI_API_KEY is required/)
  })
})
