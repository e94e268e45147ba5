import { generateText } from "ai"
import { createOpenAI } from "@ai-sdk/openai"
import type { CompletionBackend, CompletionOptions } from "./types"

export const DEFAULT_OPENAI_MODEL = "gpt-4o-mini"

export interface OpenAIBackendConfig {
  apiKey?: string
  model?: string
  defaultSystem?: string
}

/**
 * Completion backend over the OpenAI chat API.
 * The JSON schema option is not enforced here; prompts already spell out the shape.
 */
export function createOpenAIBackend(config: OpenAIBackendConfig = {}): CompletionBackend {
  const apiKey = config.apiKey || process.env.OPENAI_API_KEY
  if (!apiKey) {
    throw new Error("OPENAI_API_KEY is required for the OpenAI completion backend")
  }
  const openai = createOpenAI({ apiKey })
  const model = openai(config.model ?? DEFAULT_OPENAI_MODEL)

  return {
    async complete(prompt: string, options: CompletionOptions = {}): Promise<string> {
      const system = options.system ?? config.defaultSystem
      const { text } = await generateText({
        model,
        system: system || undefined,
        prompt,
        temperature: 0,
      })
      return text
    },
  }
}
