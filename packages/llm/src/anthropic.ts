import Anthropic from "@anthropic-ai/sdk"
import type { CompletionBackend, CompletionOptions, JsonSchemaSpec } from "./types"

export const DEFAULT_ANTHROPIC_MODEL = "claude-sonnet-4-5-20250929"

export interface LLMRequest {
  system: string
  prompt: string
  model?: string
  apiKey?: string
  maxTokens?: number
  /**
   * JSON schema for structured output
   * Set to enable JSON mode with schema validation
   */
  jsonSchema?: JsonSchemaSpec
}

export async function runLLMRequest({ system, prompt, model, apiKey, maxTokens, jsonSchema }: LLMRequest): Promise<string> {
  const anthropicApiKey = apiKey || process.env.ANTHROPIC_API_KEY

  if (!anthropicApiKey) {
    throw new Error(
      "ANTHROPIC_API_KEY environment variable is required. " +
      "Please set it in your environment or pass apiKey explicitly."
    )
  }

  const client = new Anthropic({
    apiKey: anthropicApiKey,
  })

  const requestParams: Anthropic.MessageCreateParamsNonStreaming = {
    model: model ?? DEFAULT_ANTHROPIC_MODEL,
    max_tokens: maxTokens ?? 4096,
    temperature: 0,
    messages: [
      {
        role: "user",
        content: prompt,
      },
    ],
  }

  if (jsonSchema) {
    // Structured output goes through a forced tool call that enforces the schema
    if (system) {
      requestParams.system = [
        {
          type: "text",
          text: system,
        },
      ]
    }
    requestParams.tools = [
      {
        name: jsonSchema.name,
        description: jsonSchema.description ?? `Return a ${jsonSchema.name} object following this exact structure`,
        input_schema: { ...jsonSchema.schema, type: "object" },
      },
    ]
    requestParams.tool_choice = {
      type: "tool",
      name: jsonSchema.name,
    }
  } else if (system) {
    requestParams.system = system
  }

  const message = await client.messages.create(requestParams)

  if (jsonSchema) {
    const toolUseBlock = message.content.find((block) => block.type === "tool_use")
    if (toolUseBlock && toolUseBlock.type === "tool_use") {
      return JSON.stringify(toolUseBlock.input, null, 2)
    }
  }

  const textContent = message.content.find((block) => block.type === "text")
  if (!textContent || textContent.type !== "text") {
    throw new Error("No text content in Anthropic response")
  }

  return textContent.text
}

export interface AnthropicBackendConfig {
  apiKey?: string
  model?: string
  maxTokens?: number
  /** Used when a call passes no system prompt of its own. */
  defaultSystem?: string
}

export function createAnthropicBackend(config: AnthropicBackendConfig = {}): CompletionBackend {
  return {
    complete(prompt: string, options: CompletionOptions = {}): Promise<string> {
      return runLLMRequest({
        system: options.system ?? config.defaultSystem ?? "",
        prompt,
        model: config.model,
        apiKey: config.apiKey,
        maxTokens: config.maxTokens,
        jsonSchema: options.jsonSchema,
      })
    },
  }
}
