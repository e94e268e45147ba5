export type { CompletionBackend, CompletionOptions, JsonSchemaSpec } from "./types"
export { runLLMRequest, createAnthropicBackend, DEFAULT_ANTHROPIC_MODEL } from "./anthropic"
export type { LLMRequest, AnthropicBackendConfig } from "./anthropic"
export { createOpenAIBackend, DEFAULT_OPENAI_MODEL } from "./openai"
export type { OpenAIBackendConfig } from "./openai"
export { stripMarkdownFences, parseJsonObject } from "./json"

// Export prompts for versioned prompt management
export * as prompts from "./prompts"
