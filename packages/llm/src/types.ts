export interface JsonSchemaSpec {
  name: string
  description?: string
  schema: Record<string, unknown>
}

export interface CompletionOptions {
  system?: string
  /**
   * JSON schema for structured output.
   * Backends that cannot enforce a schema ignore it and rely on the prompt.
   */
  jsonSchema?: JsonSchemaSpec
}

/** Text-completion capability shared by extraction, correction and LLM-based NLI. */
export interface CompletionBackend {
  complete(prompt: string, options?: CompletionOptions): Promise<string>
}
