/**
 * Strips markdown code fences from LLM response
 * Handles cases where the model returns ```json ... ``` wrapped responses
 */
export function stripMarkdownFences(text: string): string {
  const trimmed = text.trim()

  const jsonFencePattern = /^```(?:json)?\s*\n?([\s\S]*?)\n?```$/
  const match = trimmed.match(jsonFencePattern)

  if (match) {
    return match[1].trim()
  }

  return trimmed
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}

/**
 * Decodes a model response that must be a single JSON object.
 * Throws on anything else; callers decide which pipeline error that becomes.
 */
export function parseJsonObject(text: string): Record<string, unknown> {
  const cleaned = stripMarkdownFences(text)
  let parsed: unknown
  try {
    parsed = JSON.parse(cleaned)
  } catch (error) {
    throw new Error(`Response is not valid JSON: ${error instanceof Error ? error.message : String(error)}`)
  }
  if (!isPlainObject(parsed)) {
    const kind = parsed === null ? "null" : Array.isArray(parsed) ? "array" : typeof parsed
    throw new Error(`Response must be a JSON object, received ${kind}`)
  }
  return parsed
}
