import { z } from "zod"
import { PipelineStageError } from "./error"

export type LLMProvider = "anthropic" | "openai"
export type NLIProvider = "server" | "llm"

export const DEFAULT_CONTRADICTION_THRESHOLD = 0.5
export const DEFAULT_NEUTRAL_THRESHOLD = 0.5
export const DEFAULT_NLI_URL = "http://127.0.0.1:8003/classify"
export const DEFAULT_NLI_MODEL = "facebook/bart-large-mnli"
export const DEFAULT_NLI_TIMEOUT_MS = 30_000
export const DEFAULT_NLI_MAX_RETRIES = 2

const DEFAULT_MODELS: Record<LLMProvider, string> = {
  anthropic: "claude-sonnet-4-5-20250929",
  openai: "gpt-4o-mini",
}

export interface ThresholdSettings {
  contradiction: number
  neutral: number
}

export interface TripleCheckSettings {
  llm: {
    provider: LLMProvider
    model: string
    apiKey: string
  }
  nli: {
    provider: NLIProvider
    url: string
    model: string
    timeoutMs: number
    maxRetries: number
  }
  thresholds: ThresholdSettings
}

export const thresholdSchema = z.number().finite().min(0).max(1)

const blankToUndefined = (value: unknown) => (typeof value === "string" && value.trim() === "" ? undefined : value)

const envSchema = z.object({
  TRIPLECHECK_LLM_PROVIDER: z.string().optional(),
  TRIPLECHECK_LLM_MODEL: z.preprocess(blankToUndefined, z.string().trim().optional()),
  ANTHROPIC_API_KEY: z.preprocess(blankToUndefined, z.string().trim().optional()),
  OPENAI_API_KEY: z.preprocess(blankToUndefined, z.string().trim().optional()),
  TRIPLECHECK_NLI_PROVIDER: z.string().optional(),
  TRIPLECHECK_NLI_URL: z.preprocess(blankToUndefined, z.string().trim().url().default(DEFAULT_NLI_URL)),
  TRIPLECHECK_NLI_MODEL: z.preprocess(blankToUndefined, z.string().trim().default(DEFAULT_NLI_MODEL)),
  TRIPLECHECK_NLI_TIMEOUT_MS: z.preprocess(
    blankToUndefined,
    z.coerce.number().int().positive().default(DEFAULT_NLI_TIMEOUT_MS),
  ),
  TRIPLECHECK_NLI_MAX_RETRIES: z.preprocess(
    blankToUndefined,
    z.coerce.number().int().min(0).default(DEFAULT_NLI_MAX_RETRIES),
  ),
  TRIPLECHECK_CONTRADICTION_THRESHOLD: z.preprocess(
    blankToUndefined,
    z.coerce.number().pipe(thresholdSchema).default(DEFAULT_CONTRADICTION_THRESHOLD),
  ),
  TRIPLECHECK_NEUTRAL_THRESHOLD: z.preprocess(
    blankToUndefined,
    z.coerce.number().pipe(thresholdSchema).default(DEFAULT_NEUTRAL_THRESHOLD),
  ),
})

function normalizeProvider(rawProvider: string | undefined): string {
  return rawProvider?.trim().toLowerCase() || ""
}

export function resolveLLMProvider(rawProvider: string | undefined): LLMProvider {
  const provider = normalizeProvider(rawProvider)
  if (provider === "openai" || provider === "gpt") {
    return "openai"
  }
  if (provider === "" || provider === "anthropic" || provider === "claude") {
    return "anthropic"
  }
  throw new PipelineStageError(
    "PIPELINE_CONFIG_INVALID",
    `Unknown TRIPLECHECK_LLM_PROVIDER "${rawProvider}". Expected "anthropic" or "openai".`,
    false,
    { stage: "config" },
  )
}

export function resolveNLIProvider(rawProvider: string | undefined): NLIProvider {
  const provider = normalizeProvider(rawProvider)
  if (provider === "llm") {
    return "llm"
  }
  if (provider === "" || provider === "server" || provider === "http" || provider === "transformers") {
    return "server"
  }
  throw new PipelineStageError(
    "PIPELINE_CONFIG_INVALID",
    `Unknown TRIPLECHECK_NLI_PROVIDER "${rawProvider}". Expected "server" or "llm".`,
    false,
    { stage: "config" },
  )
}

/**
 * Loads settings from environment variables.
 * Keys and endpoints stay outside the codebase; nothing here reads files.
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): TripleCheckSettings {
  const parsed = envSchema.safeParse(env)
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    throw new PipelineStageError(
      "PIPELINE_CONFIG_INVALID",
      `Invalid triplecheck configuration: ${issues.join("; ")}`,
      false,
      { stage: "config", issues },
    )
  }

  const vars = parsed.data
  const provider = resolveLLMProvider(vars.TRIPLECHECK_LLM_PROVIDER)
  const apiKey = provider === "anthropic" ? vars.ANTHROPIC_API_KEY : vars.OPENAI_API_KEY
  if (!apiKey) {
    const keyName = provider === "anthropic" ? "ANTHROPIC_API_KEY" : "OPENAI_API_KEY"
    throw new PipelineStageError(
      "PIPELINE_CONFIG_INVALID",
      `${keyName} environment variable is required for the ${provider} provider.`,
      false,
      { stage: "config" },
    )
  }

  return {
    llm: {
      provider,
      model: vars.TRIPLECHECK_LLM_MODEL ?? DEFAULT_MODELS[provider],
      apiKey,
    },
    nli: {
      provider: resolveNLIProvider(vars.TRIPLECHECK_NLI_PROVIDER),
      url: vars.TRIPLECHECK_NLI_URL,
      model: vars.TRIPLECHECK_NLI_MODEL,
      timeoutMs: vars.TRIPLECHECK_NLI_TIMEOUT_MS,
      maxRetries: vars.TRIPLECHECK_NLI_MAX_RETRIES,
    },
    thresholds: {
      contradiction: vars.TRIPLECHECK_CONTRADICTION_THRESHOLD,
      neutral: vars.TRIPLECHECK_NEUTRAL_THRESHOLD,
    },
  }
}
