import type { TripleCheckSettings } from "@pipeline-config"
import { LLMClaimExtractor } from "@extraction"
import type { ClaimExtractor } from "@extraction"
import { createAnthropicBackend, createOpenAIBackend } from "@llm"
import type { CompletionBackend } from "@llm"
import { createNLIServerBackend } from "@nli-server"
import { LLMNLIClassifier } from "@verification"
import type { ClassificationBackend } from "@verification"
import { TripleCheckPipeline } from "./pipeline"

export function createCompletionBackend(settings: TripleCheckSettings["llm"]): CompletionBackend {
  switch (settings.provider) {
    case "openai":
      return createOpenAIBackend({ apiKey: settings.apiKey, model: settings.model })
    case "anthropic":
    default:
      return createAnthropicBackend({ apiKey: settings.apiKey, model: settings.model })
  }
}

export function createClassificationBackend(
  settings: TripleCheckSettings["nli"],
  completion: CompletionBackend,
): ClassificationBackend {
  switch (settings.provider) {
    case "llm":
      return new LLMNLIClassifier(completion)
    case "server":
    default:
      return createNLIServerBackend({
        url: settings.url,
        model: settings.model,
        timeoutMs: settings.timeoutMs,
        maxRetries: settings.maxRetries,
      })
  }
}

/** Wires backends from settings; any part can be swapped through `overrides`. */
export function createPipelineFromSettings(
  settings: TripleCheckSettings,
  overrides: {
    extractors?: ClaimExtractor[]
    classifier?: ClassificationBackend
    corrector?: CompletionBackend
  } = {},
): TripleCheckPipeline {
  const completion = overrides.corrector ?? createCompletionBackend(settings.llm)
  return new TripleCheckPipeline({
    extractors: overrides.extractors ?? [new LLMClaimExtractor(completion)],
    classifier: overrides.classifier ?? createClassificationBackend(settings.nli, completion),
    corrector: completion,
    thresholds: settings.thresholds,
  })
}
