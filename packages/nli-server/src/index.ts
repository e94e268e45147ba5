import { z } from "zod"
import {
  DEFAULT_NLI_MAX_RETRIES,
  DEFAULT_NLI_MODEL,
  DEFAULT_NLI_TIMEOUT_MS,
  DEFAULT_NLI_URL,
} from "@pipeline-config"
import { PipelineStageError } from "@pipeline-errors"
import { debugLog, debugWarn } from "@pipeline-logger"
import type { ClassificationBackend, PremiseHypothesisPair, RawDistribution } from "@verification"

const DEFAULT_BATCH_SIZE = 32

export interface NLIServerOptions {
  url?: string
  model?: string
  apiKey?: string
  timeoutMs?: number
  maxRetries?: number
  batchSize?: number
  fetchFn?: typeof fetch
  waitFn?: (ms: number) => Promise<void>
}

const labelScoreSchema = z.object({ label: z.string(), score: z.number() })
const batchResponseSchema = z.array(z.array(labelScoreSchema))
const singleResponseSchema = z.array(labelScoreSchema)

function wait(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

/**
 * For localhost connections, HTTPS is not required since data never leaves the machine.
 * Only validate HTTPS for remote endpoints.
 */
function validateLocalOrHttpsUrl(url: string, serviceName: string): void {
  let parsed: URL
  try {
    parsed = new URL(url)
  } catch {
    throw new Error(`Invalid ${serviceName} URL: ${url}`)
  }
  const isLocalhost = parsed.hostname === "localhost" || parsed.hostname === "127.0.0.1" || parsed.hostname === "[::1]"
  if (!isLocalhost && parsed.protocol !== "https:") {
    throw new Error(
      `SECURITY ERROR: ${serviceName} endpoint must use HTTPS or localhost. ` +
        `Received: ${parsed.protocol}//${parsed.host}`,
    )
  }
}

interface TimedResponse {
  ok: boolean
  status: number
  statusText: string
  bodyText: string
}

// the timer stays armed until the body has been read; a stalled body aborts like a stalled connect
async function fetchWithTimeout(fetchFn: typeof fetch, timeoutMs: number, url: string, init: RequestInit): Promise<TimedResponse> {
  const controller = new AbortController()
  const timeout = setTimeout(() => controller.abort(), timeoutMs)
  try {
    const response = await fetchFn(url, { ...init, signal: controller.signal })
    const bodyText = await response.text()
    return { ok: response.ok, status: response.status, statusText: response.statusText, bodyText }
  } catch (error) {
    if (controller.signal.aborted) {
      throw new DOMException(`Request aborted after ${timeoutMs}ms`, "AbortError")
    }
    throw error
  } finally {
    clearTimeout(timeout)
  }
}

function shouldRetryStatus(status: number): boolean {
  return status === 408 || status === 425 || status === 429 || status >= 500
}

function decodeDistributions(body: unknown, expected: number): RawDistribution[] {
  const batch = batchResponseSchema.safeParse(body)
  if (batch.success) {
    return batch.data
  }
  // some servers flatten the response when a single pair is sent
  if (expected === 1) {
    const single = singleResponseSchema.safeParse(body)
    if (single.success) {
      return [single.data]
    }
  }
  throw new PipelineStageError(
    "NLI_MALFORMED_RESPONSE",
    "NLI server response is not a list of label/score distributions",
    false,
    { stage: "judge" },
  )
}

async function classifyChunk(
  pairs: PremiseHypothesisPair[],
  settings: Required<Omit<NLIServerOptions, "apiKey">> & { apiKey?: string },
): Promise<RawDistribution[]> {
  const { url, model, apiKey, timeoutMs, maxRetries, fetchFn, waitFn } = settings
  const headers: Record<string, string> = {
    "Content-Type": "application/json",
  }
  if (apiKey) {
    headers.Authorization = `Bearer ${apiKey}`
  }
  const body = JSON.stringify({
    model,
    inputs: pairs.map((pair) => ({ text: pair.premise, text_pair: pair.hypothesis })),
    parameters: { top_k: null },
  })

  const totalAttempts = maxRetries + 1
  for (let attempt = 1; attempt <= totalAttempts; attempt += 1) {
    try {
      const response = await fetchWithTimeout(fetchFn, timeoutMs, url, {
        method: "POST",
        headers,
        body,
      })

      if (!response.ok) {
        const errorText = response.bodyText
        const retryable = shouldRetryStatus(response.status) && attempt < totalAttempts
        if (retryable) {
          debugWarn(`NLI server returned ${response.status}, retrying (attempt ${attempt}/${totalAttempts})`)
          await waitFn(250 * attempt)
          continue
        }
        throw new Error(`NLI classification failed (${response.status}): ${errorText || response.statusText}`)
      }

      let payload: unknown
      try {
        payload = JSON.parse(response.bodyText)
      } catch {
        throw new PipelineStageError("NLI_MALFORMED_RESPONSE", "NLI server returned a body that is not JSON", false, {
          stage: "judge",
        })
      }
      return decodeDistributions(payload, pairs.length)
    } catch (error) {
      const isAbort = error instanceof DOMException && error.name === "AbortError"
      const isNetworkFetch = error instanceof TypeError && error.message.toLowerCase().includes("fetch")
      const shouldRetry = (isAbort || isNetworkFetch) && attempt < totalAttempts
      if (shouldRetry) {
        await waitFn(250 * attempt)
        continue
      }

      if (isAbort) {
        throw new Error(`NLI classification timed out after ${timeoutMs}ms (attempt ${attempt}/${totalAttempts}).`)
      }

      if (isNetworkFetch) {
        throw new Error(`Cannot connect to NLI server at ${url}. Please ensure the classification server is running.`)
      }

      throw error
    }
  }

  throw new Error("NLI classification failed after retries")
}

/**
 * Classification backend over an HTTP text-classification server hosting an MNLI model.
 * Large batches are split into chunks; results are concatenated in pair order.
 */
export function createNLIServerBackend(options: NLIServerOptions = {}): ClassificationBackend {
  const settings = {
    url: options.url || process.env.TRIPLECHECK_NLI_URL || DEFAULT_NLI_URL,
    model: options.model || process.env.TRIPLECHECK_NLI_MODEL || DEFAULT_NLI_MODEL,
    apiKey: options.apiKey,
    timeoutMs: options.timeoutMs ?? DEFAULT_NLI_TIMEOUT_MS,
    maxRetries: options.maxRetries ?? DEFAULT_NLI_MAX_RETRIES,
    batchSize: Math.max(1, options.batchSize ?? DEFAULT_BATCH_SIZE),
    fetchFn: options.fetchFn ?? globalThis.fetch.bind(globalThis),
    waitFn: options.waitFn ?? wait,
  }

  validateLocalOrHttpsUrl(settings.url, "NLI server")

  return {
    async classifyBatch(pairs: PremiseHypothesisPair[]): Promise<RawDistribution[]> {
      const results: RawDistribution[] = []
      for (let start = 0; start < pairs.length; start += settings.batchSize) {
        const chunk = pairs.slice(start, start + settings.batchSize)
        const distributions = await classifyChunk(chunk, settings)
        if (distributions.length !== chunk.length) {
          throw new PipelineStageError(
            "NLI_SHAPE_MISMATCH",
            `NLI server returned ${distributions.length} distributions for ${chunk.length} pairs`,
            false,
            { stage: "judge" },
          )
        }
        results.push(...distributions)
      }
      debugLog(`[nli-server] classified ${pairs.length} pairs with ${settings.model}`)
      return results
    },
  }
}
