import { debugLog } from "@pipeline-logger"
import { DEFAULT_MARKERS, parseGenerativeOutput } from "./generative-parser"
import type { ClaimExtractor, ExtractionPass, GenerativeBackend, GenerativeMarkers } from "./types"

/** Extracts triples from an end-to-end model's marker token stream. */
export class GenerativeClaimExtractor implements ClaimExtractor {
  constructor(
    private readonly backend: GenerativeBackend,
    private readonly markers: GenerativeMarkers = DEFAULT_MARKERS,
  ) {}

  async extract(text: string): Promise<ExtractionPass> {
    const decoded = await this.backend.generate(text)
    const triples = parseGenerativeOutput(decoded, this.markers)
    debugLog(`[extract] generative extraction parsed ${triples.length} triples`)
    return { triples }
  }
}
