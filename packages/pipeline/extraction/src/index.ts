export type {
  RawEntityRecord,
  RawTripleRecord,
  ExtractionPass,
  ClaimExtractor,
  GenerativeBackend,
  GenerativeMarkers,
  NormalizeOptions,
} from "./types"
export { DEFAULT_MARKERS, parseGenerativeOutput } from "./generative-parser"
export { normalizeExtraction } from "./normalizer"
export { extractionResponseSchema } from "./schema"
export type { ExtractionResponse } from "./schema"
export { LLMClaimExtractor, parseExtractionResponse } from "./llm-extractor"
export { GenerativeClaimExtractor } from "./generative-extractor"
