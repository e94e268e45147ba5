export interface RawEntityRecord {
  text: string
  type?: string | null
  id?: string | null
}

export interface RawTripleRecord {
  head: string
  relation: string
  tail: string
  headType?: string | null
  tailType?: string | null
  confidence?: number
}

/** Output of one extractor run over one text, before normalization. */
export interface ExtractionPass {
  entities?: RawEntityRecord[]
  triples: RawTripleRecord[]
}

export interface ClaimExtractor {
  extract(text: string): Promise<ExtractionPass>
}

/** End-to-end extraction model that decodes straight to a marker token stream. */
export interface GenerativeBackend {
  generate(text: string): Promise<string>
}

export interface GenerativeMarkers {
  tripletStart: string
  subject: string
  object: string
  framing: readonly string[]
}

export interface NormalizeOptions {
  /** When given, each entity records where its surface text occurs in it. */
  sourceText?: string
}
