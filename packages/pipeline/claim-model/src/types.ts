// value types shared by every pipeline stage

export type NLILabel = "entailment" | "contradiction" | "neutral"

export const NLI_LABELS: readonly NLILabel[] = ["entailment", "contradiction", "neutral"]

/** Half-open character span into the source text (`text.slice(start, end)`). */
export interface MentionSpan {
  readonly start: number
  readonly end: number
}

export interface Entity {
  /** Surface string; the identity key inside one extraction result. */
  readonly text: string
  readonly type: string | null
  readonly id: string | null
  readonly mentions: readonly MentionSpan[]
}

export interface RelationTriple {
  readonly head: Entity
  readonly relation: string
  readonly tail: Entity
  /** In [0, 1]; 1.0 when the source gives none. */
  readonly confidence: number
}

export interface ExtractionResult {
  readonly entities: readonly Entity[]
  readonly triples: readonly RelationTriple[]
}

export type NLIScores = Readonly<Record<NLILabel, number>>

export interface InferenceVerdict {
  readonly triple: RelationTriple
  readonly scores: NLIScores
  readonly label: NLILabel
  readonly isHallucination: boolean
}

export interface Correction {
  readonly original: RelationTriple
  readonly corrected: RelationTriple
}

export interface TripleRecord {
  head: string
  relation: string
  tail: string
  confidence: number
}
