import type { Entity, MentionSpan, RelationTriple, TripleRecord } from "./types"

export const DEFAULT_CONFIDENCE = 1.0

export interface EntityInit {
  type?: string | null
  id?: string | null
  mentions?: readonly MentionSpan[]
}

export function createEntity(text: string, init: EntityInit = {}): Entity {
  return Object.freeze({
    text,
    type: init.type ?? null,
    id: init.id ?? null,
    mentions: Object.freeze((init.mentions ?? []).map((span) => Object.freeze({ start: span.start, end: span.end }))),
  })
}

export function createTriple(head: Entity, relation: string, tail: Entity, confidence = DEFAULT_CONFIDENCE): RelationTriple {
  if (relation.trim().length === 0) {
    throw new Error("relation must be a non-empty label")
  }
  return Object.freeze({ head, relation, tail, confidence: clampConfidence(confidence) })
}

export function clampConfidence(value: number): number {
  if (!Number.isFinite(value)) return DEFAULT_CONFIDENCE
  return Math.min(1, Math.max(0, value))
}

/** Repair form: "{head} {relation} {tail}", no trailing period. */
export function verbalizeTriple(triple: RelationTriple): string {
  return `${triple.head.text} ${triple.relation} ${triple.tail.text}`
}

/** Hypothesis form sent to the NLI classifier. */
export function toHypothesis(triple: RelationTriple): string {
  return `${verbalizeTriple(triple)}.`
}

export function tripleKey(triple: RelationTriple): string {
  return JSON.stringify([triple.head.text, triple.relation, triple.tail.text])
}

export function tripleToRecord(triple: RelationTriple): TripleRecord {
  return {
    head: triple.head.text,
    relation: triple.relation,
    tail: triple.tail.text,
    confidence: triple.confidence,
  }
}

/** Literal, non-overlapping occurrences of `needle` in `source`, left to right. */
export function findMentions(source: string, needle: string): MentionSpan[] {
  const spans: MentionSpan[] = []
  if (needle.length === 0) return spans
  let from = source.indexOf(needle)
  while (from !== -1) {
    spans.push({ start: from, end: from + needle.length })
    from = source.indexOf(needle, from + needle.length)
  }
  return spans
}
