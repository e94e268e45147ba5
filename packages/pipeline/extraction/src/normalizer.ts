import { clampConfidence, createEntity, createTriple, DEFAULT_CONFIDENCE, findMentions } from "@claim-model"
import type { Entity, ExtractionResult, RelationTriple } from "@claim-model"
import { debugLog } from "@pipeline-logger"
import type { ExtractionPass, NormalizeOptions } from "./types"

interface EntityDraft {
  text: string
  type: string | null
  id: string | null
}

interface TripleDraft {
  head: string
  relation: string
  tail: string
  confidence: number
}

function isPassList(value: ExtractionPass | readonly ExtractionPass[]): value is readonly ExtractionPass[] {
  return Array.isArray(value)
}

function clean(value: unknown): string {
  return typeof value === "string" ? value.trim() : ""
}

function cleanOptional(value: unknown): string | null {
  const cleaned = clean(value)
  return cleaned.length > 0 ? cleaned : null
}

/**
 * Merges one or more extraction passes into a single claim graph.
 *
 * Entities are keyed by trimmed surface text in first-seen order; type and id
 * are set by the first record that supplies them and never overwritten.
 * Triple records missing head, relation or tail are dropped as extraction noise.
 */
export function normalizeExtraction(
  passes: ExtractionPass | readonly ExtractionPass[],
  options: NormalizeOptions = {},
): ExtractionResult {
  const passList: readonly ExtractionPass[] = isPassList(passes) ? passes : [passes]
  const drafts = new Map<string, EntityDraft>()
  const tripleDrafts: TripleDraft[] = []
  let skipped = 0

  const register = (text: string, type: string | null, id: string | null = null): void => {
    const existing = drafts.get(text)
    if (!existing) {
      drafts.set(text, { text, type, id })
      return
    }
    if (existing.type === null && type !== null) existing.type = type
    if (existing.id === null && id !== null) existing.id = id
  }

  for (const pass of passList) {
    for (const record of pass.entities ?? []) {
      const text = clean(record.text)
      if (!text) continue
      register(text, cleanOptional(record.type), cleanOptional(record.id))
    }

    for (const record of pass.triples) {
      const head = clean(record.head)
      const tail = clean(record.tail)
      const relation = clean(record.relation)
      if (!head || !tail || !relation) {
        skipped += 1
        continue
      }
      register(head, cleanOptional(record.headType))
      register(tail, cleanOptional(record.tailType))
      const confidence =
        typeof record.confidence === "number" && Number.isFinite(record.confidence)
          ? clampConfidence(record.confidence)
          : DEFAULT_CONFIDENCE
      tripleDrafts.push({ head, relation, tail, confidence })
    }
  }

  const entities = new Map<string, Entity>()
  for (const draft of drafts.values()) {
    entities.set(
      draft.text,
      createEntity(draft.text, {
        type: draft.type,
        id: draft.id,
        mentions: options.sourceText === undefined ? [] : findMentions(options.sourceText, draft.text),
      }),
    )
  }

  const triples: RelationTriple[] = []
  for (const draft of tripleDrafts) {
    const head = entities.get(draft.head)
    const tail = entities.get(draft.tail)
    // both endpoints were registered above
    if (!head || !tail) continue
    triples.push(createTriple(head, draft.relation, tail, draft.confidence))
  }

  debugLog(`[normalize] ${passList.length} passes -> ${entities.size} entities, ${triples.length} triples (${skipped} dropped)`)

  return Object.freeze({
    entities: Object.freeze([...entities.values()]),
    triples: Object.freeze(triples),
  })
}
