import { tripleToRecord } from "./triple"
import type { ExtractionResult, TripleRecord } from "./types"

export interface EntityRecord {
  text: string
  type: string | null
  id: string | null
}

/**
 * Claim graph in a JSON-ready shape, keyed by entity surface text.
 * Storage adapters (JSON files, graph databases) consume this and nothing else.
 */
export interface ClaimGraphExport {
  entities: EntityRecord[]
  triples: TripleRecord[]
}

export function exportClaimGraph(result: ExtractionResult): ClaimGraphExport {
  return {
    entities: result.entities.map((entity) => ({ text: entity.text, type: entity.type, id: entity.id })),
    triples: result.triples.map(tripleToRecord),
  }
}

function edgeKey(triple: TripleRecord): string {
  return JSON.stringify([triple.head, triple.relation, triple.tail])
}

/**
 * Upserts `incoming` into `base` the way a graph store merges nodes and edges:
 * entities match on text and keep the base type unless the incoming one is set,
 * edges match on (head, relation, tail) and take the incoming confidence.
 * Endpoints referenced only by an edge are added as untyped entities.
 */
export function mergeClaimGraphs(base: ClaimGraphExport, incoming: ClaimGraphExport): ClaimGraphExport {
  const entities = new Map<string, EntityRecord>()
  for (const entity of base.entities) {
    entities.set(entity.text, { ...entity })
  }
  for (const entity of incoming.entities) {
    const existing = entities.get(entity.text)
    if (existing) {
      entities.set(entity.text, {
        text: existing.text,
        type: entity.type ?? existing.type,
        id: entity.id ?? existing.id,
      })
    } else {
      entities.set(entity.text, { ...entity })
    }
  }

  const triples = new Map<string, TripleRecord>()
  for (const triple of [...base.triples, ...incoming.triples]) {
    triples.set(edgeKey(triple), { ...triple })
    for (const endpoint of [triple.head, triple.tail]) {
      if (!entities.has(endpoint)) {
        entities.set(endpoint, { text: endpoint, type: null, id: null })
      }
    }
  }

  return { entities: [...entities.values()], triples: [...triples.values()] }
}
