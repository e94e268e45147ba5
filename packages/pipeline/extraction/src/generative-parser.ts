import type { GenerativeMarkers, RawTripleRecord } from "./types"

export const DEFAULT_MARKERS: GenerativeMarkers = Object.freeze({
  tripletStart: "<triplet>",
  subject: "<subj>",
  object: "<obj>",
  framing: Object.freeze(["<s>", "</s>", "<pad>", "<unk>"]),
})

function cleanSpan(span: string, markers: GenerativeMarkers): string {
  let cleaned = span
  for (const marker of [markers.tripletStart, markers.subject, markers.object, ...markers.framing]) {
    cleaned = cleaned.split(marker).join(" ")
  }
  return cleaned.replace(/\s+/g, " ").trim()
}

function parseSegment(segment: string, markers: GenerativeMarkers): RawTripleRecord[] {
  const [headPart, ...groups] = segment.split(markers.subject)
  const head = cleanSpan(headPart, markers)
  const records: RawTripleRecord[] = []
  if (!head) return records

  for (const group of groups) {
    const objectAt = group.indexOf(markers.object)
    // truncated group: no object marker, nothing to emit
    if (objectAt === -1) continue
    const tail = cleanSpan(group.slice(0, objectAt), markers)
    const relation = cleanSpan(group.slice(objectAt + markers.object.length), markers)
    if (tail && relation) {
      records.push({ head, relation, tail })
    }
  }
  return records
}

/**
 * Parses the decoded output of an end-to-end relation extraction model.
 *
 * Grammar per segment: `head <subj> tail <obj> relation`, where further
 * `<subj> tail <obj> relation` groups reuse the segment's head and a relation
 * runs until the next subject marker, triplet marker or end of stream.
 * Records come back in stream order with duplicates kept.
 */
export function parseGenerativeOutput(decoded: string, markers: GenerativeMarkers = DEFAULT_MARKERS): RawTripleRecord[] {
  let stream = decoded
  for (const token of markers.framing) {
    stream = stream.split(token).join(" ")
  }

  const records: RawTripleRecord[] = []
  for (const segment of stream.split(markers.tripletStart)) {
    records.push(...parseSegment(segment, markers))
  }
  return records
}
