import { verbalizeTriple } from "@claim-model"
import type { RelationTriple } from "@claim-model"
import { PipelineStageError } from "@pipeline-errors"
import type { RepairEdit, RepairResult } from "./types"

function countOccurrences(text: string, needle: string): number {
  let count = 0
  let from = text.indexOf(needle)
  while (from !== -1) {
    count += 1
    from = text.indexOf(needle, from + needle.length)
  }
  return count
}

/**
 * Rewrites `originalOutput` pair by pair: every literal occurrence of the
 * rejected triple's "head relation tail" becomes the corrected one.
 * Each replacement runs on the text produced by the previous one.
 */
export function applyCorrections(
  originalOutput: string,
  hallucinated: readonly RelationTriple[],
  corrected: readonly RelationTriple[],
): RepairResult {
  if (hallucinated.length !== corrected.length) {
    throw new PipelineStageError(
      "REPAIR_SHAPE_MISMATCH",
      `hallucinated and corrected triples must have the same length (${hallucinated.length} vs ${corrected.length})`,
      false,
      { stage: "repair" },
    )
  }

  let text = originalOutput
  const edits: RepairEdit[] = []
  hallucinated.forEach((oldTriple, index) => {
    const before = verbalizeTriple(oldTriple)
    const after = verbalizeTriple(corrected[index])
    // degenerate triple: nothing but the separating spaces
    if (!before.trim()) {
      edits.push({ original: before, corrected: after, occurrences: 0 })
      return
    }
    const occurrences = countOccurrences(text, before)
    // function replacer keeps "$&" and friends in the corrected text literal
    text = text.replaceAll(before, () => after)
    edits.push({ original: before, corrected: after, occurrences })
  })

  return { text, edits }
}

export function repairOutput(
  originalOutput: string,
  hallucinated: readonly RelationTriple[],
  corrected: readonly RelationTriple[],
): string {
  return applyCorrections(originalOutput, hallucinated, corrected).text
}
