import type { Correction, RelationTriple } from "@claim-model"

export interface RepairEdit {
  original: string
  corrected: string
  /** Literal occurrences replaced; 0 when the original text was not found or was skipped. */
  occurrences: number
}

export interface RepairResult {
  text: string
  edits: RepairEdit[]
}

export type { Correction, RelationTriple }
