export type { RepairEdit, RepairResult } from "./types"
export { buildCorrectionPrompt, parseCorrectionResponse, correctTriples } from "./corrector"
export { applyCorrections, repairOutput } from "./replacer"
