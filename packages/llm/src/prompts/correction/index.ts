/**
 * Claim Correction Prompt Exports
 */

import * as v1 from "./v1"

// Default to latest version
export const currentVersion = v1

export { v1 }

export type { CorrectionPromptParams } from "./v1"
