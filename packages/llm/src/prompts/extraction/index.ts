/**
 * Claim Extraction Prompt Exports
 */

import * as v1 from "./v1"

// Default to latest version
export const currentVersion = v1

export { v1 }

export type { ExtractionPromptParams } from "./v1"
