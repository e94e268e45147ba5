/**
 * Debug logging utility that gates console output behind environment flags.
 *
 * Claim text, reference contexts and model responses may carry user data, so they
 * go through `debugLogContent`, never through `console.log` directly.
 *
 * @example
 * debugLog("[judge] classifying", pairs.length, "pairs") // metadata only
 * debugLogContent("[judge] hypothesis:", hypothesis) // gated twice
 */

const isDebugEnabled = (env: NodeJS.ProcessEnv = process.env): boolean => {
  return env.TRIPLECHECK_DEBUG_LOGS === "true"
}

const isDevelopment = (env: NodeJS.ProcessEnv = process.env): boolean => {
  return env.NODE_ENV === "development"
}

/**
 * Log metadata such as counts, stage names and timings.
 * Enabled in development or when TRIPLECHECK_DEBUG_LOGS=true.
 */
export function debugLog(...args: unknown[]): void {
  if (isDevelopment() || isDebugEnabled()) {
    console.log(...args)
  }
}

/**
 * Log claim, context or response text.
 * Only logs when TRIPLECHECK_DEBUG_LOGS=true AND in development mode.
 */
export function debugLogContent(...args: unknown[]): void {
  if (isDevelopment() && isDebugEnabled()) {
    console.log("[CONTENT DEBUG]", ...args)
  }
}

/**
 * Log errors. Always enabled regardless of debug flags.
 */
export function debugError(...args: unknown[]): void {
  console.error(...args)
}

/**
 * Log warnings. Always enabled regardless of debug flags.
 */
export function debugWarn(...args: unknown[]): void {
  console.warn(...args)
}
