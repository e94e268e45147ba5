export type PipelineStage = "extract" | "normalize" | "judge" | "correct" | "repair" | "config"

export interface PipelineErrorDetails extends Record<string, unknown> {
  stage?: PipelineStage
  tripleIndex?: number
}

export interface PipelineError {
  code: string
  message: string
  recoverable: boolean
  details?: PipelineErrorDetails
}

export class PipelineStageError extends Error implements PipelineError {
  code: string
  recoverable: boolean
  details?: PipelineErrorDetails

  constructor(
    code: string,
    message: string,
    recoverable: boolean,
    details?: PipelineErrorDetails,
    options?: { cause?: unknown },
  ) {
    super(message, options)
    this.name = "PipelineStageError"
    this.code = code
    this.recoverable = recoverable
    this.details = details
  }
}

export function createPipelineError(
  code: string,
  message: string,
  recoverable: boolean,
  details?: PipelineErrorDetails,
): PipelineError {
  return { code, message, recoverable, details }
}

export function isPipelineError(error: unknown): error is PipelineError {
  if (!error || typeof error !== "object") return false
  return (
    "code" in error &&
    typeof error.code === "string" &&
    "message" in error &&
    typeof error.message === "string" &&
    "recoverable" in error &&
    typeof error.recoverable === "boolean"
  )
}

export function toPipelineError(
  error: unknown,
  fallback: {
    code: string
    message: string
    recoverable: boolean
    details?: PipelineErrorDetails
  },
): PipelineError {
  if (error instanceof PipelineStageError) {
    return createPipelineError(error.code, error.message, error.recoverable, error.details)
  }

  if (isPipelineError(error)) {
    return createPipelineError(error.code, error.message, error.recoverable, error.details)
  }

  if (error instanceof Error) {
    return createPipelineError(
      fallback.code,
      error.message || fallback.message,
      fallback.recoverable,
      fallback.details,
    )
  }

  return createPipelineError(
    fallback.code,
    typeof error === "string" ? error : fallback.message,
    fallback.recoverable,
    fallback.details,
  )
}

/**
 * Normalizes anything thrown inside a stage into a PipelineStageError.
 * Fallback details are merged under the details the error already carries,
 * so a stage name added by the orchestrator never hides a triple index set deeper down.
 */
export function toPipelineStageError(
  error: unknown,
  fallback: {
    code: string
    message: string
    recoverable: boolean
    details?: PipelineErrorDetails
  },
): PipelineStageError {
  if (error instanceof PipelineStageError) {
    if (!fallback.details) return error
    return new PipelineStageError(
      error.code,
      error.message,
      error.recoverable,
      { ...fallback.details, ...error.details },
      { cause: error.cause },
    )
  }
  const normalized = toPipelineError(error, fallback)
  return new PipelineStageError(
    normalized.code,
    normalized.message,
    normalized.recoverable,
    { ...fallback.details, ...normalized.details },
    { cause: error },
  )
}
