import type { JobError } from "../types"

export type OptimizerErrorCode =
  | "INSUFFICIENT_SAMPLES"
  | "INVALID_INPUT"
  | "NETWORK_FETCH_FAILED"
  | "LOCATION_NOT_FOUND"

export class OptimizerError extends Error {
  constructor(
    message: string,
    readonly code: OptimizerErrorCode
  ) {
    super(message)
    this.name = new.target.name
  }
}

/**
 * Fewer coordinate samples than requested facilities. Retrying with the same
 * input cannot succeed; the caller has to lower the unit count or widen the area.
 */
export class InsufficientSamplesError extends OptimizerError {
  constructor(
    readonly available: number,
    readonly required: number
  ) {
    super(
      `Only ${available} candidate intersection(s) available for ${required} unit(s)`,
      "INSUFFICIENT_SAMPLES"
    )
  }
}

export class OptimizerInputError extends OptimizerError {
  constructor(message: string) {
    super(message, "INVALID_INPUT")
  }
}

export class NetworkFetchError extends OptimizerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "NETWORK_FETCH_FAILED")
    if (options?.cause !== undefined) this.cause = options.cause
  }
}

export class LocationNotFoundError extends OptimizerError {
  constructor(query: string) {
    super(`No location found for "${query}"`, "LOCATION_NOT_FOUND")
  }
}

export function asJobError(error: unknown): JobError {
  if (error instanceof OptimizerError) {
    return { message: error.message, code: error.code }
  }
  if (error instanceof Error) {
    return { message: error.message, code: "OPTIMIZATION_FAILED" }
  }
  return { message: "Unknown optimization error", code: "OPTIMIZATION_FAILED" }
}
