import { describe, expect, it } from "vitest"
import { InsufficientSamplesError, LocationNotFoundError, OptimizerError, asJobError } from "./errors"

describe("asJobError", () => {
  it("keeps the code of optimizer errors", () => {
    expect(asJobError(new InsufficientSamplesError(2, 4))).toEqual({
      message: "Only 2 candidate intersection(s) available for 4 unit(s)",
      code: "INSUFFICIENT_SAMPLES",
    })
    expect(asJobError(new LocationNotFoundError("Atlantis"))).toEqual({
      message: 'No location found for "Atlantis"',
      code: "LOCATION_NOT_FOUND",
    })
  })

  it("maps other failures to OPTIMIZATION_FAILED", () => {
    expect(asJobError(new Error("boom"))).toEqual({ message: "boom", code: "OPTIMIZATION_FAILED" })
    expect(asJobError("boom")).toEqual({ message: "Unknown optimization error", code: "OPTIMIZATION_FAILED" })
  })

  it("names error instances after their class", () => {
    const error = new InsufficientSamplesError(1, 2)
    expect(error).toBeInstanceOf(OptimizerError)
    expect(error.name).toBe("InsufficientSamplesError")
  })
})
