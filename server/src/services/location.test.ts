import { beforeEach, describe, expect, it, vi } from "vitest"
import { LocationNotFoundError, OptimizerInputError } from "../lib/errors"
import { bboxFromCenterRadiusMeters } from "../lib/geo"
import { resolveLocation } from "./location"
import { geocodePlace } from "./search"

vi.mock("./search", () => ({
  geocodePlace: vi.fn(),
}))

const geocode = vi.mocked(geocodePlace)

describe("resolveLocation", () => {
  beforeEach(() => {
    geocode.mockReset()
  })

  it("builds the highway preset bbox around its center", async () => {
    const resolved = await resolveLocation({ preset: "highway" }, 2000)
    expect(resolved.label).toBe("Delhi-Mumbai Expressway (Sohna Segment)")
    expect(resolved.preset?.min_degree).toBe(3)
    expect(resolved.bbox).toEqual(bboxFromCenterRadiusMeters([77.0697, 28.2378], 5000))
    expect(resolved.bbox[1]).toBeCloseTo(28.192568, 5)
    expect(resolved.bbox[3]).toBeCloseTo(28.283032, 5)
    expect(geocode).not.toHaveBeenCalled()
  })

  it("uses a compact place outline as-is", async () => {
    geocode.mockResolvedValue({
      display_name: "Koramangala, Bengaluru",
      lat: 12.93,
      lon: 77.62,
      bbox: [77.61, 12.92, 77.64, 12.95],
      type: "suburb",
    })
    const resolved = await resolveLocation({ place: "Koramangala" }, 2000)
    expect(geocode).toHaveBeenCalledWith("Koramangala")
    expect(resolved.bbox).toEqual([77.61, 12.92, 77.64, 12.95])
    expect(resolved.label).toBe("Koramangala, Bengaluru")
  })

  it("falls back to a radius around the point for large outlines", async () => {
    geocode.mockResolvedValue({
      display_name: "Bengaluru",
      lat: 12.97,
      lon: 77.59,
      bbox: [77.3, 12.7, 77.9, 13.2],
      type: "city",
    })
    const resolved = await resolveLocation({ place: "Bengaluru", radius_m: 1500 }, 2000)
    expect(resolved.bbox).toEqual(bboxFromCenterRadiusMeters([77.59, 12.97], 1500))
  })

  it("normalizes an explicit bbox", async () => {
    const resolved = await resolveLocation({ bbox: [77.64, 12.95, 77.61, 12.92] }, 2000)
    expect(resolved.bbox).toEqual([77.61, 12.92, 77.64, 12.95])
    expect(resolved.label).toBe("77.6100, 12.9200, 77.6400, 12.9500")
  })

  it("rejects oversized and empty bboxes", async () => {
    await expect(resolveLocation({ bbox: [76, 12, 78, 14] }, 2000)).rejects.toBeInstanceOf(OptimizerInputError)
    await expect(resolveLocation({ bbox: [77, 12, 77, 13] }, 2000)).rejects.toBeInstanceOf(OptimizerInputError)
  })

  it("labels a center request by its coordinates", async () => {
    const resolved = await resolveLocation({ center: [77.62, 12.93] }, 2000)
    expect(resolved.label).toBe("12.93000, 77.62000")
    expect(resolved.bbox).toEqual(bboxFromCenterRadiusMeters([77.62, 12.93], 2000))
  })

  it("requires some location", async () => {
    await expect(resolveLocation({ place: "   " }, 2000)).rejects.toBeInstanceOf(OptimizerInputError)
  })

  it("passes geocoding misses through", async () => {
    geocode.mockRejectedValue(new LocationNotFoundError("Atlantis"))
    await expect(resolveLocation({ place: "Atlantis" }, 2000)).rejects.toBeInstanceOf(LocationNotFoundError)
  })
})
