import { afterEach, describe, expect, it, vi } from "vitest"
import { ApiError, getPresets, getResult, isRunning, optimize, waitForResult } from "./client"

function jsonResponse(body: unknown, status = 200) {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  })
}

const PAYLOAD = {
  result: {
    risk_nodes: [],
    hubs: [{ index: 1, lat: 12.93, lon: 77.62 }],
    counts: { network_nodes: 40, risk_nodes: 12, hubs: 1 },
    risk_tier: "primary",
    min_degree_applied: 4,
    inertia: 0.0002,
    warnings: [],
  },
  hub_lines: ["Unit 1: 12.930000, 77.620000"],
  geojson: { type: "FeatureCollection", features: [] },
  meta: {
    bbox: [77.6, 12.9, 77.65, 12.95],
    snapshot_id: "snap",
    overpass_query_version: "drive-v1",
    location_label: "Koramangala",
    config: { n_facilities: 1, min_degree: 4, seed: 42 },
    warnings: [],
  },
}

describe("api client", () => {
  afterEach(() => {
    vi.unstubAllGlobals()
  })

  it("posts optimize requests as JSON", async () => {
    const fetchMock = vi.fn(async () => jsonResponse({ job_id: "job-1" }))
    vi.stubGlobal("fetch", fetchMock)

    const response = await optimize({ preset: "city", n_facilities: 3 })

    expect(response).toEqual({ job_id: "job-1" })
    expect(fetchMock).toHaveBeenCalledWith("http://localhost:3001/optimize", {
      method: "POST",
      body: JSON.stringify({ preset: "city", n_facilities: 3 }),
      headers: { "Content-Type": "application/json" },
    })
  })

  it("distinguishes running jobs from finished payloads", async () => {
    vi.stubGlobal(
      "fetch",
      vi
        .fn()
        .mockResolvedValueOnce(jsonResponse({ status: "running", step: "fetching_overpass" }, 202))
        .mockResolvedValueOnce(jsonResponse(PAYLOAD))
    )

    const running = await getResult("job-1")
    expect(isRunning(running)).toBe(true)
    const done = await getResult("job-1")
    expect(isRunning(done)).toBe(false)
    if (!isRunning(done)) {
      expect(done.hub_lines).toEqual(["Unit 1: 12.930000, 77.620000"])
    }
  })

  it("polls until the job finishes", async () => {
    const fetchMock = vi
      .fn()
      .mockResolvedValueOnce(jsonResponse({ status: "running", step: "queued" }, 202))
      .mockResolvedValueOnce(jsonResponse({ status: "running", step: "optimizing_hubs" }, 202))
      .mockResolvedValueOnce(jsonResponse(PAYLOAD))
    vi.stubGlobal("fetch", fetchMock)

    const payload = await waitForResult("job-2", { intervalMs: 1 })

    expect(payload.result.counts.hubs).toBe(1)
    expect(fetchMock).toHaveBeenCalledTimes(3)
  })

  it("raises ApiError with the server's message and code", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () =>
        jsonResponse(
          { error: { message: "Only 3 candidate intersection(s) available for 5 unit(s)", code: "INSUFFICIENT_SAMPLES" } },
          422
        )
      )
    )

    const error = await getResult("job-3").catch((caught: unknown) => caught)
    expect(error).toBeInstanceOf(ApiError)
    if (error instanceof ApiError) {
      expect(error.message).toBe("Only 3 candidate intersection(s) available for 5 unit(s)")
      expect(error.status).toBe(422)
      expect(error.code).toBe("INSUFFICIENT_SAMPLES")
    }
  })

  it("falls back to a generic message for non-JSON errors", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => new Response("<html>bad gateway</html>", { status: 502 })))

    await expect(getPresets()).rejects.toThrow("Request failed (502)")
  })
})
