import { randomUUID } from "node:crypto"
import cors from "cors"
import express from "express"
import { z } from "zod"
import { LOCATION_PRESETS, PRESET_NAMES, REQUEST_LIMITS, loadConfig, type ServerConfig } from "./config"
import { cacheKey, readJsonCache, writeJsonCache } from "./lib/cache"
import { asJobError } from "./lib/errors"
import { haversineMeters } from "./lib/geo"
import { resolveLocation, type LocationRequest } from "./services/location"
import { loadNetworkSnapshot } from "./services/network"
import { overpassQueryVersion } from "./services/overpass"
import { createOptimizationMemo, type OptimizationMemo } from "./services/pipeline"
import { formatHubLines, toResultGeojson } from "./services/render"
import { searchNominatim } from "./services/search"
import type {
  BBox,
  OptimizationConfig,
  OptimizeJob,
  OptimizeResultPayload,
} from "./types"

// Beyond this diagonal the flat lat/lon treatment in the optimizer starts to distort.
const PLANAR_DIAGONAL_LIMIT_M = 14_500

const lonLatSchema = z.tuple([z.number().min(-180).max(180), z.number().min(-90).max(90)])

const optimizeSchema = z
  .object({
    place: z.string().trim().min(1).max(200).optional(),
    center: lonLatSchema.optional(),
    bbox: z.tuple([z.number(), z.number(), z.number(), z.number()]).optional(),
    preset: z.enum(PRESET_NAMES).optional(),
    radius_m: z.number().min(REQUEST_LIMITS.radiusM.min).max(REQUEST_LIMITS.radiusM.max).optional(),
    n_facilities: z.number().int().min(REQUEST_LIMITS.units.min).max(REQUEST_LIMITS.units.max).optional(),
    min_degree: z.number().int().min(REQUEST_LIMITS.minDegree.min).max(REQUEST_LIMITS.minDegree.max).optional(),
    seed: z.number().int().min(REQUEST_LIMITS.seed.min).max(REQUEST_LIMITS.seed.max).optional(),
  })
  .refine(
    (body) => [body.place, body.center, body.bbox, body.preset].filter((value) => value !== undefined).length === 1,
    "Provide exactly one of place, center, bbox or preset"
  )

type OptimizeInput = z.infer<typeof optimizeSchema>

interface JobInput {
  location: LocationRequest
  config: OptimizationConfig
}

function planarWarnings(bbox: BBox): string[] {
  const diagonal = haversineMeters([bbox[0], bbox[1]], [bbox[2], bbox[3]])
  if (diagonal <= PLANAR_DIAGONAL_LIMIT_M) return []
  return [
    `Area diagonal is ${(diagonal / 1000).toFixed(1)} km; hub placement treats coordinates as planar and loses accuracy at this scale.`,
  ]
}

function toJobInput(body: OptimizeInput, config: ServerConfig): JobInput {
  const preset = body.preset ? LOCATION_PRESETS[body.preset] : null
  return {
    location: {
      place: body.place ?? null,
      center: body.center ?? null,
      bbox: body.bbox ?? null,
      preset: body.preset ?? null,
      radius_m: body.radius_m ?? null,
    },
    config: {
      n_facilities: body.n_facilities ?? config.defaults.units,
      min_degree: body.min_degree ?? preset?.min_degree ?? config.defaults.minDegree,
      seed: body.seed ?? config.defaults.seed,
    },
  }
}

function touch(job: OptimizeJob, step: string) {
  job.step = step
  job.updated_at = new Date().toISOString()
}

async function runOptimizeJob(
  job: OptimizeJob,
  input: JobInput,
  memo: OptimizationMemo,
  config: ServerConfig
): Promise<void> {
  try {
    touch(job, "resolving_location")
    const location = await resolveLocation(input.location, config.defaults.radiusM)

    const resultCacheKey = cacheKey(
      JSON.stringify({
        bbox: location.bbox,
        config: input.config,
        overpass_query_version: overpassQueryVersion(),
        restarts: config.optimizer.restarts,
        max_iterations: config.optimizer.maxIterations,
      })
    )
    touch(job, "checking_cache")
    const cached = await readJsonCache<OptimizeResultPayload>("results", resultCacheKey)
    if (cached) {
      job.status = "done"
      job.payload = cached
      touch(job, "complete_cached")
      return
    }

    touch(job, "fetching_overpass")
    const snapshot = await loadNetworkSnapshot(location.bbox)

    touch(job, "optimizing_hubs")
    const result = memo.run(snapshot, input.config)

    const payload: OptimizeResultPayload = {
      result,
      hub_lines: formatHubLines(result),
      geojson: toResultGeojson(result),
      meta: {
        bbox: location.bbox,
        snapshot_id: snapshot.snapshot_id,
        overpass_query_version: snapshot.query_version,
        location_label: location.label,
        config: input.config,
        warnings: [...result.warnings.map((warning) => warning.message), ...planarWarnings(location.bbox)],
      },
    }

    touch(job, "saving_cache")
    await writeJsonCache("results", resultCacheKey, payload)

    job.status = "done"
    job.payload = payload
    touch(job, "complete")
  } catch (error) {
    job.status = "error"
    job.error = asJobError(error)
    touch(job, "error")
    console.error("[optimize] error", error)
  }
}

export function createApp(config: ServerConfig = loadConfig()) {
  const app = express()
  const jobs = new Map<string, OptimizeJob>()
  const memo = createOptimizationMemo(32, config.optimizer)

  app.use(
    cors({
      origin: config.corsOrigins ?? true,
    })
  )
  app.use(express.json({ limit: "1mb" }))

  app.get("/health", (_req, res) => {
    res.json({ ok: true })
  })

  app.get("/presets", (_req, res) => {
    res.json({ presets: Object.values(LOCATION_PRESETS) })
  })

  app.get("/search", async (req, res) => {
    try {
      const q = String(req.query.q ?? "").trim()
      if (!q) {
        return res.status(400).json({ error: { message: "Query q is required", code: "BAD_REQUEST" } })
      }
      const results = await searchNominatim(q)
      return res.json(results)
    } catch (error) {
      console.error("[search] error", error)
      return res.status(500).json({ error: { message: "Search failed", code: "SEARCH_FAILED" } })
    }
  })

  app.post("/optimize", (req, res) => {
    const parsed = optimizeSchema.safeParse(req.body)
    if (!parsed.success) {
      return res.status(400).json({
        error: { message: parsed.error.issues[0]?.message ?? "Invalid optimize payload", code: "BAD_REQUEST" },
      })
    }

    const job_id = randomUUID()
    const now = new Date().toISOString()
    const job: OptimizeJob = {
      id: job_id,
      status: "running",
      step: "queued",
      created_at: now,
      updated_at: now,
    }
    jobs.set(job_id, job)

    void runOptimizeJob(job, toJobInput(parsed.data, config), memo, config)
    return res.json({ job_id })
  })

  app.get("/result/:job_id", (req, res) => {
    const job = jobs.get(req.params.job_id)
    if (!job) {
      return res.status(404).json({ error: { message: "Job not found", code: "JOB_NOT_FOUND" } })
    }

    if (job.status === "running") {
      return res.status(202).json({ status: "running", step: job.step })
    }
    if (job.status === "error") {
      const error = job.error ?? { message: "Optimization failed", code: "OPTIMIZATION_FAILED" }
      const status = error.code === "INSUFFICIENT_SAMPLES" || error.code === "INVALID_INPUT" ? 422 : 500
      return res.status(status).json({ error })
    }
    if (!job.payload) {
      return res.status(500).json({ error: { message: "Missing optimization payload", code: "MISSING_PAYLOAD" } })
    }
    return res.status(200).json(job.payload)
  })

  app.use((error: unknown, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    console.error("[server] unhandled error", error)
    res.status(500).json({ error: { message: "Internal server error", code: "INTERNAL_ERROR" } })
  })

  return app
}
