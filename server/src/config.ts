import path from "node:path"
import { z } from "zod"
import { MAX_SEED } from "./lib/random"
import type { LocationPreset, PresetName } from "./types"

/** Bounds shared by the HTTP schema and the CLI flags. */
export const REQUEST_LIMITS = {
  units: { min: 1, max: 20 },
  minDegree: { min: 1, max: 10 },
  radiusM: { min: 200, max: 10_000 },
  seed: { min: 0, max: MAX_SEED },
} as const

const envSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65_535).default(3001),
  CORS_ORIGIN: z.string().optional(),
  CACHE_DIR: z.string().optional(),
  DEFAULT_UNITS: z.coerce.number().int().min(REQUEST_LIMITS.units.min).max(REQUEST_LIMITS.units.max).default(5),
  DEFAULT_MIN_DEGREE: z.coerce
    .number()
    .int()
    .min(REQUEST_LIMITS.minDegree.min)
    .max(REQUEST_LIMITS.minDegree.max)
    .default(4),
  DEFAULT_SEED: z.coerce.number().int().min(REQUEST_LIMITS.seed.min).max(REQUEST_LIMITS.seed.max).default(42),
  DEFAULT_RADIUS_M: z.coerce.number().min(REQUEST_LIMITS.radiusM.min).max(REQUEST_LIMITS.radiusM.max).default(2000),
  OPTIMIZER_RESTARTS: z.coerce.number().int().min(1).max(100).default(10),
  OPTIMIZER_MAX_ITERATIONS: z.coerce.number().int().min(1).max(10_000).default(300),
})

export interface ServerConfig {
  port: number
  corsOrigins: string[] | null
  cacheDir: string
  defaults: {
    units: number
    minDegree: number
    seed: number
    radiusM: number
  }
  optimizer: {
    restarts: number
    maxIterations: number
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = envSchema.safeParse(env)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    throw new Error(`Invalid configuration: ${issue?.path.join(".")} ${issue?.message ?? ""}`.trim())
  }
  const values = parsed.data
  const origins = values.CORS_ORIGIN?.split(",")
    .map((item) => item.trim())
    .filter(Boolean)

  return {
    port: values.PORT,
    corsOrigins: origins && origins.length > 0 ? origins : null,
    cacheDir: path.resolve(values.CACHE_DIR ?? path.join(process.cwd(), "cache")),
    defaults: {
      units: values.DEFAULT_UNITS,
      minDegree: values.DEFAULT_MIN_DEGREE,
      seed: values.DEFAULT_SEED,
      radiusM: values.DEFAULT_RADIUS_M,
    },
    optimizer: {
      restarts: values.OPTIMIZER_RESTARTS,
      maxIterations: values.OPTIMIZER_MAX_ITERATIONS,
    },
  }
}

export const PRESET_NAMES = ["city", "highway"] as const satisfies readonly PresetName[]

export const LOCATION_PRESETS: Record<PresetName, LocationPreset> = {
  city: {
    name: "city",
    label: "Koramangala, Bengaluru",
    place: "Koramangala, Bengaluru",
    center: null,
    radius_m: 2000,
    min_degree: 4,
  },
  highway: {
    name: "highway",
    label: "Delhi-Mumbai Expressway (Sohna Segment)",
    place: null,
    center: [77.0697, 28.2378],
    radius_m: 5000,
    min_degree: 3,
  },
}
