import { writeFile } from "node:fs/promises"
import path from "node:path"
import { LOCATION_PRESETS, PRESET_NAMES, REQUEST_LIMITS, loadConfig, type ServerConfig } from "./config"
import { configureCache } from "./lib/cache"
import { OptimizerError } from "./lib/errors"
import { resolveLocation, type LocationRequest } from "./services/location"
import { loadNetworkSnapshot } from "./services/network"
import { runOptimization } from "./services/pipeline"
import { formatHubLines, formatSummary, toResultGeojson } from "./services/render"
import type { OptimizationConfig, PresetName } from "./types"

export const USAGE =
  "Usage: hub-optimizer <location name> [--preset=city|highway] [--center=lat,lon] [--radius=M] [--units=N] [--min-degree=D] [--seed=S] [--out=file.geojson]"

export interface CliOptions {
  location: LocationRequest
  config: OptimizationConfig
  out: string | null
  usedDefaultLocation: boolean
}

function isPresetName(value: string): value is PresetName {
  return PRESET_NAMES.some((name) => name === value)
}

function parseIntegerFlag(name: string, raw: string, limits: { min: number; max: number }) {
  const value = Number(raw)
  if (!Number.isInteger(value)) {
    throw new Error(`--${name} expects an integer, got "${raw}"`)
  }
  if (value < limits.min || value > limits.max) {
    throw new Error(`--${name} must be between ${limits.min} and ${limits.max}, got ${value}`)
  }
  return value
}

function parseCenter(raw: string): [number, number] {
  const parts = raw.split(",").map((part) => Number(part.trim()))
  if (parts.length !== 2 || parts.some((value) => !Number.isFinite(value))) {
    throw new Error(`--center expects "lat,lon", got "${raw}"`)
  }
  const [lat, lon] = parts
  return [lon, lat]
}

export function parseCliArgs(argv: string[], defaults: ServerConfig["defaults"]): CliOptions {
  const words: string[] = []
  let preset: PresetName | null = null
  let center: [number, number] | null = null
  let radius: number | null = null
  let units = defaults.units
  let minDegree: number | null = null
  let seed = defaults.seed
  let out: string | null = null

  for (const token of argv) {
    if (!token.startsWith("--")) {
      words.push(token)
      continue
    }
    const eq = token.indexOf("=")
    const name = eq === -1 ? token.slice(2) : token.slice(2, eq)
    const value = eq === -1 ? "" : token.slice(eq + 1)
    switch (name) {
      case "preset":
        if (!isPresetName(value)) throw new Error(`Unknown preset "${value}"`)
        preset = value
        break
      case "center":
        center = parseCenter(value)
        break
      case "radius":
        radius = parseIntegerFlag(name, value, REQUEST_LIMITS.radiusM)
        break
      case "units":
        units = parseIntegerFlag(name, value, REQUEST_LIMITS.units)
        break
      case "min-degree":
        minDegree = parseIntegerFlag(name, value, REQUEST_LIMITS.minDegree)
        break
      case "seed":
        seed = parseIntegerFlag(name, value, REQUEST_LIMITS.seed)
        break
      case "out":
        out = path.resolve(value)
        break
      default:
        throw new Error(`Unknown option --${name}`)
    }
  }

  const place = words.join(" ").trim()
  if ([place || null, preset, center].filter((source) => source !== null).length > 1) {
    throw new Error("Give only one of a location name, --preset or --center")
  }
  const usedDefaultLocation = !place && !preset && !center
  const effectivePreset: PresetName | null = usedDefaultLocation ? "city" : preset
  const location: LocationRequest = usedDefaultLocation
    ? { preset: effectivePreset, radius_m: radius }
    : { place: place || null, preset, center, radius_m: radius }
  const presetMinDegree = effectivePreset ? LOCATION_PRESETS[effectivePreset].min_degree : null

  return {
    location,
    config: {
      n_facilities: units,
      min_degree: minDegree ?? presetMinDegree ?? defaults.minDegree,
      seed,
    },
    out,
    usedDefaultLocation,
  }
}

export async function runCli(argv: string[], config: ServerConfig = loadConfig()): Promise<number> {
  let options: CliOptions
  try {
    options = parseCliArgs(argv, config.defaults)
  } catch (error) {
    console.error(error instanceof Error ? error.message : String(error))
    console.error(USAGE)
    return 2
  }

  configureCache(config.cacheDir)
  console.log("Initialize standby hub optimizer...")
  if (options.usedDefaultLocation) {
    console.log("No location argument provided. Using the city preset.")
    console.log(USAGE)
  }

  try {
    const location = await resolveLocation(options.location, config.defaults.radiusM)
    console.log(`Downloading street network for: ${location.label}...`)
    const snapshot = await loadNetworkSnapshot(location.bbox)
    console.log(`Graph loaded with ${snapshot.nodes.length} intersections and ${snapshot.way_count} ways.`)

    const result = runOptimization(snapshot, options.config, config.optimizer)
    for (const warning of result.warnings) {
      console.warn(`[optimize] ${warning.message}`)
    }
    console.log(`Identified ${result.counts.risk_nodes} high-risk intersections.`)
    for (const line of formatSummary(result)) {
      console.log(line)
    }
    console.log("Optimal standby locations (Lat, Lon):")
    for (const line of formatHubLines(result)) {
      console.log(`  ${line}`)
    }

    if (options.out) {
      await writeFile(options.out, JSON.stringify(toResultGeojson(result), null, 2), "utf8")
      console.log(`GeoJSON saved to ${options.out}`)
    }
    return 0
  } catch (error) {
    if (error instanceof OptimizerError) {
      console.error(`[optimize] ${error.code}: ${error.message}`)
    } else {
      console.error("[optimize] error", error)
    }
    return 1
  }
}
