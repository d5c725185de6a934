import { cacheKey, readJsonCache, writeJsonCache } from "../lib/cache"
import { NetworkFetchError } from "../lib/errors"
import { bboxAreaDegrees } from "../lib/geo"
import type { BBox } from "../types"

const TILED_FALLBACK_AREA_THRESHOLD = 0.03
const FULL_QUERY_TIMEOUT_MS = 90_000
const TILED_QUERY_TIMEOUT_MS = 60_000
const MAX_TILE_DEPTH = 2

const OVERPASS_ENDPOINTS = [
  "https://overpass-api.de/api/interpreter",
  "https://lz4.overpass-api.de/api/interpreter",
  "https://overpass.kumi.systems/api/interpreter",
]

// Highway classes a car cannot use, mirroring the usual "drive" network filter.
const NON_DRIVE_HIGHWAYS = [
  "abandoned",
  "bridleway",
  "bus_guideway",
  "construction",
  "corridor",
  "cycleway",
  "elevator",
  "escalator",
  "footway",
  "no",
  "path",
  "pedestrian",
  "planned",
  "platform",
  "proposed",
  "raceway",
  "razed",
  "service",
  "steps",
  "track",
]

export interface OverpassNode {
  type: "node"
  id: number
  lat: number
  lon: number
  tags?: Record<string, string>
}

export interface OverpassWay {
  type: "way"
  id: number
  nodes: number[]
  tags?: Record<string, string>
}

export type OverpassElement = OverpassNode | OverpassWay | { type: string; id: number }

export interface OverpassResponse {
  elements: OverpassElement[]
}

export function overpassQueryVersion() {
  return "drive-v1"
}

function splitBBox4(bbox: BBox): BBox[] {
  const [minLon, minLat, maxLon, maxLat] = bbox
  const midLon = (minLon + maxLon) / 2
  const midLat = (minLat + maxLat) / 2
  return [
    [minLon, minLat, midLon, midLat],
    [midLon, minLat, maxLon, midLat],
    [minLon, midLat, midLon, maxLat],
    [midLon, midLat, maxLon, maxLat],
  ]
}

export function mergeResponses(responses: OverpassResponse[]): OverpassResponse {
  const byId = new Map<string, OverpassElement>()
  for (const response of responses) {
    for (const element of response.elements) {
      byId.set(`${element.type}/${element.id}`, element)
    }
  }
  return { elements: [...byId.values()] }
}

function bboxToOverpass(bbox: BBox) {
  const [minLon, minLat, maxLon, maxLat] = bbox
  return `${minLat},${minLon},${maxLat},${maxLon}`
}

export function buildDriveOverpassQuery(bbox: BBox) {
  const bboxOverpass = bboxToOverpass(bbox)
  const excluded = NON_DRIVE_HIGHWAYS.join("|")
  return `
[out:json][timeout:90];
(
  way["highway"]["area"!~"yes"]["highway"!~"^(${excluded})$"]["motor_vehicle"!~"^no$"]["motorcar"!~"^no$"]["access"!~"^private$"](${bboxOverpass});
  way["highway"="service"]["service"!~"^(parking|parking_aisle|driveway|private|emergency_access)$"]["access"!~"^private$"](${bboxOverpass});
);
(._;>;);
out body;
`.trim()
}

async function fetchOverpassQuery(query: string, timeoutMs: number): Promise<OverpassResponse> {
  let lastError: unknown = null
  for (const endpoint of OVERPASS_ENDPOINTS) {
    try {
      const response = await fetch(endpoint, {
        method: "POST",
        headers: {
          "Content-Type": "text/plain; charset=utf-8",
          "User-Agent": "standby-hub-optimizer/1.0 (+https://localhost)",
        },
        body: query,
        signal: AbortSignal.timeout(timeoutMs),
      })
      if (!response.ok) {
        const text = await response.text()
        throw new Error(`Overpass error ${response.status}: ${text.slice(0, 300)}`)
      }
      return (await response.json()) as OverpassResponse
    } catch (error) {
      lastError = error
    }
  }

  throw new NetworkFetchError(
    lastError instanceof Error ? lastError.message : "Failed to fetch from Overpass",
    { cause: lastError }
  )
}

async function fetchOverpassRecursive(bbox: BBox, depth: number): Promise<OverpassResponse> {
  const query = buildDriveOverpassQuery(bbox)
  const key = cacheKey(
    `overpass:drive:${overpassQueryVersion()}:depth:${depth}:${JSON.stringify(bbox)}:${query}`
  )
  const cached = await readJsonCache<OverpassResponse>("overpass", key)
  if (cached) return cached

  try {
    const timeoutMs = depth === 0 ? FULL_QUERY_TIMEOUT_MS : TILED_QUERY_TIMEOUT_MS
    const json = await fetchOverpassQuery(query, timeoutMs)
    await writeJsonCache("overpass", key, json)
    return json
  } catch (error) {
    const canTileFallback =
      depth < MAX_TILE_DEPTH && bboxAreaDegrees(bbox) >= TILED_FALLBACK_AREA_THRESHOLD / 4
    if (!canTileFallback) {
      throw error
    }

    const responses: OverpassResponse[] = []
    for (const tile of splitBBox4(bbox)) {
      responses.push(await fetchOverpassRecursive(tile, depth + 1))
    }
    const merged = mergeResponses(responses)
    await writeJsonCache("overpass", key, merged)
    return merged
  }
}

export async function fetchDriveNetwork(bbox: BBox): Promise<OverpassResponse> {
  const finalKey = cacheKey(`overpass:drive:${overpassQueryVersion()}:final:${JSON.stringify(bbox)}`)
  const cached = await readJsonCache<OverpassResponse>("overpass", finalKey)
  if (cached) return cached

  const response = await fetchOverpassRecursive(bbox, 0)
  await writeJsonCache("overpass", finalKey, response)
  return response
}
