import type { FeatureCollection, Point } from "geojson"

const API_BASE_URL = process.env.OPTIMIZER_API_URL ?? "http://localhost:3001"

export type BBox = [number, number, number, number]

export type PresetName = "city" | "highway"

export interface HubRecord {
  index: number
  lat: number
  lon: number
}

export interface RiskNodeRecord {
  id: number
  lat: number
  lon: number
  degree: number
}

export interface OptimizationWarning {
  code: "THRESHOLD_RELAXED" | "DUPLICATE_HUBS"
  message: string
}

export interface OptimizeResultPayload {
  result: {
    risk_nodes: RiskNodeRecord[]
    hubs: HubRecord[]
    counts: {
      network_nodes: number
      risk_nodes: number
      hubs: number
    }
    risk_tier: "primary" | "secondary" | "all"
    min_degree_applied: number | null
    inertia: number
    warnings: OptimizationWarning[]
  }
  hub_lines: string[]
  geojson: FeatureCollection<Point>
  meta: {
    bbox: BBox
    snapshot_id: string
    overpass_query_version: string
    location_label: string
    config: {
      n_facilities: number
      min_degree: number
      seed: number
    }
    warnings: string[]
  }
}

export interface OptimizeRequest {
  place?: string
  center?: [number, number]
  bbox?: BBox
  preset?: PresetName
  radius_m?: number
  n_facilities?: number
  min_degree?: number
  seed?: number
}

interface RunningResult {
  status: "running"
  step: string
}

export interface SearchResult {
  display_name: string
  lat: number
  lon: number
  bbox: BBox
  type: string
}

export interface PresetRecord {
  name: PresetName
  label: string
  place: string | null
  center: [number, number] | null
  radius_m: number
  min_degree: number
}

interface ApiErrorEnvelope {
  error?: {
    message?: string
    code?: string
  }
}

export class ApiError extends Error {
  constructor(
    message: string,
    readonly status: number,
    readonly code: string | null
  ) {
    super(message)
    this.name = "ApiError"
  }
}

async function parseJsonBody<T>(response: Response, context: string): Promise<T> {
  const raw = await response.text()
  const trimmed = raw.trim()
  if (!trimmed) {
    throw new Error(`Empty response from ${context}`)
  }

  try {
    return JSON.parse(trimmed) as T
  } catch {
    throw new Error(`Unexpected response format from ${context}. Check API server configuration.`)
  }
}

async function toApiError(response: Response, fallback: string): Promise<ApiError> {
  const raw = await response.text()
  const trimmed = raw.trim()
  if (!trimmed) return new ApiError(fallback, response.status, null)
  try {
    const json = JSON.parse(trimmed) as ApiErrorEnvelope
    const message = json?.error?.message
    const code = typeof json?.error?.code === "string" ? json.error.code : null
    if (typeof message === "string" && message.trim().length > 0) {
      return new ApiError(message, response.status, code)
    }
    return new ApiError(fallback, response.status, code)
  } catch {
    // non-JSON error body
    return new ApiError(fallback, response.status, null)
  }
}

async function request<T>(path: string, init?: RequestInit): Promise<T> {
  const response = await fetch(`${API_BASE_URL}${path}`, {
    ...init,
    headers: {
      "Content-Type": "application/json",
      ...(init?.headers ?? {}),
    },
  })
  if (!response.ok) {
    throw await toApiError(response, `Request failed (${response.status})`)
  }
  return parseJsonBody<T>(response, path)
}

export async function optimize(payload: OptimizeRequest): Promise<{ job_id: string }> {
  return request<{ job_id: string }>("/optimize", {
    method: "POST",
    body: JSON.stringify(payload),
  })
}

export async function getResult(jobId: string): Promise<RunningResult | OptimizeResultPayload> {
  const response = await fetch(`${API_BASE_URL}/result/${encodeURIComponent(jobId)}`)
  if (response.status === 202) {
    return parseJsonBody<RunningResult>(response, `/result/${jobId}`)
  }
  if (!response.ok) {
    throw await toApiError(response, `Result request failed (${response.status})`)
  }
  return parseJsonBody<OptimizeResultPayload>(response, `/result/${jobId}`)
}

export function isRunning(result: RunningResult | OptimizeResultPayload): result is RunningResult {
  return "status" in result && result.status === "running"
}

export async function waitForResult(
  jobId: string,
  options?: { intervalMs?: number; timeoutMs?: number }
): Promise<OptimizeResultPayload> {
  const intervalMs = options?.intervalMs ?? 1000
  const deadline = Date.now() + (options?.timeoutMs ?? 180_000)
  for (;;) {
    const result = await getResult(jobId)
    if (!isRunning(result)) return result
    if (Date.now() >= deadline) {
      throw new Error(`Optimization ${jobId} still running at step "${result.step}"`)
    }
    await new Promise((resolve) => setTimeout(resolve, intervalMs))
  }
}

export async function search(query: string): Promise<SearchResult[]> {
  return request<SearchResult[]>(`/search?q=${encodeURIComponent(query)}`)
}

export async function getPresets(): Promise<{ presets: PresetRecord[] }> {
  return request<{ presets: PresetRecord[] }>("/presets")
}
