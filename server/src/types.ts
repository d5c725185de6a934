import type { FeatureCollection, Point } from "geojson"

export type BBox = [number, number, number, number]

export type LonLat = [number, number]

export interface NetworkNode {
  readonly id: number
  readonly lat: number
  readonly lon: number
  readonly degree: number
}

export interface NetworkSnapshot {
  snapshot_id: string
  bbox: BBox
  nodes: readonly NetworkNode[]
  way_count: number
  query_version: string
  fetched_at: string
}

export type RiskTier = "primary" | "secondary" | "all"

export type WarningCode = "THRESHOLD_RELAXED" | "DUPLICATE_HUBS"

export interface DegenerateClusterWarning {
  code: WarningCode
  message: string
}

export interface RiskSubset {
  readonly nodes: readonly NetworkNode[]
  readonly tier: RiskTier
  readonly min_degree_applied: number | null
  readonly warnings: readonly DegenerateClusterWarning[]
}

// [lat, lon]
export type CoordinateSample = readonly [number, number]

export interface Hub {
  readonly index: number
  readonly lat: number
  readonly lon: number
}

export interface HubSet {
  readonly hubs: readonly Hub[]
  readonly inertia: number
  readonly iterations: number
  readonly inertia_history: readonly number[]
  readonly warnings: readonly DegenerateClusterWarning[]
}

export interface OptimizationResult {
  readonly risk_nodes: readonly NetworkNode[]
  readonly hubs: readonly Hub[]
  readonly counts: {
    readonly network_nodes: number
    readonly risk_nodes: number
    readonly hubs: number
  }
  readonly risk_tier: RiskTier
  readonly min_degree_applied: number | null
  readonly inertia: number
  readonly warnings: readonly DegenerateClusterWarning[]
}

export interface OptimizationConfig {
  n_facilities: number
  min_degree: number
  seed: number
}

export interface ResultFeatureProperties {
  kind: "risk_node" | "hub"
  label: string
  node_id?: number
  degree?: number
  hub_index?: number
}

export interface OptimizeResultPayload {
  result: OptimizationResult
  hub_lines: string[]
  geojson: FeatureCollection<Point, ResultFeatureProperties>
  meta: {
    bbox: BBox
    snapshot_id: string
    overpass_query_version: string
    location_label: string
    config: OptimizationConfig
    warnings: string[]
  }
}

export interface JobError {
  message: string
  code: string
}

export interface OptimizeJob {
  id: string
  status: "running" | "done" | "error"
  step: string
  created_at: string
  updated_at: string
  payload?: OptimizeResultPayload
  error?: JobError
}

export interface SearchResult {
  display_name: string
  lat: number
  lon: number
  bbox: BBox
  type: string
}

export type PresetName = "city" | "highway"

export interface LocationPreset {
  name: PresetName
  label: string
  place: string | null
  center: LonLat | null
  radius_m: number
  min_degree: number
}
