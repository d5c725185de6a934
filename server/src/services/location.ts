import { LOCATION_PRESETS } from "../config"
import { OptimizerInputError } from "../lib/errors"
import { bboxAreaDegrees, bboxFromCenterRadiusMeters, normalizeBBox } from "../lib/geo"
import type { BBox, LocationPreset, LonLat, PresetName } from "../types"
import { geocodePlace } from "./search"

// Larger place outlines (whole cities) fall back to a radius around the geocoded point.
export const MAX_PLACE_BBOX_AREA_DEGREES = 0.02
export const MAX_REQUEST_BBOX_AREA_DEGREES = 0.24

export interface LocationRequest {
  place?: string | null
  center?: LonLat | null
  bbox?: BBox | null
  radius_m?: number | null
  preset?: PresetName | null
}

export interface ResolvedLocation {
  bbox: BBox
  label: string
  preset: LocationPreset | null
}

async function resolvePlace(place: string, radiusM: number): Promise<{ bbox: BBox; label: string }> {
  const result = await geocodePlace(place)
  const bbox = normalizeBBox(result.bbox)
  if (bboxAreaDegrees(bbox) > 0 && bboxAreaDegrees(bbox) <= MAX_PLACE_BBOX_AREA_DEGREES) {
    return { bbox, label: result.display_name }
  }
  return {
    bbox: bboxFromCenterRadiusMeters([result.lon, result.lat], radiusM),
    label: result.display_name,
  }
}

function centerLabel(center: LonLat) {
  return `${center[1].toFixed(5)}, ${center[0].toFixed(5)}`
}

export async function resolveLocation(
  request: LocationRequest,
  defaultRadiusM: number
): Promise<ResolvedLocation> {
  if (request.preset) {
    const preset = LOCATION_PRESETS[request.preset]
    const radiusM = request.radius_m ?? preset.radius_m
    if (preset.center) {
      return {
        bbox: bboxFromCenterRadiusMeters(preset.center, radiusM),
        label: preset.label,
        preset,
      }
    }
    const resolved = await resolvePlace(preset.place ?? preset.label, radiusM)
    return { ...resolved, preset }
  }

  const radiusM = request.radius_m ?? defaultRadiusM
  if (request.bbox) {
    const bbox = normalizeBBox(request.bbox)
    if (bbox[0] >= bbox[2] || bbox[1] >= bbox[3]) {
      throw new OptimizerInputError("Invalid bbox coordinates")
    }
    if (bboxAreaDegrees(bbox) > MAX_REQUEST_BBOX_AREA_DEGREES) {
      throw new OptimizerInputError("BBox too large for a road network download")
    }
    return { bbox, label: bbox.map((value) => value.toFixed(4)).join(", "), preset: null }
  }
  if (request.center) {
    return {
      bbox: bboxFromCenterRadiusMeters(request.center, radiusM),
      label: centerLabel(request.center),
      preset: null,
    }
  }
  const place = request.place?.trim()
  if (place) {
    return { ...(await resolvePlace(place, radiusM)), preset: null }
  }
  throw new OptimizerInputError("A place, center, bbox or preset is required")
}
