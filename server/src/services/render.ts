import type { Feature, FeatureCollection, Point } from "geojson"
import type { Hub, NetworkNode, OptimizationResult, ResultFeatureProperties } from "../types"

export function formatHubLine(hub: Hub) {
  return `Unit ${hub.index}: ${hub.lat.toFixed(6)}, ${hub.lon.toFixed(6)}`
}

export function formatHubLines(result: OptimizationResult): string[] {
  return result.hubs.map(formatHubLine)
}

export function formatSummary(result: OptimizationResult): string[] {
  return [
    `Network size (nodes): ${result.counts.network_nodes}`,
    `High risk zones: ${result.counts.risk_nodes}`,
    `Units deployed: ${result.counts.hubs}`,
  ]
}

function pointFeature(
  lon: number,
  lat: number,
  properties: ResultFeatureProperties
): Feature<Point, ResultFeatureProperties> {
  return {
    type: "Feature",
    geometry: {
      type: "Point",
      coordinates: [lon, lat],
    },
    properties,
  }
}

function riskNodeFeature(node: NetworkNode) {
  return pointFeature(node.lon, node.lat, {
    kind: "risk_node",
    label: "High Risk Point",
    node_id: node.id,
    degree: node.degree,
  })
}

function hubFeature(hub: Hub) {
  return pointFeature(hub.lon, hub.lat, {
    kind: "hub",
    label: `Hub #${hub.index}`,
    hub_index: hub.index,
  })
}

/** Risk nodes first, then hubs, so map layers draw hubs on top. */
export function toResultGeojson(
  result: OptimizationResult
): FeatureCollection<Point, ResultFeatureProperties> {
  return {
    type: "FeatureCollection",
    features: [...result.risk_nodes.map(riskNodeFeature), ...result.hubs.map(hubFeature)],
  }
}
