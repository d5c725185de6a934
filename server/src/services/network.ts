import { cacheKey } from "../lib/cache"
import type { BBox, NetworkNode, NetworkSnapshot } from "../types"
import {
  fetchDriveNetwork,
  overpassQueryVersion,
  type OverpassElement,
  type OverpassNode,
  type OverpassResponse,
  type OverpassWay,
} from "./overpass"

export interface NetworkGraph {
  nodes: NetworkNode[]
  way_count: number
}

function isOverpassNode(element: OverpassElement): element is OverpassNode {
  return (
    element.type === "node" &&
    "lat" in element &&
    "lon" in element &&
    typeof element.lat === "number" &&
    typeof element.lon === "number"
  )
}

function isOverpassWay(element: OverpassElement): element is OverpassWay {
  return element.type === "way" && "nodes" in element && Array.isArray(element.nodes)
}

/**
 * Reduces drive ways to the intersection set. A node's degree is the number of
 * distinct neighbours it has across all ways, i.e. the street segments meeting
 * there. Interior shape points (degree 2, not the end of any way) are dropped.
 */
export function buildNetworkGraph(response: OverpassResponse): NetworkGraph {
  const neighbours = new Map<number, Set<number>>()
  const wayEnds = new Set<number>()
  let wayCount = 0

  const link = (from: number, to: number) => {
    let set = neighbours.get(from)
    if (!set) {
      set = new Set<number>()
      neighbours.set(from, set)
    }
    set.add(to)
  }

  for (const element of response.elements) {
    if (!isOverpassWay(element) || element.nodes.length < 2) continue
    wayCount += 1
    wayEnds.add(element.nodes[0])
    wayEnds.add(element.nodes[element.nodes.length - 1])
    for (let i = 1; i < element.nodes.length; i += 1) {
      const from = element.nodes[i - 1]
      const to = element.nodes[i]
      if (from === to) continue
      link(from, to)
      link(to, from)
    }
  }

  const nodes: NetworkNode[] = []
  const emitted = new Set<number>()
  for (const element of response.elements) {
    if (!isOverpassNode(element) || emitted.has(element.id)) continue
    const degree = neighbours.get(element.id)?.size ?? 0
    if (degree === 0) continue
    if (degree === 2 && !wayEnds.has(element.id)) continue
    emitted.add(element.id)
    nodes.push(Object.freeze({ id: element.id, lat: element.lat, lon: element.lon, degree }))
  }

  return { nodes, way_count: wayCount }
}

export function snapshotId(bbox: BBox, queryVersion = overpassQueryVersion()) {
  return cacheKey(`network:${queryVersion}:${JSON.stringify(bbox)}`)
}

export async function loadNetworkSnapshot(bbox: BBox): Promise<NetworkSnapshot> {
  const response = await fetchDriveNetwork(bbox)
  const graph = buildNetworkGraph(response)
  return {
    snapshot_id: snapshotId(bbox),
    bbox,
    nodes: Object.freeze(graph.nodes),
    way_count: graph.way_count,
    query_version: overpassQueryVersion(),
    fetched_at: new Date().toISOString(),
  }
}
