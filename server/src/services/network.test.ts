import { describe, expect, it } from "vitest"
import { buildNetworkGraph, snapshotId } from "./network"
import { buildDriveOverpassQuery, mergeResponses, type OverpassResponse } from "./overpass"

function osmNode(id: number, lat: number, lon: number) {
  return { type: "node" as const, id, lat, lon }
}

// Two streets crossing at node 2; street A continues past node 3 through shape point 6.
const RESPONSE: OverpassResponse = {
  elements: [
    { type: "way", id: 100, nodes: [1, 2, 3], tags: { highway: "residential" } },
    { type: "way", id: 101, nodes: [4, 2, 5], tags: { highway: "tertiary" } },
    { type: "way", id: 102, nodes: [3, 6, 7], tags: { highway: "residential" } },
    { type: "way", id: 103, nodes: [10], tags: { highway: "residential" } },
    osmNode(1, 12.9301, 77.6201),
    osmNode(2, 12.9302, 77.6211),
    osmNode(3, 12.9303, 77.6221),
    osmNode(4, 12.9312, 77.6211),
    osmNode(5, 12.9292, 77.6211),
    osmNode(6, 12.9304, 77.6231),
    osmNode(7, 12.9305, 77.6241),
    osmNode(99, 12.95, 77.65),
    osmNode(2, 12.9302, 77.6211),
  ],
}

describe("buildNetworkGraph", () => {
  it("counts distinct street segments meeting at each intersection", () => {
    const graph = buildNetworkGraph(RESPONSE)
    expect(graph.nodes.map((node) => [node.id, node.degree])).toEqual([
      [1, 1],
      [2, 4],
      [3, 2],
      [4, 1],
      [5, 1],
      [7, 1],
    ])
  })

  it("drops interior shape points and nodes outside every way", () => {
    const ids = buildNetworkGraph(RESPONSE).nodes.map((node) => node.id)
    expect(ids).not.toContain(6)
    expect(ids).not.toContain(99)
  })

  it("counts only ways with at least one segment", () => {
    expect(buildNetworkGraph(RESPONSE).way_count).toBe(3)
  })

  it("keeps coordinates from the node elements", () => {
    const hub = buildNetworkGraph(RESPONSE).nodes.find((node) => node.id === 2)
    expect(hub).toEqual({ id: 2, lat: 12.9302, lon: 77.6211, degree: 4 })
  })

  it("ignores repeated consecutive nodes", () => {
    const graph = buildNetworkGraph({
      elements: [{ type: "way", id: 1, nodes: [1, 1, 2] }, osmNode(1, 0, 0), osmNode(2, 0, 1)],
    })
    expect(graph.nodes.map((node) => node.degree)).toEqual([1, 1])
  })
})

describe("mergeResponses", () => {
  it("deduplicates elements by type and id", () => {
    const merged = mergeResponses([
      { elements: [osmNode(1, 0, 0), { type: "way", id: 1, nodes: [1, 2] }] },
      { elements: [osmNode(1, 0, 0), osmNode(2, 0, 1)] },
    ])
    expect(merged.elements.map((element) => `${element.type}/${element.id}`)).toEqual([
      "node/1",
      "way/1",
      "node/2",
    ])
  })
})

describe("buildDriveOverpassQuery", () => {
  it("queries the bbox in south,west,north,east order", () => {
    const query = buildDriveOverpassQuery([77.6, 12.9, 77.65, 12.95])
    expect(query.startsWith("[out:json][timeout:90];")).toBe(true)
    expect(query).toContain("(12.9,77.6,12.95,77.65);")
  })
})

describe("snapshotId", () => {
  it("is stable for a bbox and changes with it", () => {
    const bbox: [number, number, number, number] = [77.6, 12.9, 77.65, 12.95]
    expect(snapshotId(bbox)).toBe(snapshotId([...bbox]))
    expect(snapshotId(bbox)).not.toBe(snapshotId([77.6, 12.9, 77.66, 12.95]))
    expect(snapshotId(bbox)).toMatch(/^[0-9a-f]{64}$/)
  })
})
