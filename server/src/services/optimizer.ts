import { InsufficientSamplesError, OptimizerInputError } from "../lib/errors"
import { MAX_SEED, createSeededRandom } from "../lib/random"
import type { CoordinateSample, DegenerateClusterWarning, Hub, HubSet, NetworkNode } from "../types"

export const DEFAULT_RESTARTS = 10
export const DEFAULT_MAX_ITERATIONS = 300

type Centroid = [number, number]

export interface OptimizerOptions {
  restarts?: number
  maxIterations?: number
}

export interface LloydRun {
  centroids: Centroid[]
  labels: number[]
  inertia: number
  iterations: number
  inertia_history: number[]
}

interface Assignment {
  labels: number[]
  inertia: number
}

export function samplesFromNodes(nodes: readonly NetworkNode[]): CoordinateSample[] {
  return nodes.map((node) => [node.lat, node.lon] as const)
}

// Latitude and longitude are treated as a flat plane. Good enough for a
// neighbourhood or a ~10 km corridor; not for regional extents.
function squaredDistance(sample: CoordinateSample, centroid: Centroid) {
  const dLat = sample[0] - centroid[0]
  const dLon = sample[1] - centroid[1]
  return dLat * dLat + dLon * dLon
}

function assignSamples(samples: readonly CoordinateSample[], centroids: Centroid[]): Assignment {
  const labels: number[] = new Array(samples.length)
  let inertia = 0
  for (let i = 0; i < samples.length; i += 1) {
    let bestIdx = 0
    let bestDist = Number.POSITIVE_INFINITY
    for (let c = 0; c < centroids.length; c += 1) {
      const dist = squaredDistance(samples[i], centroids[c])
      if (dist < bestDist) {
        bestDist = dist
        bestIdx = c
      }
    }
    labels[i] = bestIdx
    inertia += bestDist
  }
  return { labels, inertia }
}

function recomputeCentroids(
  samples: readonly CoordinateSample[],
  labels: number[],
  previous: Centroid[]
): Centroid[] {
  const sums = previous.map(() => ({ lat: 0, lon: 0, count: 0 }))
  labels.forEach((label, idx) => {
    const acc = sums[label]
    acc.lat += samples[idx][0]
    acc.lon += samples[idx][1]
    acc.count += 1
  })
  return sums.map((acc, idx): Centroid => {
    if (acc.count === 0) return [previous[idx][0], previous[idx][1]]
    return [acc.lat / acc.count, acc.lon / acc.count]
  })
}

function sameLabels(left: number[], right: number[]) {
  if (left.length !== right.length) return false
  for (let i = 0; i < left.length; i += 1) {
    if (left[i] !== right[i]) return false
  }
  return true
}

/** k-means++ seeding: each new centroid is drawn with probability proportional to D(x)^2. */
export function seedCentroids(
  samples: readonly CoordinateSample[],
  k: number,
  rand: () => number
): Centroid[] {
  const first = samples[Math.floor(rand() * samples.length)]
  const centroids: Centroid[] = [[first[0], first[1]]]
  const closest = samples.map((sample) => squaredDistance(sample, centroids[0]))

  while (centroids.length < k) {
    const total = closest.reduce((sum, value) => sum + value, 0)
    let picked = -1
    if (total > 0) {
      const target = rand() * total
      let acc = 0
      for (let i = 0; i < closest.length; i += 1) {
        if (closest[i] <= 0) continue
        acc += closest[i]
        picked = i
        if (acc > target) break
      }
    }
    if (picked < 0) {
      // every sample already coincides with a centroid
      picked = Math.floor(rand() * samples.length)
    }

    const next: Centroid = [samples[picked][0], samples[picked][1]]
    centroids.push(next)
    for (let i = 0; i < samples.length; i += 1) {
      const dist = squaredDistance(samples[i], next)
      if (dist < closest[i]) closest[i] = dist
    }
  }

  return centroids
}

/**
 * Lloyd iterations from the given centroids until assignments stop changing
 * or `maxIterations` updates have been made. `inertia_history` records the
 * within-cluster squared distance after every assignment step.
 */
export function runLloyd(
  samples: readonly CoordinateSample[],
  initial: Centroid[],
  maxIterations: number
): LloydRun {
  let centroids = initial.map((centroid): Centroid => [centroid[0], centroid[1]])
  let labels: number[] = []
  let converged = false
  let iterations = 0
  const history: number[] = []

  while (iterations < maxIterations) {
    const assignment = assignSamples(samples, centroids)
    history.push(assignment.inertia)
    const changed = !sameLabels(assignment.labels, labels)
    labels = assignment.labels
    if (!changed) {
      converged = true
      break
    }
    centroids = recomputeCentroids(samples, labels, centroids)
    iterations += 1
  }

  if (!converged) {
    const final = assignSamples(samples, centroids)
    history.push(final.inertia)
    labels = final.labels
  }

  return {
    centroids,
    labels,
    inertia: history[history.length - 1],
    iterations,
    inertia_history: history,
  }
}

/** PRNG seed for one restart; restarts never share generator state. */
export function restartSeed(seed: number, restart: number) {
  return (Math.trunc(seed) ^ Math.imul(restart + 1, 0x9e3779b1)) | 0
}

function duplicateHubWarning(hubs: Hub[]): DegenerateClusterWarning | null {
  const seen = new Set<string>()
  let duplicates = 0
  for (const hub of hubs) {
    const key = `${hub.lat}:${hub.lon}`
    if (seen.has(key)) duplicates += 1
    seen.add(key)
  }
  if (duplicates === 0) return null
  return {
    code: "DUPLICATE_HUBS",
    message: `${duplicates} hub(s) share coordinates with another hub; the risk points are too few or too tightly packed.`,
  }
}

function assertPositiveInteger(name: string, value: number) {
  if (!Number.isInteger(value) || value < 1) {
    throw new OptimizerInputError(`${name} must be a positive integer, got ${value}`)
  }
}

/**
 * Places `nFacilities` hubs over the samples with seeded k-means++ and
 * `restarts` independent Lloyd runs, keeping the run with the lowest inertia.
 *
 * Hubs come back in cluster order, indexed from 1. Identical inputs and seed
 * give identical coordinates.
 */
export function optimizeHubs(
  samples: readonly CoordinateSample[],
  nFacilities: number,
  seed: number,
  options: OptimizerOptions = {}
): HubSet {
  const restarts = options.restarts ?? DEFAULT_RESTARTS
  const maxIterations = options.maxIterations ?? DEFAULT_MAX_ITERATIONS
  assertPositiveInteger("n_facilities", nFacilities)
  assertPositiveInteger("restarts", restarts)
  assertPositiveInteger("max iterations", maxIterations)
  if (!Number.isInteger(seed) || seed < 0 || seed > MAX_SEED) {
    throw new OptimizerInputError(`seed must be an integer between 0 and ${MAX_SEED}, got ${seed}`)
  }
  if (samples.some((sample) => !Number.isFinite(sample[0]) || !Number.isFinite(sample[1]))) {
    throw new OptimizerInputError("Coordinate samples must be finite numbers")
  }
  if (samples.length < nFacilities) {
    throw new InsufficientSamplesError(samples.length, nFacilities)
  }

  let best: LloydRun | null = null
  for (let restart = 0; restart < restarts; restart += 1) {
    const rand = createSeededRandom(restartSeed(seed, restart))
    const run = runLloyd(samples, seedCentroids(samples, nFacilities, rand), maxIterations)
    if (!best || run.inertia < best.inertia) best = run
  }
  if (!best) {
    throw new OptimizerInputError("No clustering run completed")
  }

  const hubs = best.centroids.map((centroid, idx) => ({
    index: idx + 1,
    lat: centroid[0],
    lon: centroid[1],
  }))
  const duplicate = duplicateHubWarning(hubs)

  return Object.freeze({
    hubs: Object.freeze(hubs.map((hub) => Object.freeze(hub))),
    inertia: best.inertia,
    iterations: best.iterations,
    inertia_history: Object.freeze([...best.inertia_history]),
    warnings: Object.freeze(duplicate ? [duplicate] : []),
  })
}
