import type { NetworkSnapshot, OptimizationConfig, OptimizationResult } from "../types"
import { optimizeHubs, samplesFromNodes, type OptimizerOptions } from "./optimizer"
import { assembleResult } from "./result"
import { classifyRisk } from "./risk"

/** classify → optimize → assemble for one network snapshot. */
export function runOptimization(
  snapshot: Pick<NetworkSnapshot, "nodes">,
  config: OptimizationConfig,
  options: OptimizerOptions = {}
): OptimizationResult {
  const subset = classifyRisk(snapshot.nodes, config.min_degree, config.n_facilities)
  const hubSet = optimizeHubs(samplesFromNodes(subset.nodes), config.n_facilities, config.seed, options)
  return assembleResult(subset, hubSet, snapshot.nodes.length)
}

export interface OptimizationMemo {
  run(snapshot: Pick<NetworkSnapshot, "snapshot_id" | "nodes">, config: OptimizationConfig): OptimizationResult
  has(snapshotId: string, config: OptimizationConfig): boolean
  clear(): void
  readonly size: number
}

export function memoKey(snapshotId: string, config: OptimizationConfig) {
  return JSON.stringify([snapshotId, config.min_degree, config.n_facilities, config.seed])
}

/**
 * Caches results per (snapshot, min degree, unit count, seed). Failed runs are
 * not cached; the oldest entry is evicted past `limit`.
 */
export function createOptimizationMemo(limit = 32, options: OptimizerOptions = {}): OptimizationMemo {
  const entries = new Map<string, OptimizationResult>()

  return {
    run(snapshot, config) {
      const key = memoKey(snapshot.snapshot_id, config)
      const hit = entries.get(key)
      if (hit) return hit

      const result = runOptimization(snapshot, config, options)
      entries.set(key, result)
      while (entries.size > limit) {
        const oldest = entries.keys().next()
        if (oldest.done) break
        entries.delete(oldest.value)
      }
      return result
    },
    has(snapshotId, config) {
      return entries.has(memoKey(snapshotId, config))
    },
    clear() {
      entries.clear()
    },
    get size() {
      return entries.size
    },
  }
}
