import type { HubSet, OptimizationResult, RiskSubset } from "../types"

export function assembleResult(
  subset: RiskSubset,
  hubSet: HubSet,
  networkSize: number
): OptimizationResult {
  return Object.freeze({
    risk_nodes: subset.nodes,
    hubs: Object.freeze([...hubSet.hubs]),
    counts: Object.freeze({
      network_nodes: networkSize,
      risk_nodes: subset.nodes.length,
      hubs: hubSet.hubs.length,
    }),
    risk_tier: subset.tier,
    min_degree_applied: subset.min_degree_applied,
    inertia: hubSet.inertia,
    warnings: Object.freeze([...subset.warnings, ...hubSet.warnings]),
  })
}
