import { OptimizerInputError } from "../lib/errors"
import type { DegenerateClusterWarning, NetworkNode, RiskSubset } from "../types"

// Relaxed threshold used when the requested one under-qualifies. Fixed on purpose:
// it does not follow the caller's min degree.
export const SECONDARY_MIN_DEGREE = 2

function selectByDegree(nodes: readonly NetworkNode[], minDegree: number) {
  return nodes.filter((node) => node.degree >= minDegree)
}

function relaxedWarning(
  minDegree: number,
  qualified: number,
  requiredCount: number,
  fallback: string
): DegenerateClusterWarning {
  return {
    code: "THRESHOLD_RELAXED",
    message: `Only ${qualified} intersection(s) with degree >= ${minDegree} for ${requiredCount} unit(s); ${fallback}.`,
  }
}

function freezeSubset(subset: RiskSubset): RiskSubset {
  return Object.freeze({
    ...subset,
    nodes: Object.freeze([...subset.nodes]),
    warnings: Object.freeze([...subset.warnings]),
  })
}

/**
 * Picks the high-risk intersections for one run.
 *
 * Falls back to `degree >= 2` and then to the whole network when the requested
 * threshold leaves fewer than `requiredCount` nodes. Selection keeps input order.
 */
export function classifyRisk(
  nodes: readonly NetworkNode[],
  minDegree: number,
  requiredCount: number
): RiskSubset {
  if (!Number.isInteger(minDegree) || minDegree < 0) {
    throw new OptimizerInputError(`min_degree must be a non-negative integer, got ${minDegree}`)
  }
  if (!Number.isInteger(requiredCount) || requiredCount < 1) {
    throw new OptimizerInputError(`required count must be a positive integer, got ${requiredCount}`)
  }

  const primary = selectByDegree(nodes, minDegree)
  if (primary.length >= requiredCount) {
    return freezeSubset({ nodes: primary, tier: "primary", min_degree_applied: minDegree, warnings: [] })
  }

  const secondary = selectByDegree(nodes, SECONDARY_MIN_DEGREE)
  if (secondary.length >= requiredCount) {
    return freezeSubset({
      nodes: secondary,
      tier: "secondary",
      min_degree_applied: SECONDARY_MIN_DEGREE,
      warnings: [
        relaxedWarning(
          minDegree,
          primary.length,
          requiredCount,
          `including ${secondary.length} node(s) with degree >= ${SECONDARY_MIN_DEGREE}`
        ),
      ],
    })
  }

  return freezeSubset({
    nodes,
    tier: "all",
    min_degree_applied: null,
    warnings: [
      relaxedWarning(minDegree, primary.length, requiredCount, `using all ${nodes.length} network node(s)`),
    ],
  })
}
