import type { OverheadModel } from "@devteam-sim/core";

/**
 * Coordination overhead coefficient for a team of `teamSize` agents.
 * Always ≥ 1; a team of one (or none) pays nothing.
 */
export function communicationOverhead(teamSize: number, model: OverheadModel): number {
  const n = Math.floor(teamSize);
  if (n <= 1) return 1;

  switch (model) {
    case "linear":
      return 1 + 0.05 * (n - 1);
    case "quadratic":
      // Pairwise communication channels, 1% each.
      return 1 + (n * (n - 1)) / 2 / 100;
    case "hierarchical":
      return 1 + 0.1 * Math.log2(n);
  }
}

/** Share of capacity consumed by coordination, in [0, 1). */
export function normalizedOverhead(overhead: number): number {
  return overhead <= 1 ? 0 : 1 - 1 / overhead;
}

/**
 * Multiplier applied to creation and review probabilities:
 * `1 − lossFactor × normalized overhead`, floored at 0.
 */
export function overheadFactor(teamSize: number, model: OverheadModel, lossFactor: number): number {
  const normalized = normalizedOverhead(communicationOverhead(teamSize, model));
  return Math.max(0, 1 - lossFactor * normalized);
}
