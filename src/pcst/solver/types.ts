import type { PruningStrategy } from "../pruning.js";

export type EdgePair = readonly [number, number];

/**
 * Dense solver input. Node indices are 0..prizes.length-1; `costs[i]`
 * belongs to `edges[i]`.
 */
export interface SolverInput {
  edges: ReadonlyArray<EdgePair>;
  costs: Float64Array;
  prizes: Float64Array;
  root: number | null;
  targetClusters: number;
  pruning: PruningStrategy;
  verbosity: number;
}

export type SolverOutcome =
  | { ok: true; nodes: number[]; edges: number[] }
  | { ok: false; message: string };

/**
 * A PCST solver: a pure function over dense arrays. Failures are returned,
 * not thrown.
 */
export interface PcstSolver {
  readonly name: string;
  solve(input: SolverInput): SolverOutcome;
}

/**
 * Selected node indices (ascending) and selected edge indices in the
 * order the solver chose them.
 */
export interface SolverResult {
  readonly nodes: ReadonlyArray<number>;
  readonly edges: ReadonlyArray<number>;
}
