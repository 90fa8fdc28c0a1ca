import { logger as defaultLogger, type LoggerLike } from "../../util/logger.js";
import { growForest } from "./growth.js";
import { pruneForest } from "./prune.js";
import type { PcstSolver, SolverInput, SolverOutcome } from "./types.js";

function isNonNegative(value: number): boolean {
  return Number.isFinite(value) && value >= 0;
}

export interface GoemansWilliamsonSolverOptions {
  /** Receives growth events when the input's verbosity is 3 or more. */
  logger?: LoggerLike;
}

/**
 * Default PCST solver: Goemans-Williamson moat growth followed by the
 * requested pruning pass. Deterministic for a given input.
 *
 * With a root, growth runs until no cluster is active and
 * `targetClusters` is ignored.
 */
export class GoemansWilliamsonSolver implements PcstSolver {
  readonly name = "goemans-williamson";
  private readonly log: LoggerLike;

  constructor(options: GoemansWilliamsonSolverOptions = {}) {
    this.log = options.logger ?? defaultLogger;
  }

  solve(input: SolverInput): SolverOutcome {
    const nodeCount = input.prizes.length;
    const problem = this.checkInput(input, nodeCount);
    if (problem) {
      return { ok: false, message: problem };
    }

    if (input.root !== null && input.targetClusters !== 1) {
      this.log.debug("Rooted solve ignores targetClusters", {
        root: input.root,
        targetClusters: input.targetClusters,
      });
    }

    const traceGrowth = input.verbosity >= 3;
    const growth = growForest(
      input,
      traceGrowth
        ? (event) => this.log.debug("Growth event", { ...event })
        : undefined,
    );
    const pruned = pruneForest(input, growth);

    return { ok: true, nodes: pruned.nodes, edges: pruned.edges };
  }

  private checkInput(input: SolverInput, nodeCount: number): string | null {
    const { edges, root } = input;

    let maxNode = -1;
    for (let i = 0; i < edges.length; i++) {
      const [source, target] = edges[i];
      if (source < 0 || target < 0) {
        return `Edge ${i} has negative node ID: source=${source}, target=${target}`;
      }
      maxNode = Math.max(maxNode, source, target);
    }
    if (maxNode >= nodeCount) {
      return (
        `Edge references node ${maxNode} but only ${nodeCount} prizes provided ` +
        `(valid range: 0-${nodeCount - 1})`
      );
    }
    for (let i = 0; i < input.costs.length; i++) {
      if (!isNonNegative(input.costs[i])) {
        return `Edge ${i} has invalid cost ${input.costs[i]}`;
      }
    }
    for (let i = 0; i < nodeCount; i++) {
      if (!isNonNegative(input.prizes[i])) {
        return `Node ${i} has invalid prize ${input.prizes[i]}`;
      }
    }

    if (root !== null) {
      if (root < 0 || root >= nodeCount) {
        return `Root node ${root} is out of range. Valid range is 0-${nodeCount - 1}`;
      }
      const connected = edges.some(
        ([source, target]) => source === root || target === root,
      );
      if (!connected) {
        return `Root node ${root} is not connected to any edges`;
      }
    } else if (input.targetClusters < 1) {
      return `targetClusters must be at least 1 without a root, got ${input.targetClusters}`;
    }

    return null;
  }
}
