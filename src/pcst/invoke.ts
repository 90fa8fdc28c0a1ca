import { MalformedInputError, SolverFailureError } from "./errors.js";
import type {
  PcstSolver,
  SolverInput,
  SolverOutcome,
  SolverResult,
} from "./solver/types.js";

function isIndexBelow(value: number, bound: number): boolean {
  return Number.isInteger(value) && value >= 0 && value < bound;
}

function isNonNegativeFinite(value: number): boolean {
  return Number.isFinite(value) && value >= 0;
}

/**
 * Structural checks run before every solver call. Nothing out of range
 * ever reaches the solver.
 */
export function validateSolverInput(input: SolverInput): void {
  const nodeCount = input.prizes.length;
  const edgeCount = input.edges.length;

  if (edgeCount === 0) {
    throw new MalformedInputError("Solver input has no edges");
  }
  if (input.costs.length !== edgeCount) {
    throw new MalformedInputError(
      `Solver input has ${edgeCount} edges but ${input.costs.length} costs`,
    );
  }

  for (let i = 0; i < edgeCount; i++) {
    const [source, target] = input.edges[i];
    if (!isIndexBelow(source, nodeCount) || !isIndexBelow(target, nodeCount)) {
      throw new MalformedInputError(
        `Edge ${i} endpoint out of range: [${source}, ${target}] with ${nodeCount} nodes`,
      );
    }
    if (!isNonNegativeFinite(input.costs[i])) {
      throw new MalformedInputError(
        `Edge ${i} cost must be a finite number >= 0, got ${input.costs[i]}`,
      );
    }
  }

  for (let i = 0; i < nodeCount; i++) {
    if (!isNonNegativeFinite(input.prizes[i])) {
      throw new MalformedInputError(
        `Node ${i} prize must be a finite number >= 0, got ${input.prizes[i]}`,
      );
    }
  }

  if (input.root !== null && !isIndexBelow(input.root, nodeCount)) {
    throw new MalformedInputError(
      `Root index ${input.root} out of range with ${nodeCount} nodes`,
    );
  }
  if (!Number.isInteger(input.targetClusters) || input.targetClusters < 1) {
    throw new MalformedInputError(
      `targetClusters must be a positive integer, got ${input.targetClusters}`,
    );
  }
}

/**
 * Validates, calls the solver once, and checks what it returned. Solver
 * failures surface as SolverFailureError with the solver's own text; there
 * is no retry.
 */
export function invokeSolver(
  solver: PcstSolver,
  input: SolverInput,
): SolverResult {
  validateSolverInput(input);

  let outcome: SolverOutcome;
  try {
    outcome = solver.solve(input);
  } catch (error) {
    throw new SolverFailureError(
      error instanceof Error ? error.message : String(error),
    );
  }

  if (!outcome.ok) {
    throw new SolverFailureError(outcome.message);
  }

  const nodeCount = input.prizes.length;
  const edgeCount = input.edges.length;
  const badNode = outcome.nodes.find((node) => !isIndexBelow(node, nodeCount));
  if (badNode !== undefined) {
    throw new SolverFailureError(
      `solver returned out-of-range node index ${badNode}`,
    );
  }
  const badEdge = outcome.edges.find((edge) => !isIndexBelow(edge, edgeCount));
  if (badEdge !== undefined) {
    throw new SolverFailureError(
      `solver returned out-of-range edge index ${badEdge}`,
    );
  }

  const nodes = [...new Set(outcome.nodes)].sort((a, b) => a - b);
  return Object.freeze({
    nodes: Object.freeze(nodes),
    edges: Object.freeze([...outcome.edges]),
  });
}
