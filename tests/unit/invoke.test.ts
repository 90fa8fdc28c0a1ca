import { describe, it } from "node:test";
import assert from "node:assert";
import { invokeSolver, validateSolverInput } from "../../src/pcst/invoke.js";
import { MalformedInputError, SolverFailureError } from "../../src/pcst/errors.js";
import type {
  PcstSolver,
  SolverInput,
  SolverOutcome,
} from "../../src/pcst/solver/types.js";

function baseInput(overrides: Partial<SolverInput> = {}): SolverInput {
  return {
    edges: [
      [0, 1],
      [1, 2],
    ],
    costs: Float64Array.from([1, 1]),
    prizes: Float64Array.from([1, 1, 1]),
    root: null,
    targetClusters: 1,
    pruning: "gw",
    verbosity: 0,
    ...overrides,
  };
}

class StubSolver implements PcstSolver {
  readonly name = "stub";
  calls = 0;
  constructor(private readonly outcome: () => SolverOutcome) {}
  solve(_input: SolverInput): SolverOutcome {
    this.calls += 1;
    return this.outcome();
  }
}

describe("validateSolverInput", () => {
  it("accepts a well-formed input", () => {
    assert.doesNotThrow(() => validateSolverInput(baseInput()));
  });

  it("rejects inputs without edges", () => {
    assert.throws(
      () => validateSolverInput(baseInput({ edges: [], costs: new Float64Array(0) })),
      (err: Error) =>
        err instanceof MalformedInputError &&
        err.message === "Solver input has no edges",
    );
  });

  it("rejects out-of-range endpoints", () => {
    assert.throws(
      () => validateSolverInput(baseInput({ edges: [[0, 1], [1, 3]] })),
      (err: Error) =>
        err.message === "Edge 1 endpoint out of range: [1, 3] with 3 nodes",
    );
  });

  it("rejects mismatched costs, bad values, bad roots and bad cluster counts", () => {
    assert.throws(
      () => validateSolverInput(baseInput({ costs: Float64Array.from([1]) })),
      MalformedInputError,
    );
    assert.throws(
      () => validateSolverInput(baseInput({ costs: Float64Array.from([1, Number.NaN]) })),
      MalformedInputError,
    );
    assert.throws(
      () => validateSolverInput(baseInput({ prizes: Float64Array.from([1, -1, 1]) })),
      MalformedInputError,
    );
    assert.throws(() => validateSolverInput(baseInput({ root: 3 })), MalformedInputError);
    assert.throws(
      () => validateSolverInput(baseInput({ targetClusters: 0 })),
      MalformedInputError,
    );
  });
});

describe("invokeSolver", () => {
  it("does not call the solver when validation fails", () => {
    const solver = new StubSolver(() => ({ ok: true, nodes: [], edges: [] }));
    assert.throws(() => invokeSolver(solver, baseInput({ root: -1 })), MalformedInputError);
    assert.strictEqual(solver.calls, 0);
  });

  it("returns sorted unique nodes and edges in solver order", () => {
    const solver = new StubSolver(() => ({ ok: true, nodes: [2, 0, 2], edges: [1, 0] }));
    const result = invokeSolver(solver, baseInput());
    assert.deepStrictEqual(result.nodes, [0, 2]);
    assert.deepStrictEqual(result.edges, [1, 0]);
    assert.strictEqual(solver.calls, 1);
  });

  it("carries a reported failure's text verbatim", () => {
    const solver = new StubSolver(() => ({ ok: false, message: "moat overflow" }));
    assert.throws(
      () => invokeSolver(solver, baseInput()),
      (err: Error) =>
        err instanceof SolverFailureError &&
        err.diagnostic === "moat overflow" &&
        err.message === "PCST solver failed: moat overflow",
    );
  });

  it("turns a thrown exception into a solver failure", () => {
    const solver = new StubSolver(() => {
      throw new Error("boom");
    });
    assert.throws(
      () => invokeSolver(solver, baseInput()),
      (err: Error) => err instanceof SolverFailureError && err.diagnostic === "boom",
    );
  });

  it("rejects out-of-range indices in the solver output", () => {
    const badNode = new StubSolver(() => ({ ok: true, nodes: [5], edges: [] }));
    assert.throws(
      () => invokeSolver(badNode, baseInput()),
      (err: Error) =>
        err instanceof SolverFailureError &&
        err.diagnostic === "solver returned out-of-range node index 5",
    );
    const badEdge = new StubSolver(() => ({ ok: true, nodes: [0], edges: [2] }));
    assert.throws(
      () => invokeSolver(badEdge, baseInput()),
      (err: Error) =>
        err instanceof SolverFailureError &&
        err.diagnostic === "solver returned out-of-range edge index 2",
    );
  });
});
