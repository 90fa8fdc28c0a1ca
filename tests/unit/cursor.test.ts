import { describe, it } from "node:test";
import assert from "node:assert";
import { collectRows, pcstFromRows, type InputRow } from "../../src/pcst/entry.js";
import {
  MalformedInputError,
  SolverFailureError,
  UnknownIdentifierError,
} from "../../src/pcst/errors.js";
import type {
  PcstSolver,
  SolverInput,
  SolverOutcome,
} from "../../src/pcst/solver/types.js";
import { Logger } from "../../src/util/logger.js";

const EDGES: InputRow[] = [
  ["e1", "A", "B", 2.0],
  ["e2", "B", "C", 1.5],
  ["e3", "A", "C", 5.0],
];

const quiet = new Logger("error", "pretty", () => {});

class FixedSolver implements PcstSolver {
  readonly name = "fixed";
  calls = 0;
  lastInput: SolverInput | undefined;
  constructor(private readonly outcome: SolverOutcome) {}
  solve(input: SolverInput): SolverOutcome {
    this.calls += 1;
    this.lastInput = input;
    return this.outcome;
  }
}

describe("PcstCursor", () => {
  it("streams the solver's edges as external rows, then reports exhausted", () => {
    const solver = new FixedSolver({ ok: true, nodes: [0, 1, 2], edges: [0, 1] });
    const cursor = pcstFromRows(EDGES, [["A", 3.0], ["C", 3.0]], {
      root: "A",
      targetClusters: 1,
      solver,
      logger: quiet,
    });

    assert.strictEqual(cursor.state, "uninitialized");
    assert.deepStrictEqual(cursor.next(), {
      done: false,
      value: { seq: 1, edge: "e1", source: "A", target: "B", cost: 2 },
    });
    assert.strictEqual(cursor.state, "streaming");
    assert.strictEqual(cursor.total, 2);
    assert.deepStrictEqual(cursor.next(), {
      done: false,
      value: { seq: 2, edge: "e2", source: "B", target: "C", cost: 1.5 },
    });
    assert.deepStrictEqual(cursor.next(), { done: true, value: undefined });
    assert.strictEqual(cursor.state, "exhausted");
    assert.deepStrictEqual(cursor.next(), { done: true, value: undefined });

    assert.strictEqual(solver.calls, 1);
    assert.strictEqual(solver.lastInput?.root, 0);
    assert.deepStrictEqual(Array.from(solver.lastInput?.prizes ?? []), [3, 0, 3]);
  });

  it("fails on an unknown root without invoking the solver", () => {
    const solver = new FixedSolver({ ok: true, nodes: [], edges: [] });
    const cursor = pcstFromRows(EDGES, [["A", 3.0]], { root: "Z", solver, logger: quiet });

    assert.throws(
      () => cursor.next(),
      (err: Error) => err instanceof UnknownIdentifierError && err.id === "Z",
    );
    assert.strictEqual(cursor.state, "failed");
    assert.ok(cursor.error instanceof UnknownIdentifierError);
    assert.deepStrictEqual(cursor.next(), { done: true, value: undefined });
    assert.strictEqual(solver.calls, 0);
  });

  it("does no work before the first pull", () => {
    let pulled = false;
    function* edgeRows(): Generator<InputRow> {
      pulled = true;
      yield ["e1", "A", "B", 1];
    }
    const cursor = pcstFromRows(edgeRows(), [], { logger: quiet });
    assert.strictEqual(pulled, false);
    cursor.return();
    assert.strictEqual(pulled, false);
    assert.strictEqual(cursor.state, "exhausted");
  });

  it("solves with the default solver and reports totals", () => {
    const cursor = pcstFromRows(EDGES, [["A", 3], ["C", 10]], { root: "A", logger: quiet });
    assert.deepStrictEqual(collectRows(cursor), [
      { seq: 1, edge: "e2", source: "B", target: "C", cost: 1.5 },
      { seq: 2, edge: "e1", source: "A", target: "B", cost: 2 },
    ]);
    assert.deepStrictEqual(cursor.selectedNodes, ["A", "B", "C"]);
    assert.deepStrictEqual(cursor.summary, {
      nodes: ["A", "B", "C"],
      edgeCount: 2,
      totalPrize: 13,
      totalCost: 3.5,
    });
  });

  it("reports exhausted on the first pull when nothing is selected", () => {
    const cursor = pcstFromRows(EDGES, [["A", 3], ["C", 3]], { root: "A", logger: quiet });
    assert.deepStrictEqual(cursor.next(), { done: true, value: undefined });
    assert.strictEqual(cursor.state, "exhausted");
    assert.strictEqual(cursor.total, 0);
    assert.deepStrictEqual(cursor.selectedNodes, ["A"]);
  });

  it("surfaces solver failures with the diagnostic text", () => {
    const cursor = pcstFromRows(
      [["e1", "B", "C", 1]],
      [],
      { root: "B", solver: new FixedSolver({ ok: false, message: "no tree" }), logger: quiet },
    );
    assert.throws(
      () => cursor.next(),
      (err: Error) => err instanceof SolverFailureError && err.diagnostic === "no tree",
    );
  });

  it("rejects rows of the wrong arity", () => {
    const edgeCursor = pcstFromRows([["e1", "A", "B"]], [], { logger: quiet });
    assert.throws(
      () => edgeCursor.next(),
      (err: Error) =>
        err instanceof MalformedInputError &&
        err.message ===
          "edge row 1: wrong row arity, expected 4 columns (id, source, target, cost) but got 3",
    );

    const prizeCursor = pcstFromRows([["e1", "A", "B", 1]], [["A", 1, "extra"]], {
      logger: quiet,
    });
    assert.throws(
      () => prizeCursor.next(),
      (err: Error) =>
        err instanceof MalformedInputError &&
        err.message ===
          "prize row 1: wrong row arity, expected 2 columns (node id, prize) but got 3",
    );
  });

  it("rejects an empty edge set", () => {
    const cursor = pcstFromRows([], [["A", 1]], { logger: quiet });
    assert.throws(() => cursor.next(), MalformedInputError);
    assert.strictEqual(cursor.state, "failed");
  });

  it("releases exactly once on exhaustion, failure and early stop", () => {
    let released = 0;
    const onRelease = (): void => {
      released += 1;
    };

    collectRows(pcstFromRows(EDGES, [["A", 3], ["C", 10]], { root: "A", logger: quiet, onRelease }));
    assert.strictEqual(released, 1);

    const failing = pcstFromRows(EDGES, [], { root: "Z", logger: quiet, onRelease });
    assert.throws(() => failing.next());
    failing.next();
    failing.return();
    assert.strictEqual(released, 2);

    const early = pcstFromRows(EDGES, [["A", 3], ["C", 10]], {
      root: "A",
      logger: quiet,
      onRelease,
    });
    for (const row of early) {
      assert.strictEqual(row.seq, 1);
      break;
    }
    assert.strictEqual(early.state, "exhausted");
    assert.strictEqual(released, 3);
    assert.deepStrictEqual(early.next(), { done: true, value: undefined });
  });

  it("returns identical rows at every verbosity level", () => {
    const prizes: InputRow[] = [["A", 3], ["C", 10]];
    const results = [0, 1, 2, 3].map((verbosity) => {
      const lines: string[] = [];
      const rows = collectRows(
        pcstFromRows(EDGES, prizes, {
          root: "A",
          pruning: "strong",
          verbosity,
          logger: new Logger("debug", "json", (line) => lines.push(line)),
        }),
      );
      return { rows, logged: lines.length };
    });

    for (const result of results) {
      assert.deepStrictEqual(result.rows, results[0].rows);
    }
    assert.strictEqual(results[0].logged, 0);
    assert.ok(results[3].logged > results[1].logged);
  });

  it("logs assembly statistics at verbosity 1", () => {
    const lines: string[] = [];
    collectRows(
      pcstFromRows(EDGES, [["A", 3], ["C", 10], ["Q", 1]], {
        root: "A",
        verbosity: 1,
        logger: new Logger("info", "pretty", (line) => lines.push(line)),
      }),
    );
    assert.strictEqual(
      lines[0],
      '[INFO] Assembled PCST input {"edgeRows":3,"nodes":3,"prizeRowsApplied":2,"prizeRowsUnknown":1,"prizeRowsNull":0}',
    );
    assert.strictEqual(lines.length, 3);
  });
});
