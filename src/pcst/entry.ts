import {
  DEFAULT_TARGET_CLUSTERS,
  DEFAULT_VERBOSITY,
  DENSE_NO_ROOT,
  EDGE_ROW_ARITY,
  MAX_VERBOSITY,
  PRIZE_ROW_ARITY,
} from "../config/constants.js";
import { rowsOf, type QueryExecutor } from "../db/queryExecutor.js";
import { logger as defaultLogger, type LoggerLike } from "../util/logger.js";
import {
  GraphAssembler,
  type AssembledGraph,
  type CellValue,
} from "./assembler.js";
import {
  PcstCursor,
  type SolveSettings,
} from "./cursor.js";
import { MalformedInputError } from "./errors.js";
import { invokeSolver } from "./invoke.js";
import { resolvePruningStrategy } from "./pruning.js";
import type { RootInput } from "./root.js";
import { GoemansWilliamsonSolver } from "./solver/gwSolver.js";
import type { EdgePair, PcstSolver, SolverResult } from "./solver/types.js";
import type { ResultRow } from "./translator.js";

export type InputRow = ReadonlyArray<CellValue>;

export interface PcstOptions {
  /** External id of the forced root, or "auto" / omitted for none. */
  root?: RootInput;
  targetClusters?: number;
  pruning?: string;
  verbosity?: number;
  solver?: PcstSolver;
  logger?: LoggerLike;
  /** Called once when the cursor finishes, fails or is closed early. */
  onRelease?: () => void;
}

export interface DenseInput {
  edges: ReadonlyArray<EdgePair>;
  prizes: ReadonlyArray<number>;
  costs: ReadonlyArray<number>;
  /** Dense root index; negative or omitted means no forced root. */
  root?: number;
  targetClusters?: number;
  pruning?: string;
  verbosity?: number;
}

export interface DenseOptions {
  solver?: PcstSolver;
  logger?: LoggerLike;
}

function checkArity(
  row: InputRow,
  expected: number,
  columns: string,
  rowLabel: string,
): void {
  if (row.length !== expected) {
    throw new MalformedInputError(
      `${rowLabel}: wrong row arity, expected ${expected} columns (${columns}) but got ${row.length}`,
    );
  }
}

function normalizeVerbosity(value: number | undefined): number {
  const verbosity = value ?? DEFAULT_VERBOSITY;
  if (!Number.isInteger(verbosity) || verbosity < 0) {
    throw new MalformedInputError(
      `verbosity must be a non-negative integer, got ${verbosity}`,
    );
  }
  return Math.min(verbosity, MAX_VERBOSITY);
}

function resolveSettings(options: PcstOptions): SolveSettings {
  const log = options.logger ?? defaultLogger;
  return {
    root: options.root,
    targetClusters: options.targetClusters ?? DEFAULT_TARGET_CLUSTERS,
    pruning: resolvePruningStrategy(options.pruning, log),
    verbosity: normalizeVerbosity(options.verbosity),
    solver: options.solver ?? new GoemansWilliamsonSolver({ logger: log }),
    logger: log,
  };
}

/**
 * Drains edge rows, then prize rows, into an assembled graph. The prize
 * rows are not touched until every edge row has been consumed.
 */
export function assembleRows(
  edgeRows: Iterable<InputRow>,
  prizeRows: Iterable<InputRow>,
): AssembledGraph {
  const assembler = new GraphAssembler();

  let edgeRow = 0;
  for (const row of edgeRows) {
    edgeRow += 1;
    checkArity(
      row,
      EDGE_ROW_ARITY,
      "id, source, target, cost",
      `edge row ${edgeRow}`,
    );
    assembler.consumeEdgeRow(row[0], row[1], row[2], row[3]);
  }
  assembler.sealEdges();

  let prizeRow = 0;
  for (const row of prizeRows) {
    prizeRow += 1;
    checkArity(row, PRIZE_ROW_ARITY, "node id, prize", `prize row ${prizeRow}`);
    assembler.consumePrizeRow(row[0], row[1]);
  }

  return assembler.build();
}

/**
 * Query-driven entry point. Nothing is executed until the first pull on
 * the returned cursor.
 */
export function pcstFromQueries(
  executor: QueryExecutor,
  edgeSql: string,
  prizeSql: string,
  options: PcstOptions = {},
): PcstCursor {
  return new PcstCursor(
    () =>
      assembleRows(
        rowsOf(executor, edgeSql, "edges"),
        rowsOf(executor, prizeSql, "prizes"),
      ),
    () => resolveSettings(options),
    options.onRelease,
  );
}

/**
 * Same pipeline over rows already in memory.
 */
export function pcstFromRows(
  edgeRows: Iterable<InputRow>,
  prizeRows: Iterable<InputRow>,
  options: PcstOptions = {},
): PcstCursor {
  return new PcstCursor(
    () => assembleRows(edgeRows, prizeRows),
    () => resolveSettings(options),
    options.onRelease,
  );
}

/**
 * Dense entry point: node ids are already 0..prizes.length-1, so there is
 * no registry and no translation. The solver's output is returned as-is.
 */
export function pcstFromArrays(
  input: DenseInput,
  options: DenseOptions = {},
): SolverResult {
  const log = options.logger ?? defaultLogger;
  const root = input.root ?? DENSE_NO_ROOT;

  return invokeSolver(
    options.solver ?? new GoemansWilliamsonSolver({ logger: log }),
    {
      edges: input.edges,
      costs: Float64Array.from(input.costs),
      prizes: Float64Array.from(input.prizes),
      root: root < 0 ? null : root,
      targetClusters: input.targetClusters ?? DEFAULT_TARGET_CLUSTERS,
      pruning: resolvePruningStrategy(input.pruning, log),
      verbosity: normalizeVerbosity(input.verbosity),
    },
  );
}

export function collectRows(cursor: Iterable<ResultRow>): ResultRow[] {
  return [...cursor];
}
