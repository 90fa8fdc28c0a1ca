export {
  pcstFromQueries,
  pcstFromRows,
  pcstFromArrays,
  collectRows,
  assembleRows,
} from "./pcst/entry.js";
export type {
  PcstOptions,
  DenseInput,
  DenseOptions,
  InputRow,
} from "./pcst/entry.js";
export { PcstCursor } from "./pcst/cursor.js";
export type { CursorStateKind, SolutionSummary } from "./pcst/cursor.js";
export type { ResultRow } from "./pcst/translator.js";
export { IdentifierRegistry } from "./pcst/registry.js";
export { GraphAssembler } from "./pcst/assembler.js";
export type { AssembledGraph, EdgeRecord, CellValue } from "./pcst/assembler.js";
export { toExternalId } from "./pcst/ids.js";
export type { ExternalId, IdentifierValue } from "./pcst/ids.js";
export { resolveRoot } from "./pcst/root.js";
export type { RootInput, RootSpec } from "./pcst/root.js";
export {
  PRUNING_STRATEGIES,
  resolvePruningStrategy,
} from "./pcst/pruning.js";
export type { PruningStrategy } from "./pcst/pruning.js";
export { invokeSolver, validateSolverInput } from "./pcst/invoke.js";
export { GoemansWilliamsonSolver } from "./pcst/solver/gwSolver.js";
export type {
  PcstSolver,
  SolverInput,
  SolverOutcome,
  SolverResult,
  EdgePair,
} from "./pcst/solver/types.js";
export { renderDenseReport, renderRowReport } from "./pcst/report.js";
export {
  ErrorCode,
  ConfigError,
  MalformedInputError,
  UnknownIdentifierError,
  SolverFailureError,
  CollaboratorFailureError,
  errorToResponse,
} from "./pcst/errors.js";
export { SqliteQueryExecutor } from "./db/queryExecutor.js";
export type { QueryExecutor, SqlRow, SqlValue } from "./db/queryExecutor.js";
export { openDatabase, closeDb } from "./db/db.js";
export { loadConfig } from "./config/loadConfig.js";
export type { AppConfig } from "./config/types.js";
export { Logger, logger, configureLogger } from "./util/logger.js";
export type { LoggerLike, LogLevel, LogFormat } from "./util/logger.js";
