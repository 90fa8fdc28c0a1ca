/**
 * Constants for pcst-sql
 *
 * Named defaults shared by the library entry points, the CLI and the
 * config schema.
 */

// ============================================================================
// Solver Invocation Constants
// ============================================================================

/**
 * Pruning strategy used when none is given, and the fallback for any
 * unrecognized strategy name. Every entry point resolves through this one
 * value.
 */
export const DEFAULT_PRUNING_STRATEGY = "gw";

/**
 * Number of connected components the unrooted solver grows towards.
 */
export const DEFAULT_TARGET_CLUSTERS = 1;

/**
 * Diagnostic verbosity. 0 logs nothing from the solve pipeline.
 */
export const DEFAULT_VERBOSITY = 0;

/**
 * Upper bound accepted for the verbosity level.
 */
export const MAX_VERBOSITY = 3;

/**
 * Root value meaning "let the solver pick", matched case-sensitively.
 */
export const AUTO_ROOT_SENTINEL = "auto";

/**
 * Dense root index meaning "no forced root" on the array entry point.
 * Any negative index is read the same way.
 */
export const DENSE_NO_ROOT = -1;

// ============================================================================
// Query Row Shape Constants
// ============================================================================

/**
 * Column count of an edge row: id, source, target, cost.
 */
export const EDGE_ROW_ARITY = 4;

/**
 * Column count of a prize row: node id, prize.
 */
export const PRIZE_ROW_ARITY = 2;

// ============================================================================
// Diagnostics Constants
// ============================================================================

/**
 * Maximum registry entries echoed at verbosity >= 2.
 */
export const VERBOSE_REGISTRY_LOG_LIMIT = 50;

/**
 * Maximum selected-edge entries echoed at verbosity >= 3.
 */
export const VERBOSE_RESULT_LOG_LIMIT = 50;

// ============================================================================
// Database Constants
// ============================================================================

/**
 * Timeout for database busy state in milliseconds.
 * SQLite returns SQLITE_BUSY if the database is locked; this sets how long
 * to wait before giving up.
 */
export const DB_BUSY_TIMEOUT_MS = 5000;

// ============================================================================
// Configuration Constants
// ============================================================================

export const CONFIG_FILE_NAME = "pcst.config.json";

export const CONFIG_ENV_VAR = "PCST_SQL_CONFIG";

export const DB_PATH_ENV_VAR = "PCST_SQL_DB_PATH";
