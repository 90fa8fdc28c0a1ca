import Database from "better-sqlite3";
import { DB_BUSY_TIMEOUT_MS, DB_PATH_ENV_VAR } from "../config/constants.js";
import { ConfigError } from "../pcst/errors.js";

export interface OpenDatabaseOptions {
  /** Open without write access. The CLI always reads. */
  readonly?: boolean;
  /** Fail instead of creating an empty database file. */
  fileMustExist?: boolean;
}

/**
 * Opens a SQLite connection for the solve pipeline. The path falls back
 * to `PCST_SQL_DB_PATH`; with neither set there is nothing to query.
 */
export function openDatabase(
  dbPath?: string,
  options: OpenDatabaseOptions = {},
): Database.Database {
  const path = dbPath || process.env[DB_PATH_ENV_VAR];
  if (!path) {
    throw new ConfigError(
      `No database path given. Pass --db, set "dbPath" in the config file, or set ${DB_PATH_ENV_VAR}.`,
    );
  }

  const readonly = options.readonly ?? false;
  let db: Database.Database;
  try {
    db = new Database(path, {
      readonly,
      fileMustExist: options.fileMustExist ?? readonly,
    });
  } catch (error) {
    const msg = error instanceof Error ? error.message : String(error);
    throw new ConfigError(
      `Failed to open database at ${path}: ${msg}. ` +
        `Check that the file exists and is readable.`,
    );
  }

  try {
    db.pragma(`busy_timeout = ${DB_BUSY_TIMEOUT_MS}`);
    if (!readonly) {
      db.pragma("journal_mode = WAL");
    }
  } catch (error) {
    db.close();
    const msg = error instanceof Error ? error.message : String(error);
    throw new ConfigError(
      `Failed to configure database at ${path}: ${msg}. ` +
        `The database file may be corrupted or locked by another process.`,
    );
  }

  return db;
}

export function closeDb(db: Database.Database): void {
  if (db.open) {
    db.close();
  }
}
