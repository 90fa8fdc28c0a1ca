import type Database from "better-sqlite3";
import { z } from "zod";
import { CollaboratorFailureError, type QueryRole } from "../pcst/errors.js";

/**
 * Column values a SQLite driver can hand back.
 */
export type SqlValue = string | number | bigint | Buffer | null;

export type SqlRow = ReadonlyArray<SqlValue>;

/**
 * Runs one SQL text and yields its rows in result order, one array of
 * column values per row.
 */
export interface QueryExecutor {
  execute(sql: string): Iterable<SqlRow>;
}

const SqlRowSchema = z.array(
  z.union([z.string(), z.number(), z.bigint(), z.instanceof(Buffer), z.null()]),
);

/**
 * QueryExecutor over a better-sqlite3 connection. Rows are read in raw
 * mode, so a row is a positional column array and the caller decides
 * what each position means. INTEGER columns come back as bigint, so
 * 64-bit ids keep every digit.
 */
export class SqliteQueryExecutor implements QueryExecutor {
  constructor(private readonly db: Database.Database) {}

  *execute(sql: string): Generator<SqlRow> {
    const stmt = this.db.prepare(sql);
    if (!stmt.reader) {
      throw new Error("Statement does not return rows");
    }
    for (const raw of stmt.raw(true).safeIntegers(true).iterate()) {
      const parsed = SqlRowSchema.safeParse(raw);
      if (!parsed.success) {
        throw new Error(
          `Row has an unsupported column value: ${parsed.error.errors[0]?.message ?? "unknown"}`,
        );
      }
      yield parsed.data;
    }
  }
}

/**
 * Streams the rows of one query, reporting any executor failure as a
 * CollaboratorFailureError naming the query's role. The executor's
 * iterator is closed even when the consumer stops early.
 */
export function* rowsOf(
  executor: QueryExecutor,
  sql: string,
  role: QueryRole,
): Generator<SqlRow> {
  let iterator: Iterator<SqlRow>;
  try {
    iterator = executor.execute(sql)[Symbol.iterator]();
  } catch (error) {
    throw new CollaboratorFailureError(role, error);
  }

  try {
    while (true) {
      let step: IteratorResult<SqlRow>;
      try {
        step = iterator.next();
      } catch (error) {
        throw new CollaboratorFailureError(role, error);
      }
      if (step.done) return;
      yield step.value;
    }
  } finally {
    iterator.return?.();
  }
}
