import { loadConfig } from "../../config/loadConfig.js";
import { closeDb, openDatabase } from "../../db/db.js";
import { SqliteQueryExecutor } from "../../db/queryExecutor.js";
import { collectRows, pcstFromQueries } from "../../pcst/entry.js";
import { renderRowReport } from "../../pcst/report.js";
import { logger } from "../../util/logger.js";
import { applySolveDefaults } from "../argParsing.js";
import { formatRowsJson, formatRowsTable } from "../output.js";
import type { SolveOptions } from "../types.js";

export async function solveCommand(options: SolveOptions): Promise<void> {
  const config = loadConfig(options.config);
  const settings = applySolveDefaults(options, config.defaults);
  if (settings.verbosity >= 2 && !options.logLevel) {
    logger.setLevel("debug");
  }

  const db = openDatabase(options.db ?? config.dbPath, { readonly: true });
  const cursor = pcstFromQueries(
    new SqliteQueryExecutor(db),
    options.edges,
    options.prizes,
    {
      root: options.root,
      targetClusters: settings.targetClusters,
      pruning: settings.pruning,
      verbosity: settings.verbosity,
      logger,
      onRelease: () => closeDb(db),
    },
  );

  const rows = collectRows(cursor);

  if (settings.format === "json") {
    console.log(formatRowsJson(rows, cursor.summary));
  } else {
    console.log(formatRowsTable(rows));
  }
  if (settings.report) {
    console.log("");
    console.log(renderRowReport(rows, cursor.summary));
  }
}
