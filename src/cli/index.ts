#!/usr/bin/env node

import { parseArgs } from "util";
import { errorToResponse } from "../pcst/errors.js";
import { configureLogger, isLogFormat, isLogLevel } from "../util/logger.js";
import type { CLIOptions } from "./types.js";
import { solveCommand } from "./commands/solve.js";
import { solveArraysCommand } from "./commands/solveArrays.js";
import { versionCommand } from "./commands/version.js";
import { parseSolveArraysOptions, parseSolveOptions } from "./argParsing.js";

// Set once arguments are parsed; decides how a fatal error is printed.
let errorFormat: "json" | "text" = "text";

async function main(): Promise<void> {
  const { values, positionals } = parseArgs({
    args: process.argv.slice(2),
    allowPositionals: true,
    strict: false,
    options: {
      help: { type: "boolean", short: "h" },
      version: { type: "boolean", short: "v" },
      config: { type: "string", short: "c" },
      "log-level": { type: "string" },
      "log-format": { type: "string" },
      db: { type: "string" },
      edges: { type: "string" },
      prizes: { type: "string" },
      input: { type: "string", short: "i" },
      root: { type: "string" },
      clusters: { type: "string" },
      pruning: { type: "string" },
      verbosity: { type: "string" },
      format: { type: "string" },
      report: { type: "boolean" },
    },
  });

  if (values.help) {
    showHelp();
    process.exit(0);
  }

  if (values.version) {
    await versionCommand({});
    process.exit(0);
  }

  if (values.format === "json") {
    errorFormat = "json";
  }

  const global = parseGlobalOptions(values);
  configureLogger(global.logLevel ?? "info", global.logFormat ?? "pretty");

  const command = positionals[0];

  if (!command) {
    showHelp();
    process.exit(1);
  }

  switch (command) {
    case "solve": {
      await solveCommand(parseSolveOptions(global, values));
      break;
    }

    case "solve-arrays": {
      await solveArraysCommand(parseSolveArraysOptions(global, values));
      break;
    }

    case "version": {
      await versionCommand(global);
      break;
    }

    default:
      console.error(`Unknown command: ${command}`);
      console.error("");
      showHelp();
      process.exit(1);
  }
}

function parseGlobalOptions(values: Record<string, unknown>): CLIOptions {
  const global: CLIOptions = {};
  if (typeof values.config === "string") {
    global.config = values.config;
  }

  const logLevel = values["log-level"];
  if (logLevel !== undefined) {
    if (!isLogLevel(logLevel)) {
      throw new Error("--log-level must be one of: debug, info, warn, error");
    }
    global.logLevel = logLevel;
  }

  const logFormat = values["log-format"];
  if (logFormat !== undefined) {
    if (!isLogFormat(logFormat)) {
      throw new Error("--log-format must be one of: json, pretty");
    }
    global.logFormat = logFormat;
  }

  return global;
}

function showHelp(): void {
  console.log(`
pcst-sql - Prize-collecting Steiner tree over SQL query results

Usage:
  pcst-sql [global-options] <command> [command-options]

Commands:
  solve             Solve over rows returned by an edge query and a prize query
  solve-arrays      Solve over dense arrays read from a JSON file
  version           Show version information

Global Options:
  -c, --config PATH      Path to configuration file
  --log-level LEVEL      Log level: debug, info, warn, error (default: info)
  --log-format FORMAT    Log format: json, pretty (default: pretty)
  -h, --help             Show this help message
  -v, --version          Show version

 Solve Options:
   --db PATH            SQLite database file (default: config dbPath)
   --edges SQL          Query returning (id, source, target, cost)
   --prizes SQL         Query returning (node_id, prize)
   --root ID            Force this node into the tree (default: auto)

 Solve-arrays Options:
   -i, --input FILE     JSON file with edges, prizes and costs
   --root INDEX         Dense root index, negative for none

 Shared Options:
   --clusters N         Target number of trees when unrooted (default: 1)
   --pruning NAME       none, simple, gw, strong (default: gw)
   --verbosity N        Diagnostic detail, 0-3 (default: 0)
   --format FORMAT      table or json (default: table)
   --report             Print a solution report after the result

 Examples:
   pcst-sql solve --db graph.sqlite \\
     --edges "SELECT id, src, dst, cost FROM edges ORDER BY id" \\
     --prizes "SELECT node, prize FROM prizes"
   pcst-sql solve --db graph.sqlite --edges "..." --prizes "..." --root A --pruning strong
   pcst-sql solve-arrays --input graph.json --format json --report
`);
}

main().catch((error) => {
  if (errorFormat === "json") {
    console.log(JSON.stringify(errorToResponse(error), null, 2));
  } else {
    console.error(
      `Fatal error: ${error instanceof Error ? error.message : String(error)}`,
    );
  }
  process.exit(1);
});
