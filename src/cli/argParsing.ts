import { MAX_VERBOSITY } from "../config/constants.js";
import {
  OutputFormatSchema,
  type OutputFormat,
  type SolveDefaults,
} from "../config/types.js";
import type {
  CLIOptions,
  SolveArraysOptions,
  SolveCommonOptions,
  SolveOptions,
} from "./types.js";

export type ParsedOptionValues = Record<string, unknown>;

function stringValue(values: ParsedOptionValues, key: string): string | undefined {
  const value = values[key];
  return typeof value === "string" ? value : undefined;
}

function requireString(values: ParsedOptionValues, key: string): string {
  const value = stringValue(values, key);
  if (value === undefined || value.trim().length === 0) {
    throw new Error(`--${key} requires a value`);
  }
  return value;
}

function parseInteger(raw: string, flag: string): number {
  if (!/^-?\d+$/.test(raw.trim())) {
    throw new Error(`${flag} must be an integer, got "${raw}"`);
  }
  return parseInt(raw, 10);
}

export function parseClusters(raw: string): number {
  const clusters = parseInteger(raw, "--clusters");
  if (clusters < 1) {
    throw new Error("--clusters must be at least 1");
  }
  return clusters;
}

export function parseVerbosity(raw: string): number {
  const verbosity = parseInteger(raw, "--verbosity");
  if (verbosity < 0 || verbosity > MAX_VERBOSITY) {
    throw new Error(`--verbosity must be between 0 and ${MAX_VERBOSITY}`);
  }
  return verbosity;
}

function parseCommon(
  global: CLIOptions,
  values: ParsedOptionValues,
): SolveCommonOptions {
  const options: SolveCommonOptions = { ...global };

  const clusters = stringValue(values, "clusters");
  if (clusters !== undefined) {
    options.clusters = parseClusters(clusters);
  }
  const verbosity = stringValue(values, "verbosity");
  if (verbosity !== undefined) {
    options.verbosity = parseVerbosity(verbosity);
  }
  // Unknown names are passed through; the solve pipeline warns and falls back.
  const pruning = stringValue(values, "pruning");
  if (pruning !== undefined) {
    options.pruning = pruning;
  }
  const format = stringValue(values, "format");
  if (format !== undefined) {
    const parsed = OutputFormatSchema.safeParse(format);
    if (!parsed.success) {
      throw new Error(`--format must be one of: table, json (got "${format}")`);
    }
    options.format = parsed.data;
  }
  if (values.report === true) {
    options.report = true;
  }

  return options;
}

export function parseSolveOptions(
  global: CLIOptions,
  values: ParsedOptionValues,
): SolveOptions {
  const options: SolveOptions = {
    ...parseCommon(global, values),
    edges: requireString(values, "edges"),
    prizes: requireString(values, "prizes"),
  };

  const db = stringValue(values, "db");
  if (db !== undefined) {
    options.db = db;
  }
  const root = stringValue(values, "root");
  if (root !== undefined) {
    options.root = root;
  }

  return options;
}

export function parseSolveArraysOptions(
  global: CLIOptions,
  values: ParsedOptionValues,
): SolveArraysOptions {
  const options: SolveArraysOptions = {
    ...parseCommon(global, values),
    input: requireString(values, "input"),
  };

  const root = stringValue(values, "root");
  if (root !== undefined) {
    options.root = parseInteger(root, "--root");
  }

  return options;
}

export interface EffectiveSolveSettings {
  targetClusters: number;
  pruning: string;
  verbosity: number;
  format: OutputFormat;
  report: boolean;
}

/**
 * Command-line values win over the config file's `defaults` block.
 */
export function applySolveDefaults(
  options: SolveCommonOptions,
  defaults: SolveDefaults,
): EffectiveSolveSettings {
  return {
    targetClusters: options.clusters ?? defaults.targetClusters,
    pruning: options.pruning ?? defaults.pruning,
    verbosity: options.verbosity ?? defaults.verbosity,
    format: options.format ?? defaults.format,
    report: options.report ?? false,
  };
}
