import type { OutputFormat } from "../config/types.js";
import type { LogFormat, LogLevel } from "../util/logger.js";

export interface CLIOptions {
  config?: string;
  logLevel?: LogLevel;
  logFormat?: LogFormat;
}

/**
 * Options shared by both solve commands. Anything left undefined falls
 * back to the config file's `defaults` block.
 */
export interface SolveCommonOptions extends CLIOptions {
  clusters?: number;
  pruning?: string;
  verbosity?: number;
  format?: OutputFormat;
  report?: boolean;
}

export interface SolveOptions extends SolveCommonOptions {
  db?: string;
  edges: string;
  prizes: string;
  root?: string;
}

export interface SolveArraysOptions extends SolveCommonOptions {
  input: string;
  /** Dense root index, negative for none. */
  root?: number;
}

export type VersionOptions = CLIOptions;
