import { readFile } from "fs/promises";
import { resolve } from "path";
import { z } from "zod";
import { loadConfig } from "../../config/loadConfig.js";
import { MalformedInputError } from "../../pcst/errors.js";
import { pcstFromArrays, type DenseInput } from "../../pcst/entry.js";
import { renderDenseReport } from "../../pcst/report.js";
import { logger } from "../../util/logger.js";
import { applySolveDefaults } from "../argParsing.js";
import { formatDenseJson, formatDenseTable } from "../output.js";
import type { SolveArraysOptions } from "../types.js";

export const DenseInputFileSchema = z.object({
  edges: z.array(z.tuple([z.number().int(), z.number().int()])),
  prizes: z.array(z.number()),
  costs: z.array(z.number()),
  root: z.number().int().optional(),
  targetClusters: z.number().int().optional(),
  pruning: z.string().optional(),
  verbosity: z.number().int().optional(),
});

export type DenseInputFile = z.infer<typeof DenseInputFileSchema>;

export async function readDenseInput(filePath: string): Promise<DenseInputFile> {
  const absolute = resolve(filePath);
  let parsed: unknown;
  try {
    parsed = JSON.parse(await readFile(absolute, "utf-8"));
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new MalformedInputError(`Cannot read input file ${absolute}: ${msg}`);
  }

  const result = DenseInputFileSchema.safeParse(parsed);
  if (!result.success) {
    const errors = result.error.errors
      .map((e) => `  - ${e.path.join(".")}: ${e.message}`)
      .join("\n");
    throw new MalformedInputError(`Invalid input file ${absolute}:\n${errors}`);
  }
  return result.data;
}

export async function solveArraysCommand(
  options: SolveArraysOptions,
): Promise<void> {
  const config = loadConfig(options.config);
  const file = await readDenseInput(options.input);
  const settings = applySolveDefaults(
    {
      ...options,
      clusters: options.clusters ?? file.targetClusters,
      pruning: options.pruning ?? file.pruning,
      verbosity: options.verbosity ?? file.verbosity,
    },
    config.defaults,
  );
  if (settings.verbosity >= 2 && !options.logLevel) {
    logger.setLevel("debug");
  }

  const input: DenseInput = {
    edges: file.edges,
    prizes: file.prizes,
    costs: file.costs,
    root: options.root ?? file.root,
    targetClusters: settings.targetClusters,
    pruning: settings.pruning,
    verbosity: settings.verbosity,
  };
  const result = pcstFromArrays(input, { logger });

  if (settings.format === "json") {
    console.log(formatDenseJson(result));
  } else {
    console.log(formatDenseTable(result));
  }
  if (settings.report) {
    console.log("");
    console.log(renderDenseReport(input, result));
  }
}
