import { z } from "zod";
import {
  DEFAULT_PRUNING_STRATEGY,
  DEFAULT_TARGET_CLUSTERS,
  DEFAULT_VERBOSITY,
  MAX_VERBOSITY,
} from "./constants.js";

export const OutputFormatSchema = z.enum(["table", "json"]);

export type OutputFormat = z.infer<typeof OutputFormatSchema>;

// Pruning stays a free string here: unknown names fall back at resolve time
// rather than failing config validation.
export const SolveDefaultsSchema = z.object({
  pruning: z.string().min(1).default(DEFAULT_PRUNING_STRATEGY),
  targetClusters: z.number().int().min(1).default(DEFAULT_TARGET_CLUSTERS),
  verbosity: z
    .number()
    .int()
    .min(0)
    .max(MAX_VERBOSITY)
    .default(DEFAULT_VERBOSITY),
  format: OutputFormatSchema.default("table"),
});

export type SolveDefaults = z.infer<typeof SolveDefaultsSchema>;

export const AppConfigSchema = z.object({
  dbPath: z.string().min(1).optional(),
  defaults: SolveDefaultsSchema.default({}),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
