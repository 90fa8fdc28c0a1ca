import { DEFAULT_PRUNING_STRATEGY } from "../config/constants.js";
import type { LoggerLike } from "../util/logger.js";

export const PRUNING_STRATEGIES = ["none", "simple", "gw", "strong"] as const;

export type PruningStrategy = (typeof PRUNING_STRATEGIES)[number];

export function isPruningStrategy(value: unknown): value is PruningStrategy {
  return PRUNING_STRATEGIES.some((strategy) => strategy === value);
}

export const DEFAULT_PRUNING: PruningStrategy = DEFAULT_PRUNING_STRATEGY;

/**
 * Resolves a pruning name. Every entry point goes through here, so an
 * unknown name falls back to the same strategy everywhere.
 */
export function resolvePruningStrategy(
  name: string | undefined,
  log?: LoggerLike,
): PruningStrategy {
  if (name === undefined) {
    return DEFAULT_PRUNING;
  }
  if (isPruningStrategy(name)) {
    return name;
  }
  log?.warn("Unknown pruning strategy, falling back to default", {
    requested: name,
    fallback: DEFAULT_PRUNING,
  });
  return DEFAULT_PRUNING;
}
