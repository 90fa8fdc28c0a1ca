import { existsSync, readFileSync } from "fs";
import { resolve, dirname } from "path";
import { fileURLToPath } from "url";
import { AppConfig, AppConfigSchema } from "./types.js";
import { CONFIG_ENV_VAR, CONFIG_FILE_NAME } from "./constants.js";
import { findPackageRoot } from "../util/findPackageRoot.js";
import { ConfigError } from "../pcst/errors.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

function expandEnvVars(obj: unknown): unknown {
  if (typeof obj === "string") {
    return obj.replace(/\$\{([^}]+)\}/g, (_, varName: string) => {
      const value = process.env[varName];
      if (value === undefined) {
        throw new ConfigError(`Environment variable "${varName}" is not set`);
      }
      return value;
    });
  }

  if (Array.isArray(obj)) {
    return obj.map((item) => expandEnvVars(item));
  }

  if (obj !== null && typeof obj === "object") {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = expandEnvVars(value);
    }
    return result;
  }

  return obj;
}

export function defaultConfigPath(): string {
  const packageRoot = findPackageRoot(__dirname);
  return resolve(packageRoot, "config", CONFIG_FILE_NAME);
}

/**
 * Loads and validates the config file.
 *
 * Resolution order is the explicit path, then `PCST_SQL_CONFIG`, then
 * `config/pcst.config.json` under the package root. Only the last one may
 * be absent, in which case schema defaults apply.
 */
export function loadConfig(configPath?: string): AppConfig {
  const envConfigPath = process.env[CONFIG_ENV_VAR];
  const explicitPath = configPath ?? envConfigPath;

  if (!explicitPath) {
    const fallbackPath = defaultConfigPath();
    if (!existsSync(fallbackPath)) {
      return AppConfigSchema.parse({});
    }
    return readConfigFile(fallbackPath);
  }

  return readConfigFile(resolve(explicitPath));
}

function readConfigFile(filePath: string): AppConfig {
  let rawContent: string;
  try {
    rawContent = readFileSync(filePath, "utf-8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      throw new ConfigError(`Config file not found: ${filePath}`);
    }
    throw err;
  }

  let parsedConfig: unknown;
  try {
    parsedConfig = JSON.parse(rawContent);
  } catch (err) {
    if (err instanceof SyntaxError) {
      throw new ConfigError(`Invalid JSON in config file: ${filePath}`);
    }
    throw err;
  }

  const expandedConfig = expandEnvVars(parsedConfig);
  const result = AppConfigSchema.safeParse(expandedConfig);

  if (!result.success) {
    const errors = result.error.errors
      .map((e) => {
        const path = e.path.join(".");
        return `  - ${path}: ${e.message}`;
      })
      .join("\n");
    throw new ConfigError(`Config validation failed:\n${errors}`);
  }

  return result.data;
}
