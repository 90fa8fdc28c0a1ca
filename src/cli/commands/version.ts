import { readFileSync } from "fs";
import { dirname } from "path";
import { fileURLToPath } from "url";
import { z } from "zod";
import { packageJsonPath } from "../../util/findPackageRoot.js";
import type { VersionOptions } from "../types.js";

const __dirname = dirname(fileURLToPath(import.meta.url));

const PackageVersionSchema = z.object({ version: z.string() });

export async function versionCommand(_options: VersionOptions): Promise<void> {
  const version = getVersion();

  console.log(`pcst-sql version: ${version}`);
  console.log("");
  console.log("Environment:");
  console.log(`  Node.js: ${process.version}`);
  console.log(`  Platform: ${process.platform}`);
  console.log(`  Arch: ${process.arch}`);
}

export function getVersion(): string {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(packageJsonPath(__dirname), "utf-8"));
  } catch {
    return "unknown";
  }
  const parsed = PackageVersionSchema.safeParse(raw);
  return parsed.success ? parsed.data.version : "unknown";
}
