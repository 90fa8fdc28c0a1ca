import { existsSync } from "fs";
import { dirname, join, resolve } from "path";

const MAX_ASCENT = 10;

/**
 * Nearest directory at or above `startDir` holding a package.json. Both
 * `src/` (under tsx) and `dist/src/` resolve to the same root, so config
 * and package metadata are found the same way in either layout.
 */
export function findPackageRoot(startDir: string): string {
  const start = resolve(startDir);
  let dir = start;
  for (let depth = 0; depth < MAX_ASCENT; depth++) {
    if (existsSync(join(dir, "package.json"))) {
      return dir;
    }
    const parent = dirname(dir);
    if (parent === dir) {
      break;
    }
    dir = parent;
  }
  return start;
}

export function packageJsonPath(startDir: string): string {
  return join(findPackageRoot(startDir), "package.json");
}
