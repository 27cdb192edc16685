import * as fs from "fs";
import * as path from "path";
import { fileURLToPath } from "url";

/**
 * Walk up from `startDir` to the first directory holding a package.json.
 * Works the same from src/ and from the compiled dist/src/.
 */
export function findPackageRoot(startDir: string): string {
  let dir = path.resolve(startDir);
  for (;;) {
    if (fs.existsSync(path.join(dir, "package.json"))) return dir;
    const parent = path.dirname(dir);
    if (parent === dir) return path.resolve(startDir);
    dir = parent;
  }
}

export const PACKAGE_ROOT = findPackageRoot(path.dirname(fileURLToPath(import.meta.url)));

/** Project root: MEDALLION_ROOT when set, otherwise the package root. */
export function projectRoot(): string {
  return path.resolve(process.env.MEDALLION_ROOT || PACKAGE_ROOT);
}

/** Directory holding the bundled SQL scripts. */
export function sqlDir(): string {
  return path.join(PACKAGE_ROOT, "sql");
}
