import { readFileSync } from "fs";
import { join } from "path";

/**
 * Read `version` from a package.json. Throws when the file has none.
 */
export function readPackageVersion(path: string): string {
  const pkg: unknown = JSON.parse(readFileSync(path, "utf8"));
  if (typeof pkg !== "object" || pkg === null || !("version" in pkg) || typeof pkg.version !== "string") {
    throw new Error(`${path} has no version`);
  }
  return pkg.version;
}

// package.json sits one level above both src/ and dist/
export const VERSION = readPackageVersion(join(__dirname, "..", "package.json"));
