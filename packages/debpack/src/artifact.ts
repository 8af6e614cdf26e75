/**
 * Build-output directory handling: cleanup and artifact lookup.
 */

import { existsSync, readdirSync, rmSync } from "node:fs";
import ignore from "ignore";

/** Remove the build-output directory. Absent directories are fine. */
export function cleanOutputDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

/**
 * List files directly inside `dir` whose names match a gitignore-style
 * pattern (e.g. "*.deb"), sorted by name.
 */
export function listArtifacts(dir: string, pattern: string): string[] {
  if (!existsSync(dir)) return [];

  const matcher = ignore().add(pattern);

  return readdirSync(dir, { withFileTypes: true })
    .filter((entry) => entry.isFile() && matcher.ignores(entry.name))
    .map((entry) => entry.name)
    .sort();
}

/**
 * Find the artifact to install: the first match by name.
 * Throws when the build produced nothing matching the pattern.
 */
export function findFirstArtifact(dir: string, pattern: string): string {
  const [first] = listArtifacts(dir, pattern);
  if (first === undefined) {
    throw new Error(`No artifact matching ${pattern} in ${dir}`);
  }
  return first;
}
