/**
 * Release identifiers derived from project version metadata.
 *
 * Python development versions (e.g. "1.2.dev0") sort *after* the final
 * release under Debian version rules. Rewriting the marker to "~dev"
 * makes dpkg sort them before it.
 */

import { existsSync, readFileSync } from "node:fs";

export interface DevMarker {
  from: string;
  to: string;
}

export const DEFAULT_DEV_MARKER: DevMarker = { from: ".dev", to: "~dev" };

// version = "1.2.dev0" / version='1.2' / version = 1.2 (setup.cfg), at the start of a line
const VERSION_ASSIGNMENT =
  /^[ \t]*version[ \t]*=[ \t]*(?:(["'])([^"'\n]*)\1|(\d[\w.+~!-]*)[ \t]*$)/m;

/**
 * Whether rewriting with this marker can never produce a new occurrence
 * of `from`, so that a second rewrite is a no-op. `to` must be non-empty,
 * neither string may contain the other, and neither end of `to` may
 * overlap the opposite end of `from`.
 */
export function isStableMarker({ from, to }: DevMarker): boolean {
  if (!from || !to) return false;
  if (to.includes(from) || from.includes(to)) return false;

  for (let i = 1; i < to.length; i++) {
    if (from.startsWith(to.slice(i))) return false;
    if (from.endsWith(to.slice(0, i))) return false;
  }
  return true;
}

/** Replace every occurrence of the development marker in a version. */
export function rewriteDevMarker(
  version: string,
  marker: DevMarker = DEFAULT_DEV_MARKER,
): string {
  if (!marker.from) return version;
  return version.split(marker.from).join(marker.to);
}

/**
 * Build the release identifier for a package, e.g. "hyperspy-1.2~dev0".
 */
export function toReleaseIdentifier(
  name: string,
  version: string,
  marker: DevMarker = DEFAULT_DEV_MARKER,
): string {
  return `${name}-${rewriteDevMarker(version, marker)}`;
}

/**
 * Read the version string from a metadata file.
 * The first `version = "..."` (or unquoted `version = 1.2`) assignment wins.
 */
export function readProjectVersion(versionFile: string): string {
  if (!existsSync(versionFile)) {
    throw new Error(`Version metadata not found: ${versionFile}`);
  }

  const content = readFileSync(versionFile, "utf-8");
  const match = content.match(VERSION_ASSIGNMENT);
  const version = (match?.[2] ?? match?.[3])?.trim();
  if (!version) {
    throw new Error(`No version assignment found in ${versionFile}`);
  }
  return version;
}
