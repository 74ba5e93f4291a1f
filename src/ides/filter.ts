// CHANGE: Release-series filter for IDE versions.

import { PROCESSED_VERSION_PREFIXES } from "../config.js";

/**
 * Whether an IDE version belongs to a release series the database covers.
 */
export function isAllowedVersion(version: string, prefixes: readonly string[] = PROCESSED_VERSION_PREFIXES): boolean {
  return prefixes.some(prefix => version.startsWith(prefix));
}
