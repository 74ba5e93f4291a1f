// CHANGE: Canonical (plugin id, version) key shared by the database, the negative cache and the persisted entries file.
// WHY: The packaging side splits persisted keys on the same separator.

import { InvalidPluginIdError } from "../errors.js";

const PLUGIN_KEY_SEPARATOR = "/--/";

/**
 * Compute the unique key of one plugin release.
 *
 * Invariant: the id never contains the separator, so distinct (id, version) pairs never collide.
 *
 * @param pluginId - Marketplace plugin id.
 * @param version - Release version.
 * @returns Stable uniqueness key.
 * @throws InvalidPluginIdError when the id is empty or contains the separator.
 */
export function pluginKey(pluginId: string, version: string): string {
  if (pluginId.length === 0) {
    throw new InvalidPluginIdError(pluginId, "id is empty");
  }
  if (pluginId.includes(PLUGIN_KEY_SEPARATOR)) {
    throw new InvalidPluginIdError(pluginId, `id contains "${PLUGIN_KEY_SEPARATOR}"`);
  }
  return `${pluginId}${PLUGIN_KEY_SEPARATOR}${version}`;
}
