// CHANGE: Marketplace-facing operations: candidate id indices, release details and download probes.
// WHY: Keeps every plugin endpoint and its payload validation in one place.

import type { AxiosInstance } from "axios";
import { XMLParser } from "fast-xml-parser";
import type { SourceConfig } from "../config.js";
import { debug } from "../logger.js";
import type { JsonValue, PluginRelease } from "../types.js";
import { getJson, getText, headFollowingRedirects } from "../utils/http.js";
import type { ProbeResult } from "../utils/http.js";
import { asList, isRecord, optionalString } from "../utils/json.js";

const ARRAY_TAGS = new Set(["category", "idea-plugin"]);

const detailsParser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
  parseTagValue: false,
  parseAttributeValue: false,
  isArray: (tagName: string) => ARRAY_TAGS.has(tagName)
});

/**
 * Parse the XML answer of the plugin details endpoint.
 *
 * Releases keep the order of the document; the marketplace lists the newest first.
 *
 * @param xml - Response body.
 * @returns Releases, or undefined when the document has no category (no data for this id).
 * @throws Error when the document is not a plugin repository.
 */
export function parsePluginDetails(xml: string): PluginRelease[] | undefined {
  const document: JsonValue = detailsParser.parse(xml);
  if (!isRecord(document) || !("plugin-repository" in document)) {
    throw new Error("Malformed plugin details: missing <plugin-repository>");
  }
  const repository = document["plugin-repository"];
  if (!isRecord(repository) || repository.category === undefined) {
    return undefined;
  }
  const releases: PluginRelease[] = [];
  for (const category of asList(repository.category)) {
    if (!isRecord(category)) {
      continue;
    }
    for (const plugin of asList(category["idea-plugin"])) {
      if (!isRecord(plugin)) {
        throw new Error("Malformed plugin details: <idea-plugin> is not an element");
      }
      const version = optionalString(plugin.version)?.trim();
      if (!version) {
        throw new Error("Malformed plugin details: <idea-plugin> without <version>");
      }
      const bounds = plugin["idea-version"];
      releases.push({
        version,
        since: isRecord(bounds) ? optionalString(bounds["@_since-build"]) : undefined,
        until: isRecord(bounds) ? optionalString(bounds["@_until-build"]) : undefined
      });
    }
  }
  return releases;
}

/**
 * Fetch a plugin's releases with their compatibility bounds.
 *
 * @param client - Shared HTTP client.
 * @param sources - Endpoint configuration.
 * @param pluginId - Id sent to the details endpoint.
 * @param signal - Aborts the request.
 * @returns Releases, or undefined when the marketplace has no data for the id.
 */
export async function fetchPluginReleases(
  client: AxiosInstance,
  sources: Pick<SourceConfig, "pluginDetails">,
  pluginId: string,
  signal?: AbortSignal
): Promise<PluginRelease[] | undefined> {
  const response = await getText(client, sources.pluginDetails, { pluginId }, signal);
  const releases = parsePluginDetails(response.data);
  debug(`${pluginId}: ${releases?.length ?? 0} releases listed.`);
  return releases;
}

/**
 * Probe whether a release can be downloaded, following redirects to the artifact URL.
 */
export async function probeDownload(
  client: AxiosInstance,
  sources: Pick<SourceConfig, "pluginDownload">,
  pluginId: string,
  version: string,
  signal?: AbortSignal
): Promise<ProbeResult> {
  const query = new URLSearchParams({ pluginId, version });
  return headFollowingRedirects(client, `${sources.pluginDownload}?${query.toString()}`, signal);
}

/**
 * Download one index of candidate plugin ids.
 *
 * @throws Error when the payload is not an array of strings.
 */
export async function fetchPluginIds(client: AxiosInstance, url: string, signal?: AbortSignal): Promise<string[]> {
  const response = await getJson<JsonValue>(client, url, signal);
  const data = response.data;
  if (!Array.isArray(data)) {
    throw new Error(`Malformed plugin index: ${url}`);
  }
  const ids: string[] = [];
  for (const item of data) {
    if (typeof item !== "string") {
      throw new Error(`Malformed plugin index: ${url} lists a non-string id`);
    }
    ids.push(item);
  }
  return ids;
}

/**
 * Concatenate candidate id lists in order, keeping the first occurrence of each id.
 */
export function mergePluginIds(lists: readonly (readonly string[])[]): string[] {
  return [...new Set(lists.flat())];
}
