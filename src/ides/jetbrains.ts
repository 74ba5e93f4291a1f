// CHANGE: Read released IDE builds from the vendor's updates.xml feed.
// WHY: Only release channels of known products get a compatibility table.

import type { AxiosInstance } from "axios";
import { XMLParser } from "fast-xml-parser";
import { warn } from "../logger.js";
import type { IdeIdentity, IdeProductKey, JsonValue } from "../types.js";
import { getText } from "../utils/http.js";
import { asList, isRecord, optionalString } from "../utils/json.js";
import { isAllowedVersion } from "./filter.js";
import { productFromCode } from "./products.js";

const RELEASE_CHANNEL_SUFFIX = "RELEASE-licensing-RELEASE";

const ARRAY_TAGS = new Set(["product", "code", "channel", "build"]);

const releasesParser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
  parseTagValue: false,
  parseAttributeValue: false,
  isArray: (tagName: string) => ARRAY_TAGS.has(tagName)
});

/**
 * Extract released IDE builds from the vendor's `updates.xml`.
 *
 * Each product is taken once, from the first `<product>` listing one of its codes. Only
 * release channels count. The build number is `fullNumber` when present, else `number`.
 *
 * @param xml - Feed body.
 * @throws Error when the feed has no `<products>` root.
 */
export function parseJetbrainsReleases(xml: string): IdeIdentity[] {
  const document: JsonValue = releasesParser.parse(xml);
  if (!isRecord(document) || !isRecord(document.products)) {
    throw new Error("Malformed IDE release feed: missing <products>");
  }
  const seen = new Set<IdeProductKey>();
  const identities: IdeIdentity[] = [];
  for (const product of asList(document.products.product)) {
    if (!isRecord(product)) {
      continue;
    }
    for (const code of asList(product.code)) {
      const key = typeof code === "string" ? productFromCode(code.trim()) : undefined;
      if (!key || seen.has(key)) {
        continue;
      }
      seen.add(key);
      for (const channel of asList(product.channel)) {
        if (!isRecord(channel) || !optionalString(channel["@_id"])?.endsWith(RELEASE_CHANNEL_SUFFIX)) {
          continue;
        }
        for (const build of asList(channel.build)) {
          if (!isRecord(build)) {
            continue;
          }
          const version = optionalString(build["@_version"]);
          const buildNumber = optionalString(build["@_fullNumber"]) ?? optionalString(build["@_number"]);
          if (!version || !buildNumber) {
            continue;
          }
          if (isAllowedVersion(version)) {
            identities.push({ product: key, version, buildNumber });
          } else {
            warn(`Ignoring ${key} ${version}: too old`);
          }
        }
      }
    }
  }
  return identities;
}

export async function collectJetbrainsIdes(client: AxiosInstance, url: string, signal?: AbortSignal): Promise<IdeIdentity[]> {
  const response = await getText(client, url, undefined, signal);
  return parseJetbrainsReleases(response.data);
}
