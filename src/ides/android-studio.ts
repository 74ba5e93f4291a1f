// CHANGE: Read Android Studio releases from the vendor's JSON release list.
// WHY: Android Studio is not in updates.xml and declares plugin compatibility through its platform build.

import type { AxiosInstance } from "axios";
import { warn } from "../logger.js";
import type { IdeIdentity, JsonValue } from "../types.js";
import { getJson } from "../utils/http.js";
import { asList, isRecord, optionalString } from "../utils/json.js";
import { isAllowedVersion } from "./filter.js";

const BUILD_PREFIX = "AI-";

/**
 * Extract Android Studio releases from the vendor's release list.
 *
 * Every channel is kept. The platform build, not the product build, is the build number
 * plugins declare compatibility against.
 *
 * @param body - Parsed JSON feed.
 * @throws Error when the feed is malformed or lists a build that is not an Android Studio one.
 */
export function parseAndroidStudioReleases(body: JsonValue): IdeIdentity[] {
  if (!isRecord(body) || !isRecord(body.content)) {
    throw new Error("Malformed Android Studio release feed: missing content");
  }
  const identities: IdeIdentity[] = [];
  for (const item of asList(body.content.item)) {
    if (!isRecord(item)) {
      throw new Error("Malformed Android Studio release feed: item is not an object");
    }
    const version = optionalString(item.version);
    const build = optionalString(item.build);
    const platformBuild = optionalString(item.platformBuild);
    if (!version || !build || !platformBuild) {
      throw new Error("Malformed Android Studio release feed: item lacks version, build or platformBuild");
    }
    if (!build.startsWith(BUILD_PREFIX)) {
      throw new Error(`Unexpected product code: ${build} doesn't start with ${BUILD_PREFIX}`);
    }
    if (isAllowedVersion(version)) {
      identities.push({ product: "android-studio", version, buildNumber: platformBuild });
    } else {
      warn(`Ignoring android-studio ${version}: too old`);
    }
  }
  return identities;
}

export async function collectAndroidStudioIdes(
  client: AxiosInstance,
  url: string,
  signal?: AbortSignal
): Promise<IdeIdentity[]> {
  const response = await getJson<JsonValue>(client, url, signal);
  return parseAndroidStudioReleases(response.data);
}
