// CHANGE: Combine both IDE release feeds into one identity list.

import type { AxiosInstance } from "axios";
import type { SourceConfig } from "../config.js";
import type { IdeIdentity } from "../types.js";
import { collectAndroidStudioIdes } from "./android-studio.js";
import { collectJetbrainsIdes } from "./jetbrains.js";

/**
 * Collect every IDE identity the database should cover.
 */
export async function collectIdes(
  client: AxiosInstance,
  sources: Pick<SourceConfig, "jetbrainsReleases" | "androidStudioReleases">,
  signal?: AbortSignal
): Promise<IdeIdentity[]> {
  const [jetbrains, androidStudio] = await Promise.all([
    collectJetbrainsIdes(client, sources.jetbrainsReleases, signal),
    collectAndroidStudioIdes(client, sources.androidStudioReleases, signal)
  ]);
  return [...jetbrains, ...androidStudio];
}
