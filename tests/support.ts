// CHANGE: Shared builders for axios responses and crawl contexts used by several suites.
// WHY: Tests stub the shared axios instance instead of reaching the network.

import { AxiosHeaders } from "axios";
import type { AxiosResponse } from "axios";
import { vi } from "vitest";
import type { Mock } from "vitest";
import type { CrawlContext } from "../src/crawler.js";
import { NegativeResultCache, PluginDatabase } from "../src/database.js";
import type { ContentHasher } from "../src/hasher.js";
import { createHttpClient } from "../src/utils/http.js";

export const DOWNLOAD_PREFIX = "https://downloads.marketplace.jetbrains.com/";
export const DETAILS_URL = "https://plugins.example.test/plugins/list";
export const DOWNLOAD_URL = "https://plugins.example.test/plugin/download";

/** nix base32 sha256 of the empty string and its base64 form. */
export const EMPTY_DIGEST = "0mdqa9w1p6cmli6976v4wi0sw9r4p5prkj7lzfd1877wk11c9c73";
export const EMPTY_HASH = "47DEQpj8HBSa+/TImW+5JCeuQeRkm5NMpJWZG3hSuFU=";

export function axiosResponse<T>(status: number, data: T, headers: Record<string, string> = {}): AxiosResponse<T> {
  return {
    status,
    statusText: "",
    headers,
    config: { headers: new AxiosHeaders() },
    data
  };
}

export function redirectTo(location: string): AxiosResponse<string> {
  return axiosResponse(302, "", { location });
}

export function fakeHasher(): { readonly hash: Mock<ContentHasher["hash"]> } {
  return { hash: vi.fn<ContentHasher["hash"]>() };
}

export function crawlContext(
  hasher: ContentHasher,
  overrides: {
    readonly db?: PluginDatabase;
    readonly concurrency?: number;
    readonly retries?: number;
    readonly pluginDownload?: string;
  } = {}
): CrawlContext {
  return {
    db: overrides.db ?? new PluginDatabase(),
    negativeCache: new NegativeResultCache(),
    http: createHttpClient({ timeoutMs: 1_000 }),
    hasher,
    net: {
      timeoutMs: 1_000,
      concurrency: overrides.concurrency ?? 4,
      taskTimeoutMs: 5_000,
      retries: overrides.retries ?? 0,
      retryBaseDelayMs: 0
    },
    sources: {
      pluginDetails: DETAILS_URL,
      pluginDownload: overrides.pluginDownload ?? DOWNLOAD_URL,
      downloadPrefix: DOWNLOAD_PREFIX
    }
  };
}
