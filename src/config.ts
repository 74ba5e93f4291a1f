// CHANGE: Resolve runtime configuration once into an explicit object.
// WHY: The crawl and the content hasher receive tool paths and limits through their context, never from globals.

import * as dotenv from "dotenv";
import { ConfigError } from "./errors.js";

dotenv.config();

/**
 * Upstream endpoints consumed by the generator.
 */
export const SOURCES = {
  JETBRAINS_RELEASES: "https://www.jetbrains.com/updates/updates.xml",
  ANDROID_STUDIO_RELEASES: "https://jb.gg/android-studio-releases-list.json",
  PLUGIN_INDICES: [
    "https://downloads.marketplace.jetbrains.com/files/pluginsXMLIds.json",
    "https://downloads.marketplace.jetbrains.com/files/jbPluginsXMLIds.json"
  ],
  PLUGIN_DETAILS: "https://plugins.jetbrains.com/plugins/list",
  PLUGIN_DOWNLOAD: "https://plugins.jetbrains.com/plugin/download",
  DOWNLOAD_PREFIX: "https://downloads.marketplace.jetbrains.com/"
} as const;

/**
 * Release-series prefixes of IDE versions that get a compatibility table.
 */
export const PROCESSED_VERSION_PREFIXES: readonly string[] = ["2027.", "2026.", "2025.", "2024.3."];

/**
 * File layout of the persisted database inside the output directory.
 */
export const DATABASE = {
  ENTRIES_FILE: "all_plugins.json",
  IDES_DIR: "ides"
} as const;

export interface NetConfig {
  readonly timeoutMs: number;
  readonly concurrency: number;
  readonly taskTimeoutMs: number;
  readonly retries: number;
  readonly retryBaseDelayMs: number;
}

export interface ToolConfig {
  readonly prefetchUrl: string;
  readonly nixStore: string;
}

export interface SourceConfig {
  readonly jetbrainsReleases: string;
  readonly androidStudioReleases: string;
  readonly pluginIndices: readonly string[];
  readonly pluginDetails: string;
  readonly pluginDownload: string;
  readonly downloadPrefix: string;
}

/**
 * Everything a generator run needs, resolved at startup.
 *
 * Invariant: `net.concurrency` and `net.retries + 1` are positive.
 */
export interface GeneratorConfig {
  readonly net: NetConfig;
  readonly tools: ToolConfig;
  readonly sources: SourceConfig;
}

type Env = Readonly<Record<string, string | undefined>>;

function readInteger(env: Env, name: string, fallback: number, minimum: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }
  const value = Number.parseInt(raw, 10);
  if (!Number.isFinite(value) || String(value) !== raw.trim() || value < minimum) {
    throw new ConfigError(`${name} must be an integer >= ${minimum}, got "${raw}"`);
  }
  return value;
}

function readString(env: Env, name: string, fallback: string): string {
  const raw = env[name]?.trim();
  return raw ? raw : fallback;
}

/**
 * Build the generator configuration from environment variables.
 *
 * @param env - Variables to read, `process.env` by default.
 * @throws ConfigError when a numeric setting is malformed.
 */
export function loadConfig(env: Env = process.env): GeneratorConfig {
  return {
    net: {
      timeoutMs: readInteger(env, "HTTP_TIMEOUT", 600_000, 1),
      concurrency: readInteger(env, "GENERATOR_CONCURRENCY", 16, 1),
      taskTimeoutMs: readInteger(env, "TASK_TIMEOUT", 1_200_000, 1),
      retries: readInteger(env, "TASK_RETRIES", 3, 0),
      retryBaseDelayMs: readInteger(env, "RETRY_BASE_DELAY", 250, 0)
    },
    tools: {
      prefetchUrl: readString(env, "NIX_PREFETCH_URL", "nix-prefetch-url"),
      nixStore: readString(env, "NIX_STORE", "nix-store")
    },
    sources: {
      jetbrainsReleases: SOURCES.JETBRAINS_RELEASES,
      androidStudioReleases: SOURCES.ANDROID_STUDIO_RELEASES,
      pluginIndices: SOURCES.PLUGIN_INDICES,
      pluginDetails: SOURCES.PLUGIN_DETAILS,
      pluginDownload: SOURCES.PLUGIN_DOWNLOAD,
      downloadPrefix: SOURCES.DOWNLOAD_PREFIX
    }
  };
}
