#!/usr/bin/env node
// CHANGE: Run the CLI only when executed directly.
// WHY: Tests import the CLI helpers without triggering command parsing.

import { isEntryPoint, runCli } from "./cli.js";

if (isEntryPoint(process.argv[1], import.meta.url)) {
  void runCli(process.argv);
}

export { runCli };
export { crawl, processPlugin } from "./crawler.js";
export type { CrawlContext, CrawlSummary, PluginOutcome } from "./crawler.js";
export { NegativeResultCache, PluginDatabase } from "./database.js";
export { ContentHashResolver } from "./resolver.js";
export { NixPrefetchHasher } from "./hasher.js";
export type { ContentHasher, HashRequest } from "./hasher.js";
export { loadDatabase, loadFullDatabase, saveDatabase } from "./store.js";
export { compareBuildNumbers, resolveCompatibleRelease } from "./version.js";
export type { IdeIdentity, IdeProductKey, PluginEntry, PluginRelease } from "./types.js";
