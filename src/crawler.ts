// CHANGE: Crawl orchestrator fanning one supervised task per candidate plugin over a bounded pool.
// WHY: Upstream must never see more than the configured number of concurrent plugin tasks.

import pLimit from "p-limit";
import type { NetConfig } from "./config.js";
import { describeError } from "./errors.js";
import { ideKey } from "./ides/products.js";
import { debug, error as logError, info, warn } from "./logger.js";
import { detailsIdFor } from "./plugins/exceptions.js";
import { fetchPluginReleases } from "./plugins/marketplace.js";
import { ContentHashResolver } from "./resolver.js";
import type { ResolverContext } from "./resolver.js";
import type { IdeIdentity } from "./types.js";
import { supervise } from "./utils/supervise.js";
import type { SupervisePolicy } from "./utils/supervise.js";
import { resolveCompatibleRelease } from "./version.js";

/**
 * Everything a crawl needs, resolved once at startup.
 */
export interface CrawlContext extends ResolverContext {
  readonly net: NetConfig;
  readonly sources: ResolverContext["sources"] & { readonly pluginDetails: string };
}

export type PluginOutcome =
  | { readonly status: "skipped"; readonly reason: string }
  | { readonly status: "no-data" }
  | { readonly status: "processed"; readonly merged: number };

export interface CrawlSummary {
  readonly plugins: number;
  readonly processed: number;
  readonly skipped: number;
  readonly withoutData: number;
  readonly merged: number;
}

export function supervisePolicy(net: NetConfig): SupervisePolicy {
  return {
    timeoutMs: net.taskTimeoutMs,
    retries: net.retries,
    baseDelayMs: net.retryBaseDelayMs
  };
}

/**
 * Resolve one plugin for every IDE and merge the results into the database.
 *
 * IDEs are handled one after another. Releases the marketplace cannot serve are left out.
 *
 * @param context - Crawl collaborators.
 * @param resolver - Content-hash resolver sharing the context's caches.
 * @param ides - IDE identities with build numbers.
 * @param pluginId - Candidate plugin id.
 * @param signal - Fires when the attempt times out or the crawl aborts.
 */
export async function processPlugin(
  context: CrawlContext,
  resolver: ContentHashResolver,
  ides: readonly IdeIdentity[],
  pluginId: string,
  signal?: AbortSignal
): Promise<PluginOutcome> {
  debug(`Processing ${pluginId}...`);
  const lookup = detailsIdFor(pluginId);
  if ("skipped" in lookup) {
    warn(`${pluginId}: plugin is marked as broken (${lookup.skipped}), skipping.`);
    return { status: "skipped", reason: lookup.skipped };
  }

  const releases = await fetchPluginReleases(context.http, context.sources, lookup.detailsId, signal);
  signal?.throwIfAborted();
  if (!releases) {
    warn(`${pluginId}: no plugin details available, skipping.`);
    return { status: "no-data" };
  }

  let merged = 0;
  for (const ide of ides) {
    const release = resolveCompatibleRelease(ide.buildNumber, releases);
    if (!release) {
      debug(`${pluginId}: ${ideKey(ide)} (${ide.buildNumber}) not supported.`);
      continue;
    }
    const entry = await resolver.resolve(pluginId, release.version, signal);
    signal?.throwIfAborted();
    if (entry) {
      context.db.insert(ide, pluginId, release.version, entry);
      merged += 1;
    }
  }
  return { status: "processed", merged };
}

/**
 * Process every candidate plugin under the concurrency cap.
 *
 * The first task that exhausts its retries aborts every other task; the crawl then rejects
 * with that task's error once nothing is running any more.
 *
 * @param context - Crawl collaborators.
 * @param ides - IDE identities with build numbers.
 * @param pluginIds - Candidate plugin ids.
 * @returns Counters of the finished crawl.
 */
export async function crawl(
  context: CrawlContext,
  ides: readonly IdeIdentity[],
  pluginIds: readonly string[]
): Promise<CrawlSummary> {
  const limit = pLimit(Math.max(1, context.net.concurrency));
  const controller = new AbortController();
  const resolver = new ContentHashResolver(context);
  const policy = supervisePolicy(context.net);

  const total = pluginIds.length;
  const progressInterval = Math.max(1, Math.floor(total / 100));
  let finished = 0;
  const state: { failure?: { readonly cause: unknown } } = {};

  const runTask = async (pluginId: string): Promise<PluginOutcome> => {
    try {
      const outcome = await supervise(
        `plugin ${pluginId}`,
        signal => processPlugin(context, resolver, ides, pluginId, signal),
        policy,
        controller.signal
      );
      finished += 1;
      if (finished % progressInterval === 0 || finished === total) {
        debug(`Crawl progress: ${finished}/${total}`);
      }
      return outcome;
    } catch (cause) {
      if (!state.failure) {
        state.failure = { cause };
        logError(`Aborting crawl: ${describeError(cause)}`);
        controller.abort(cause);
      }
      throw cause;
    }
  };

  info(`Crawling ${total} plugins for ${ides.length} IDEs with concurrency ${context.net.concurrency}.`);
  const results = await Promise.allSettled(pluginIds.map(pluginId => limit(() => runTask(pluginId))));
  if (state.failure) {
    throw state.failure.cause;
  }

  let processed = 0;
  let skipped = 0;
  let withoutData = 0;
  let merged = 0;
  for (const result of results) {
    if (result.status !== "fulfilled") {
      continue;
    }
    const outcome = result.value;
    if (outcome.status === "processed") {
      processed += 1;
      merged += outcome.merged;
    } else if (outcome.status === "skipped") {
      skipped += 1;
    } else {
      withoutData += 1;
    }
  }
  const summary: CrawlSummary = { plugins: total, processed, skipped, withoutData, merged };
  info(
    `Crawl finished: ${processed} processed, ${skipped} skipped, ${withoutData} without data, ${merged} IDE mappings merged.`
  );
  return summary;
}
