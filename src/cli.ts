// CHANGE: Command-line surface for the generate, cleanup and stats workflows.
// WHY: The database is only written after a command finished without error.

import { Command } from "commander";
import fs from "fs-extra";
import { pathToFileURL } from "url";
import { loadConfig } from "./config.js";
import type { GeneratorConfig } from "./config.js";
import { crawl, supervisePolicy } from "./crawler.js";
import type { CrawlContext, CrawlSummary } from "./crawler.js";
import { NegativeResultCache } from "./database.js";
import type { PluginDatabase } from "./database.js";
import { describeError } from "./errors.js";
import { NixPrefetchHasher } from "./hasher.js";
import type { ContentHasher } from "./hasher.js";
import { collectIdes } from "./ides/index.js";
import { error as logError, info, setLogLevel } from "./logger.js";
import { fetchPluginIds, mergePluginIds } from "./plugins/marketplace.js";
import { loadDatabase, loadFullDatabase, saveDatabase } from "./store.js";
import type { DatabaseStats, IdeIdentity } from "./types.js";
import { createHttpClient } from "./utils/http.js";
import { supervise } from "./utils/supervise.js";

/**
 * Assemble the crawl context for one run.
 *
 * @param config - Resolved configuration.
 * @param db - Database the crawl merges into.
 * @param hasher - Content hasher, the nix-prefetch-url one by default.
 */
export function createCrawlContext(
  config: GeneratorConfig,
  db: PluginDatabase,
  hasher: ContentHasher = new NixPrefetchHasher(config.tools)
): CrawlContext {
  return {
    db,
    negativeCache: new NegativeResultCache(),
    http: createHttpClient(config.net),
    hasher,
    net: config.net,
    sources: config.sources
  };
}

/**
 * Fetch IDE identities and candidate plugin ids concurrently, each under the retry envelope.
 */
export async function collectInputs(
  context: CrawlContext,
  config: GeneratorConfig
): Promise<{ readonly ides: IdeIdentity[]; readonly pluginIds: string[] }> {
  const policy = supervisePolicy(config.net);
  const [ides, pluginIds] = await Promise.all([
    supervise("IDE release feeds", signal => collectIdes(context.http, config.sources, signal), policy),
    supervise(
      "plugin indices",
      async signal =>
        mergePluginIds(await Promise.all(config.sources.pluginIndices.map(url => fetchPluginIds(context.http, url, signal)))),
      policy
    )
  ]);
  info(`Indexing ${ides.length} IDE versions and ${pluginIds.length} plugins.`);
  return { ides, pluginIds };
}

/**
 * Generate mode entry point: load entries, crawl every candidate plugin, save.
 *
 * Nothing is written when the crawl fails.
 *
 * @param outputPath - Database directory.
 * @param config - Resolved configuration.
 * @param contextFor - Builds the crawl context around the loaded database.
 */
export async function generateAction(
  outputPath: string,
  config: GeneratorConfig = loadConfig(),
  contextFor: (db: PluginDatabase) => CrawlContext = db => createCrawlContext(config, db)
): Promise<CrawlSummary> {
  info("Loading old database.");
  const db = await loadDatabase(outputPath);
  const context = contextFor(db);
  const { ides, pluginIds } = await collectInputs(context, config);
  info("Beginning plugin resolution...");
  const summary = await crawl(context, ides, pluginIds);
  info("Saving database...");
  await saveDatabase(outputPath, db);
  return summary;
}

/**
 * Cleanup mode entry point: load every IDE table, drop unreferenced entries, save.
 *
 * Never re-resolves compatibility; reloaded identities carry no build number.
 *
 * @returns Number of removed entries.
 */
export async function cleanupAction(outputPath: string): Promise<number> {
  const db = await loadFullDatabase(outputPath);
  const removed = db.garbageCollect();
  info(`Removed ${removed} unreferenced entries.`);
  await saveDatabase(outputPath, db);
  return removed;
}

/**
 * Stats mode entry point: print counters of the persisted database.
 */
export async function statsAction(outputPath: string): Promise<DatabaseStats> {
  const db = await loadFullDatabase(outputPath);
  const stats = db.stats();
  console.log(stats);
  return stats;
}

interface OutputOptions {
  readonly outputPath: string;
}

/**
 * Construct commander program with configured commands.
 *
 * @returns Ready-to-use commander instance.
 */
export function buildProgram(): Command {
  const program = new Command();
  program
    .name("ide-plugin-index")
    .description("Build the IDE plugin compatibility and content-address database")
    .version("1.0.0")
    .option("-v, --verbose", "log debug details")
    .hook("preAction", command => {
      if (command.opts<{ verbose?: boolean }>().verbose) {
        setLogLevel("debug");
      }
    });

  program
    .command("generate")
    .description("Resolve compatible plugin versions for every IDE and update the database")
    .requiredOption("-o, --output-path <dir>", "database directory")
    .action(async (options: OutputOptions) => {
      await generateAction(options.outputPath);
    });
  program
    .command("cleanup")
    .description("Remove entries no IDE table references")
    .requiredOption("-o, --output-path <dir>", "database directory")
    .action(async (options: OutputOptions) => {
      await cleanupAction(options.outputPath);
    });
  program
    .command("stats")
    .description("Display database statistics")
    .requiredOption("-o, --output-path <dir>", "database directory")
    .action(async (options: OutputOptions) => {
      await statsAction(options.outputPath);
    });

  return program;
}

/**
 * Whether the running script is the module at `moduleUrl`, following symlinks such as
 * the one npm puts in `node_modules/.bin`.
 *
 * @param scriptPath - `process.argv[1]`.
 * @param moduleUrl - `import.meta.url` of the entry module.
 */
export function isEntryPoint(scriptPath: string | undefined, moduleUrl: string): boolean {
  if (!scriptPath || !fs.existsSync(scriptPath)) {
    return false;
  }
  return pathToFileURL(fs.realpathSync(scriptPath)).href === moduleUrl;
}

/**
 * Execute CLI with provided argv array.
 *
 * @param argv - Process arguments.
 */
export async function runCli(argv: readonly string[]): Promise<void> {
  const program = buildProgram();
  try {
    await program
      .configureOutput({
        outputError: (str: string) => logError(str.trim())
      })
      .parseAsync([...argv]);
  } catch (error) {
    logError(`Run failed: ${describeError(error)}`);
    process.exitCode = 1;
  }
}
