// CHANGE: Confirm CLI wiring and the database maintenance commands.
// WHY: Verifies availability of generate/cleanup/stats entry points and their effect on disk.

import type { AxiosResponse } from "axios";
import fs from "fs-extra";
import os from "os";
import path from "path";
import { pathToFileURL } from "url";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  buildProgram,
  cleanupAction,
  collectInputs,
  createCrawlContext,
  generateAction,
  isEntryPoint,
  runCli,
  statsAction
} from "../src/cli.js";
import { loadConfig } from "../src/config.js";
import type { GeneratorConfig } from "../src/config.js";
import type { CrawlContext } from "../src/crawler.js";
import { PluginDatabase } from "../src/database.js";
import { RetryExhaustedError } from "../src/errors.js";
import type { ContentHasher } from "../src/hasher.js";
import { DOWNLOAD_PREFIX, EMPTY_DIGEST, EMPTY_HASH, axiosResponse, fakeHasher, redirectTo } from "./support.js";

const ideaFeed = `<products>
  <product name="IntelliJ IDEA">
    <code>IU</code>
    <channel id="IU-RELEASE-licensing-RELEASE">
      <build number="251.100" version="2025.1"/>
    </channel>
  </product>
</products>`;

const singleRelease = `<plugin-repository><category><idea-plugin><version>1.0</version></idea-plugin></category></plugin-repository>`;

async function seedDatabase(dir: string): Promise<void> {
  await fs.outputJson(path.join(dir, "all_plugins.json"), {
    "a/--/1.0": { p: "files/a/1.zip", h: "hash-a1" },
    "a/--/2.0": { p: "files/a/2.zip", h: "hash-a2" },
    "b/--/1.0": { p: "files/b/1.zip", h: "hash-b1" }
  });
  await fs.outputJson(path.join(dir, "ides", "idea-2025.1.json"), { a: "2.0" });
  await fs.outputJson(path.join(dir, "ides", "goland-2025.1.json"), { a: "2.0", b: "1.0" });
}

describe("CLI program", () => {
  it("registers expected commands", () => {
    const program = buildProgram();
    const commands = program.commands.map(command => command.name());
    expect(commands).toEqual(expect.arrayContaining(["generate", "cleanup", "stats"]));
    const cleanup = program.commands.find(command => command.name() === "cleanup");
    expect(cleanup?.options.map(option => option.long)).toContain("--output-path");
  });
});

describe("maintenance commands", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "plugin-cli-"));
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
    await fs.remove(dir);
  });

  it("cleanup removes entries no IDE references", async () => {
    await seedDatabase(dir);

    await expect(cleanupAction(dir)).resolves.toBe(1);

    expect(await fs.readJson(path.join(dir, "all_plugins.json"))).toEqual({
      "a/--/2.0": { p: "files/a/2.zip", h: "hash-a2" },
      "b/--/1.0": { p: "files/b/1.zip", h: "hash-b1" }
    });
    expect(await fs.readJson(path.join(dir, "ides", "goland-2025.1.json"))).toEqual({ a: "2.0", b: "1.0" });
  });

  it("stats reports counters of the persisted database", async () => {
    await seedDatabase(dir);
    await expect(statsAction(dir)).resolves.toEqual({ entries: 3, ides: 2, mappings: 3 });
  });

  it("sets a failing exit code when the database is incomplete", async () => {
    await fs.outputJson(path.join(dir, "all_plugins.json"), {});

    await runCli(["node", "ide-plugin-index", "cleanup", "-o", dir]);

    expect(process.exitCode).toBe(1);
  });
});

describe("collectInputs", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("fetches IDE feeds and merges plugin indices", async () => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    const config = loadConfig({});
    const context = createCrawlContext(config, new PluginDatabase(), fakeHasher());
    const getSpy = vi.spyOn(context.http, "get");
    getSpy.mockResolvedValueOnce(axiosResponse(200, "<products><product name=\"Toolbox App\"><code>TBA</code></product></products>"));
    getSpy.mockResolvedValueOnce(axiosResponse(200, { content: { item: [] } }));
    getSpy.mockResolvedValueOnce(axiosResponse(200, ["a", "b"]));
    getSpy.mockResolvedValueOnce(axiosResponse(200, ["b", "c"]));

    const inputs = await collectInputs(context, config);

    expect(inputs).toEqual({ ides: [], pluginIds: ["a", "b", "c"] });
    expect(getSpy.mock.calls.map(call => call[0])).toEqual([
      config.sources.jetbrainsReleases,
      config.sources.androidStudioReleases,
      ...config.sources.pluginIndices
    ]);
  });
});

describe("generateAction", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "plugin-generate-"));
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    await fs.outputJson(path.join(dir, "all_plugins.json"), { "b/--/1.0": { p: "files/b/1.zip", h: "hash-b1" } });
    await fs.outputJson(path.join(dir, "ides", "goland-2025.1.json"), { b: "1.0" });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.remove(dir);
  });

  function contextWithFeeds(
    config: GeneratorConfig,
    hasher: ContentHasher,
    details: AxiosResponse<string> | Error,
    probes: readonly AxiosResponse<string>[] = []
  ): (db: PluginDatabase) => CrawlContext {
    return db => {
      const context = createCrawlContext(config, db, hasher);
      const getSpy = vi.spyOn(context.http, "get");
      getSpy.mockResolvedValueOnce(axiosResponse(200, ideaFeed));
      getSpy.mockResolvedValueOnce(axiosResponse(200, { content: { item: [] } }));
      getSpy.mockResolvedValueOnce(axiosResponse(200, ["a"]));
      if (details instanceof Error) {
        getSpy.mockRejectedValue(details);
      } else {
        getSpy.mockResolvedValueOnce(details);
      }
      const headSpy = vi.spyOn(context.http, "head");
      for (const probe of probes) {
        headSpy.mockResolvedValueOnce(probe);
      }
      return context;
    };
  }

  it("merges resolved plugins into the saved database", async () => {
    const config = loadConfig({ TASK_RETRIES: "0" });
    const hasher = fakeHasher();
    hasher.hash.mockResolvedValue(EMPTY_DIGEST);
    const contextFor = contextWithFeeds(config, hasher, axiosResponse(200, singleRelease), [
      redirectTo(`${DOWNLOAD_PREFIX}files/a/1.0.zip?updateId=9`),
      axiosResponse(200, "")
    ]);

    const summary = await generateAction(dir, config, contextFor);

    expect(summary).toEqual({ plugins: 1, processed: 1, skipped: 0, withoutData: 0, merged: 1 });
    expect(await fs.readJson(path.join(dir, "all_plugins.json"))).toEqual({
      "a/--/1.0": { p: "files/a/1.0.zip", h: EMPTY_HASH },
      "b/--/1.0": { p: "files/b/1.zip", h: "hash-b1" }
    });
    expect(await fs.readJson(path.join(dir, "ides", "idea-2025.1.json"))).toEqual({ a: "1.0" });
    expect(await fs.readJson(path.join(dir, "ides", "goland-2025.1.json"))).toEqual({ b: "1.0" });
  });

  it("leaves the output directory untouched when a plugin exhausts its retries", async () => {
    const config = loadConfig({ TASK_RETRIES: "1", RETRY_BASE_DELAY: "0" });
    const hasher = fakeHasher();
    const contextFor = contextWithFeeds(config, hasher, new Error("socket hang up"));
    const entriesBefore = await fs.readFile(path.join(dir, "all_plugins.json"));
    const ideBefore = await fs.readFile(path.join(dir, "ides", "goland-2025.1.json"));

    await expect(generateAction(dir, config, contextFor)).rejects.toBeInstanceOf(RetryExhaustedError);

    expect(await fs.readFile(path.join(dir, "all_plugins.json"))).toEqual(entriesBefore);
    expect(await fs.readFile(path.join(dir, "ides", "goland-2025.1.json"))).toEqual(ideBefore);
    expect(await fs.readdir(path.join(dir, "ides"))).toEqual(["goland-2025.1.json"]);
    expect(hasher.hash).not.toHaveBeenCalled();
  });
});

describe("isEntryPoint", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "plugin-bin-"));
  });

  afterEach(async () => {
    await fs.remove(dir);
  });

  it("follows the bin symlink to the entry module", async () => {
    const target = path.join(dir, "index.js");
    const link = path.join(dir, "ide-plugin-index");
    await fs.writeFile(target, "");
    await fs.symlink(target, link);
    const moduleUrl = pathToFileURL(await fs.realpath(target)).href;

    expect(isEntryPoint(link, moduleUrl)).toBe(true);
    expect(isEntryPoint(target, moduleUrl)).toBe(true);
  });

  it("rejects other scripts and missing paths", async () => {
    const target = path.join(dir, "index.js");
    const other = path.join(dir, "other.js");
    await fs.writeFile(target, "");
    await fs.writeFile(other, "");
    const moduleUrl = pathToFileURL(await fs.realpath(target)).href;

    expect(isEntryPoint(other, moduleUrl)).toBe(false);
    expect(isEntryPoint(path.join(dir, "missing.js"), moduleUrl)).toBe(false);
    expect(isEntryPoint(undefined, moduleUrl)).toBe(false);
  });
});
