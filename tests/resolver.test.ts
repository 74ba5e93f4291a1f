// CHANGE: Cover cache lookups, 404 handling, redirect probing and digest conversion of the resolver.
// WHY: A release must be hashed at most once and unavailable releases must never fail a run.

import { afterEach, describe, expect, it, vi } from "vitest";
import { PluginDatabase } from "../src/database.js";
import { ExternalToolError, UnexpectedDownloadUrlError, UpstreamStatusError } from "../src/errors.js";
import {
  ContentHashResolver,
  artifactName,
  isExecutableArtifact,
  relativeDownloadPath,
  stripQuery
} from "../src/resolver.js";
import {
  DOWNLOAD_PREFIX,
  DOWNLOAD_URL,
  EMPTY_DIGEST,
  EMPTY_HASH,
  axiosResponse,
  crawlContext,
  fakeHasher,
  redirectTo
} from "./support.js";

describe("resolver helpers", () => {
  it("drops the query string", () => {
    expect(stripQuery(`${DOWNLOAD_PREFIX}files/a/1.zip?updateId=7&pluginId=a`)).toBe(`${DOWNLOAD_PREFIX}files/a/1.zip`);
  });

  it("derives the path below the download host", () => {
    expect(relativeDownloadPath(`${DOWNLOAD_PREFIX}files/a/1.zip`, DOWNLOAD_PREFIX)).toBe("files/a/1.zip");
    expect(() => relativeDownloadPath("https://mirror.example.test/a.zip", DOWNLOAD_PREFIX)).toThrow(
      UnexpectedDownloadUrlError
    );
  });

  it("builds store-safe artifact names", () => {
    expect(artifactName("org.example.plugin", "1.0+beta")).toBe("org-example-plugin-1-0-beta-source");
  });

  it("treats jar downloads as executables", () => {
    expect(isExecutableArtifact(`${DOWNLOAD_PREFIX}files/a/1.jar`)).toBe(true);
    expect(isExecutableArtifact(`${DOWNLOAD_PREFIX}files/a/1.zip`)).toBe(false);
  });
});

describe("ContentHashResolver.resolve", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("returns the stored entry without network access", async () => {
    const hasher = fakeHasher();
    const db = PluginDatabase.fromEntries([["a/--/1.0", { p: "files/a/1.zip", h: "hash-a" }]]);
    const context = crawlContext(hasher, { db });
    const headSpy = vi.spyOn(context.http, "head");

    const entry = await new ContentHashResolver(context).resolve("a", "1.0");

    expect(entry).toEqual({ p: "files/a/1.zip", h: "hash-a" });
    expect(headSpy).not.toHaveBeenCalled();
    expect(hasher.hash).not.toHaveBeenCalled();
  });

  it("follows redirects and hashes an unpacked archive", async () => {
    const hasher = fakeHasher();
    hasher.hash.mockResolvedValue(EMPTY_DIGEST);
    const context = crawlContext(hasher);
    const headSpy = vi.spyOn(context.http, "head");
    headSpy.mockResolvedValueOnce(redirectTo(`${DOWNLOAD_PREFIX}files/12/34/plugin-1.0.zip?updateId=34`));
    headSpy.mockResolvedValueOnce(axiosResponse(200, ""));

    const entry = await new ContentHashResolver(context).resolve("org.example.plugin", "1.0");

    expect(entry).toEqual({ p: "files/12/34/plugin-1.0.zip", h: EMPTY_HASH });
    expect(headSpy.mock.calls[0]?.[0]).toBe(`${DOWNLOAD_URL}?pluginId=org.example.plugin&version=1.0`);
    expect(hasher.hash).toHaveBeenCalledWith(
      {
        url: `${DOWNLOAD_PREFIX}files/12/34/plugin-1.0.zip`,
        name: "org-example-plugin-1-0-source",
        unpack: true,
        executable: false
      },
      undefined
    );
  });

  it("hashes jar artifacts as executables", async () => {
    const hasher = fakeHasher();
    hasher.hash.mockResolvedValue(EMPTY_DIGEST);
    const context = crawlContext(hasher);
    const headSpy = vi.spyOn(context.http, "head");
    headSpy.mockResolvedValueOnce(redirectTo(`${DOWNLOAD_PREFIX}files/a/a-2.0.jar`));
    headSpy.mockResolvedValueOnce(axiosResponse(200, ""));

    await new ContentHashResolver(context).resolve("a", "2.0");

    expect(hasher.hash.mock.calls[0]?.[0]).toMatchObject({ unpack: false, executable: true });
  });

  it("caches a missing download and does not store it", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const hasher = fakeHasher();
    const context = crawlContext(hasher);
    const headSpy = vi.spyOn(context.http, "head");
    headSpy.mockResolvedValueOnce(axiosResponse(404, ""));
    const resolver = new ContentHashResolver(context);

    expect(await resolver.resolve("a", "1.0")).toBeUndefined();
    expect(await resolver.resolve("a", "1.0")).toBeUndefined();

    expect(headSpy).toHaveBeenCalledTimes(1);
    expect(context.negativeCache.has("a", "1.0")).toBe(true);
    expect(context.db.stats().entries).toBe(0);
    expect(hasher.hash).not.toHaveBeenCalled();
  });

  it("fails on other error statuses", async () => {
    const context = crawlContext(fakeHasher());
    vi.spyOn(context.http, "head").mockResolvedValueOnce(axiosResponse(503, ""));

    await expect(new ContentHashResolver(context).resolve("a", "1.0")).rejects.toBeInstanceOf(UpstreamStatusError);
    expect(context.negativeCache.size).toBe(0);
  });

  it("fails when the artifact is not served from the download host", async () => {
    const context = crawlContext(fakeHasher());
    const headSpy = vi.spyOn(context.http, "head");
    headSpy.mockResolvedValueOnce(redirectTo("https://mirror.example.test/a-1.0.zip"));
    headSpy.mockResolvedValueOnce(axiosResponse(200, ""));

    await expect(new ContentHashResolver(context).resolve("a", "1.0")).rejects.toBeInstanceOf(
      UnexpectedDownloadUrlError
    );
  });

  it("fails when the hasher prints an undecodable digest", async () => {
    const hasher = fakeHasher();
    hasher.hash.mockResolvedValue("not-a-digest");
    const context = crawlContext(hasher);
    const headSpy = vi.spyOn(context.http, "head");
    headSpy.mockResolvedValueOnce(redirectTo(`${DOWNLOAD_PREFIX}files/a/1.zip`));
    headSpy.mockResolvedValueOnce(axiosResponse(200, ""));

    await expect(new ContentHashResolver(context).resolve("a", "1.0")).rejects.toBeInstanceOf(ExternalToolError);
  });

  it("fails on a truncated digest and stores nothing", async () => {
    const hasher = fakeHasher();
    hasher.hash.mockResolvedValue(EMPTY_DIGEST.slice(0, 10));
    const context = crawlContext(hasher);
    const headSpy = vi.spyOn(context.http, "head");
    headSpy.mockResolvedValueOnce(redirectTo(`${DOWNLOAD_PREFIX}files/a/1.zip`));
    headSpy.mockResolvedValueOnce(axiosResponse(200, ""));

    await expect(new ContentHashResolver(context).resolve("a", "1.0")).rejects.toThrow(
      'a@1.0: failed decoding digest "0mdqa9w1p6"'
    );
    expect(context.db.stats().entries).toBe(0);
  });
});
