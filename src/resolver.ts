// CHANGE: Resolve (plugin id, version) to a content address, consulting the database and the 404 cache first.
// WHY: Every distinct release is content-addressed at most once across runs.

import type { AxiosInstance } from "axios";
import type { SourceConfig } from "./config.js";
import type { NegativeResultCache, PluginDatabase } from "./database.js";
import { ExternalToolError, UnexpectedDownloadUrlError, UpstreamStatusError } from "./errors.js";
import type { ContentHasher } from "./hasher.js";
import { info, warn } from "./logger.js";
import { probeDownload } from "./plugins/marketplace.js";
import type { PluginEntry } from "./types.js";
import { SHA256_BASE32_LENGTH, nixBase32ToBase64 } from "./utils/nix-base32.js";

/**
 * Collaborators of {@link ContentHashResolver}.
 */
export interface ResolverContext {
  readonly db: PluginDatabase;
  readonly negativeCache: NegativeResultCache;
  readonly http: AxiosInstance;
  readonly hasher: ContentHasher;
  readonly sources: Pick<SourceConfig, "pluginDownload" | "downloadPrefix">;
}

/**
 * Drop query and fragment from a download URL.
 */
export function stripQuery(url: string): string {
  const parsed = new URL(url);
  parsed.search = "";
  parsed.hash = "";
  return parsed.toString();
}

/**
 * Path of a download URL relative to the marketplace download host.
 *
 * @throws UnexpectedDownloadUrlError when the URL is served from elsewhere.
 */
export function relativeDownloadPath(url: string, prefix: string): string {
  if (!url.startsWith(prefix)) {
    throw new UnexpectedDownloadUrlError(url, prefix);
  }
  return url.slice(prefix.length);
}

/**
 * Store name handed to the hasher: `<id>-<version>-source` with every non-alphanumeric character replaced.
 */
export function artifactName(pluginId: string, version: string): string {
  return `${pluginId}-${version}-source`.replace(/[^\p{L}\p{N}]/gu, "-");
}

export function isExecutableArtifact(url: string): boolean {
  return url.endsWith(".jar");
}

/**
 * Content-Hash Resolver.
 *
 * Safe to call concurrently for different keys; the database and the 404 cache are only
 * touched synchronously.
 */
export class ContentHashResolver {
  constructor(private readonly context: ResolverContext) {}

  /**
   * Resolve the content address of one release.
   *
   * @param pluginId - Marketplace plugin id.
   * @param version - Release version.
   * @param signal - Aborts network requests and the hasher.
   * @returns The entry, or undefined when the release has no downloadable artifact.
   * @throws UpstreamStatusError for probe statuses other than success and not-found.
   * @throws ExternalToolError when the hasher fails or prints anything but a sha256 digest.
   */
  async resolve(pluginId: string, version: string, signal?: AbortSignal): Promise<PluginEntry | undefined> {
    const { db, negativeCache, http, hasher, sources } = this.context;

    const cached = db.getEntry(pluginId, version);
    if (cached) {
      return cached;
    }
    if (negativeCache.has(pluginId, version)) {
      return undefined;
    }

    info(`${pluginId}@${version}: not yet cached, hashing download...`);
    const probe = await probeDownload(http, sources, pluginId, version, signal);
    if (probe.status === 404) {
      warn(`${pluginId}@${version}: not available, skipping.`);
      negativeCache.add(pluginId, version);
      return undefined;
    }
    if (probe.status < 200 || probe.status >= 300) {
      throw new UpstreamStatusError(probe.url, probe.status, `${pluginId}@${version}: download probe failed`);
    }

    const url = stripQuery(probe.url);
    const path = relativeDownloadPath(url, sources.downloadPrefix);
    const executable = isExecutableArtifact(url);
    const digest = await hasher.hash(
      { url, name: artifactName(pluginId, version), unpack: !executable, executable },
      signal
    );
    const hash = digest.length === SHA256_BASE32_LENGTH ? nixBase32ToBase64(digest) : undefined;
    if (hash === undefined) {
      throw new ExternalToolError(`${pluginId}@${version}: failed decoding digest "${digest}"`);
    }
    return { p: path, h: hash };
  }
}
