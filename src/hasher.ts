// CHANGE: Content addressing through the external nix-prefetch-url tool.
// WHY: The packaging side verifies artifacts against the same unpacked or flat sha256 the tool prints.

import { execFile } from "child_process";
import type { ToolConfig } from "./config.js";
import { ExternalToolError, describeError } from "./errors.js";
import { debug } from "./logger.js";

const MAX_TOOL_OUTPUT_BYTES = 1024 * 1024;

/**
 * One artifact to content-address.
 *
 * @property url - Artifact URL.
 * @property name - Store name of the fetched artifact.
 * @property unpack - Hash the unpacked archive contents.
 * @property executable - Hash as a single executable file.
 */
export interface HashRequest {
  readonly url: string;
  readonly name: string;
  readonly unpack: boolean;
  readonly executable: boolean;
}

/**
 * Computes the base32 sha256 digest of an artifact.
 */
export interface ContentHasher {
  hash(request: HashRequest, signal?: AbortSignal): Promise<string>;
}

export interface ToolOutput {
  readonly stdout: string;
  readonly stderr: string;
}

export type ToolRunner = (bin: string, args: readonly string[], signal?: AbortSignal) => Promise<ToolOutput>;

/**
 * Run a binary and collect its output.
 *
 * @throws ExternalToolError when the binary cannot start or exits with a non-zero status.
 */
export const runTool: ToolRunner = (bin, args, signal) =>
  new Promise((resolve, reject) => {
    execFile(bin, [...args], { signal, maxBuffer: MAX_TOOL_OUTPUT_BYTES, encoding: "utf8" }, (cause, stdout, stderr) => {
      if (cause) {
        const detail = stderr.trim();
        reject(
          new ExternalToolError(`${bin} ${args.join(" ")} failed: ${describeError(cause)}${detail ? ` (${detail})` : ""}`, {
            cause
          })
        );
        return;
      }
      resolve({ stdout, stderr });
    });
  });

/**
 * Split the `--print-path` output of nix-prefetch-url into digest and store path.
 *
 * @throws ExternalToolError when the output is not two lines.
 */
export function parsePrefetchOutput(stdout: string): { readonly hash: string; readonly storePath: string } {
  const lines = stdout
    .trim()
    .split("\n")
    .map(line => line.trim());
  const [hash, storePath] = lines;
  if (lines.length !== 2 || !hash || !storePath) {
    throw new ExternalToolError(`nix-prefetch-url generated invalid output: ${stdout.trim()}`);
  }
  return { hash, storePath };
}

/**
 * {@link ContentHasher} backed by `nix-prefetch-url`, deleting the fetched store path afterwards.
 */
export class NixPrefetchHasher implements ContentHasher {
  constructor(
    private readonly tools: ToolConfig,
    private readonly run: ToolRunner = runTool
  ) {}

  async hash(request: HashRequest, signal?: AbortSignal): Promise<string> {
    const args = ["--print-path", "--type", "sha256", "--name", request.name];
    if (request.unpack) {
      args.push("--unpack");
    }
    if (request.executable) {
      args.push("--executable");
    }
    args.push(request.url);

    const output = await this.run(this.tools.prefetchUrl, args, signal);
    const { hash, storePath } = parsePrefetchOutput(output.stdout);
    await this.forget(storePath);
    return hash;
  }

  private async forget(storePath: string): Promise<void> {
    try {
      await this.run(this.tools.nixStore, ["--delete", storePath]);
    } catch (cause) {
      debug(`Could not delete ${storePath}: ${describeError(cause)}`);
    }
  }
}
