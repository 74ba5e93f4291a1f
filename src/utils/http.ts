// CHANGE: Shared axios client factory and typed request helpers.
// WHY: Retries and concurrency live in the crawl supervisor; these helpers only perform one request each.

import axios, { AxiosInstance, AxiosResponse } from "axios";
import type { NetConfig } from "../config.js";
import { UpstreamStatusError } from "../errors.js";
import { debug } from "../logger.js";

const MAX_REDIRECTS = 10;

export interface HttpResult<T> {
  readonly data: T;
  readonly headers: Record<string, string>;
  readonly status: number;
}

export interface ProbeResult {
  readonly status: number;
  readonly url: string;
  readonly headers: Record<string, string>;
}

/**
 * Create the axios instance every request of a run goes through.
 *
 * @param net - Timeout settings.
 */
export function createHttpClient(net: Pick<NetConfig, "timeoutMs">): AxiosInstance {
  return axios.create({
    timeout: net.timeoutMs,
    maxRedirects: 5,
    headers: {
      "User-Agent": "ide-plugin-index/1.0"
    }
  });
}

function normaliseHeaders(headers: AxiosResponse["headers"]): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    if (Array.isArray(value)) {
      out[key.toLowerCase()] = value.join(", ");
    } else if (typeof value === "string") {
      out[key.toLowerCase()] = value;
    } else if (typeof value === "number") {
      out[key.toLowerCase()] = String(value);
    }
  }
  return out;
}

/**
 * Perform GET request expecting JSON payload.
 *
 * @param client - Shared client.
 * @param url - Target URL.
 * @param signal - Aborts the request.
 * @returns Response data and headers.
 */
export async function getJson<T>(client: AxiosInstance, url: string, signal?: AbortSignal): Promise<HttpResult<T>> {
  const response = await client.get<T>(url, { signal, responseType: "json" });
  debug(`GET ${url} -> ${response.status}`);
  return {
    data: response.data,
    headers: normaliseHeaders(response.headers),
    status: response.status
  };
}

/**
 * Perform GET request returning the body as text.
 *
 * @param params - Query parameters appended to the URL.
 */
export async function getText(
  client: AxiosInstance,
  url: string,
  params?: Record<string, string>,
  signal?: AbortSignal
): Promise<HttpResult<string>> {
  const response = await client.get<string>(url, { params, signal, responseType: "text" });
  debug(`GET ${url} -> ${response.status}`);
  return {
    data: response.data,
    headers: normaliseHeaders(response.headers),
    status: response.status
  };
}

/**
 * Perform HEAD requests, following redirects by hand, and report the final status and URL.
 *
 * Any status is returned instead of thrown so callers can tell absence from failure.
 *
 * @param client - Shared client.
 * @param url - Start URL.
 * @param signal - Aborts the current request.
 * @throws UpstreamStatusError when a redirect has no location or the hop limit is exceeded.
 */
export async function headFollowingRedirects(
  client: AxiosInstance,
  url: string,
  signal?: AbortSignal
): Promise<ProbeResult> {
  let current = url;
  let lastStatus = 0;
  for (let hop = 0; hop <= MAX_REDIRECTS; hop += 1) {
    const response = await client.head(current, {
      signal,
      maxRedirects: 0,
      validateStatus: () => true
    });
    const headers = normaliseHeaders(response.headers);
    lastStatus = response.status;
    debug(`HEAD ${current} -> ${response.status}`);
    if (response.status < 300 || response.status >= 400) {
      return { status: response.status, url: current, headers };
    }
    const location = headers.location;
    if (!location) {
      throw new UpstreamStatusError(current, response.status, "Redirect without location");
    }
    current = new URL(location, current).toString();
  }
  throw new UpstreamStatusError(current, lastStatus, `More than ${MAX_REDIRECTS} redirects`);
}
