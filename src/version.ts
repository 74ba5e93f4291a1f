// CHANGE: Build-number comparison and first-match release selection.
// WHY: Marketplace bounds are dotted, mixed-alphanumeric and may end in a wildcard.

import { InvalidBuildNumberError } from "./errors.js";
import type { PluginRelease } from "./types.js";

/** Numeric segments hold their digits without leading zeros. */
type Segment = { readonly kind: "number"; readonly digits: string } | { readonly kind: "text"; readonly value: string };

const WILDCARD_UPPER = "99999999";
const WILDCARD_LOWER = "0";

const SEPARATORS = /[.\-_+]/;
const ZERO: Segment = { kind: "number", digits: "0" };

function parseSegments(buildNumber: string): Segment[] {
  const trimmed = buildNumber.trim();
  if (trimmed.length === 0) {
    throw new InvalidBuildNumberError(buildNumber);
  }
  return trimmed
    .split(SEPARATORS)
    .filter(part => part.length > 0)
    .map((part): Segment =>
      /^\d+$/.test(part) ? { kind: "number", digits: part.replace(/^0+(?=\d)/, "") } : { kind: "text", value: part }
    );
}

function compareSegments(left: Segment, right: Segment): number {
  if (left.kind === "number" && right.kind === "number") {
    if (left.digits.length !== right.digits.length) {
      return left.digits.length < right.digits.length ? -1 : 1;
    }
    return left.digits < right.digits ? -1 : left.digits > right.digits ? 1 : 0;
  }
  if (left.kind === "text" && right.kind === "text") {
    return left.value < right.value ? -1 : left.value > right.value ? 1 : 0;
  }
  return left.kind === "number" ? 1 : -1;
}

/**
 * Compare two build numbers segment by segment.
 *
 * Numeric segments compare numerically, text segments lexicographically, and a numeric
 * segment ranks above a text one. Missing trailing segments count as `0`, so
 * `"231"` equals `"231.0"`.
 *
 * @returns Negative, zero or positive like `Array.prototype.sort` comparators.
 * @throws InvalidBuildNumberError for empty input.
 */
export function compareBuildNumbers(left: string, right: string): number {
  const a = parseSegments(left);
  const b = parseSegments(right);
  const length = Math.max(a.length, b.length);
  for (let index = 0; index < length; index += 1) {
    const result = compareSegments(a[index] ?? ZERO, b[index] ?? ZERO);
    if (result !== 0) {
      return result;
    }
  }
  return 0;
}

/**
 * Replace wildcard segments of a bound with a concrete value.
 *
 * @param bound - Raw `since-build` or `until-build` value.
 * @param side - `since` maps `*` to the lowest value, `until` to the highest.
 */
export function expandWildcard(bound: string, side: "since" | "until"): string {
  const replacement = side === "since" ? WILDCARD_LOWER : WILDCARD_UPPER;
  return bound
    .trim()
    .split(".")
    .map(part => (part === "*" ? replacement : part))
    .join(".");
}

function hasBound(bound: string | undefined): bound is string {
  return bound !== undefined && bound.trim().length > 0;
}

/**
 * Check whether a build number falls within a release's inclusive bounds.
 */
export function admits(buildNumber: string, release: PluginRelease): boolean {
  if (hasBound(release.since) && compareBuildNumbers(buildNumber, expandWildcard(release.since, "since")) < 0) {
    return false;
  }
  if (hasBound(release.until) && compareBuildNumbers(buildNumber, expandWildcard(release.until, "until")) > 0) {
    return false;
  }
  return true;
}

/**
 * Pick the release to install on an IDE build.
 *
 * Releases are scanned in the order given and never re-sorted; callers pass them in the
 * marketplace's own most-preferred-first order.
 *
 * @param buildNumber - IDE build number.
 * @param releases - Candidate releases, most preferred first.
 * @returns First admissible release, or undefined.
 */
export function resolveCompatibleRelease(
  buildNumber: string,
  releases: readonly PluginRelease[]
): PluginRelease | undefined {
  return releases.find(release => admits(buildNumber, release));
}
