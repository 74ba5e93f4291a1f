// CHANGE: Narrowing helpers for parsed JSON and XML payloads.
// WHY: Payloads are validated field by field without `any`.

import type { JsonValue } from "../types.js";

export type JsonRecord = { readonly [key: string]: JsonValue };

export function isRecord(value: JsonValue): value is JsonRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * View a value as a list: arrays pass through, a single value becomes a one-element list.
 */
export function asList(value: JsonValue): readonly JsonValue[] {
  if (value === undefined || value === null) {
    return [];
  }
  return Array.isArray(value) ? value : [value];
}

export function optionalString(value: JsonValue): string | undefined {
  return typeof value === "string" ? value : undefined;
}
