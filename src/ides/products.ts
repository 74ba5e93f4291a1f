// CHANGE: Product code table and identity keys shared by the feeds and the persisted file names.

import type { IdeIdentity, IdeProductKey } from "../types.js";

/**
 * Vendor product code → canonical product key.
 */
const PRODUCT_CODES: Readonly<Record<string, IdeProductKey>> = {
  IU: "idea",
  PS: "phpstorm",
  WS: "webstorm",
  PY: "pycharm",
  RM: "ruby-mine",
  CL: "clion",
  GO: "goland",
  DB: "datagrip",
  DS: "dataspell",
  RD: "rider",
  AI: "android-studio",
  RR: "rust-rover",
  QA: "aqua",
  WRS: "writerside",
  MPS: "mps"
};

const PRODUCT_KEYS: ReadonlySet<string> = new Set(Object.values(PRODUCT_CODES));

export function productFromCode(code: string): IdeProductKey | undefined {
  return Object.prototype.hasOwnProperty.call(PRODUCT_CODES, code) ? PRODUCT_CODES[code] : undefined;
}

export function isProductKey(value: string): value is IdeProductKey {
  return PRODUCT_KEYS.has(value);
}

/**
 * Identity key of an IDE, `<product>-<version>`. Build numbers do not take part.
 */
export function ideKey(ide: Pick<IdeIdentity, "product" | "version">): string {
  return `${ide.product}-${ide.version}`;
}

export function ideFileName(ide: Pick<IdeIdentity, "product" | "version">): string {
  return `${ideKey(ide)}.json`;
}

/**
 * Rebuild an identity from its persisted file name.
 *
 * The version is everything after the last `-`. The build number cannot be recovered and
 * is left empty, so such identities are only good for reachability checks.
 *
 * @param fileName - Base name such as `idea-2025.1.json`.
 * @returns Identity, or undefined when the name does not follow the layout.
 */
export function ideFromFileName(fileName: string): IdeIdentity | undefined {
  if (!fileName.endsWith(".json")) {
    return undefined;
  }
  const stem = fileName.slice(0, -".json".length);
  const split = stem.lastIndexOf("-");
  if (split <= 0 || split === stem.length - 1) {
    return undefined;
  }
  const product = stem.slice(0, split);
  if (!isProductKey(product)) {
    return undefined;
  }
  return { product, version: stem.slice(split + 1), buildNumber: "" };
}
