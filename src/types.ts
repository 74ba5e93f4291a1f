// CHANGE: Domain models for IDE identities, plugin releases and content addresses.
// WHY: Persisted JSON shapes and in-memory tables share these definitions.

/**
 * JSON-like value type used for permissive parsing without `any` usage.
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | undefined
  | JsonValue[]
  | readonly JsonValue[]
  | { [key: string]: JsonValue };

/**
 * Canonical short key of an IDE product, also the prefix of its persisted file name.
 */
export type IdeProductKey =
  | "idea"
  | "phpstorm"
  | "webstorm"
  | "pycharm"
  | "ruby-mine"
  | "clion"
  | "goland"
  | "datagrip"
  | "dataspell"
  | "rider"
  | "android-studio"
  | "rust-rover"
  | "aqua"
  | "writerside"
  | "mps";

/**
 * One released IDE build.
 *
 * @property product - Canonical product key.
 * @property version - Marketing version, part of the identity.
 * @property buildNumber - Dotted build number used for compatibility checks.
 *
 * Invariant: equality is (product, version); `buildNumber` is empty for identities reloaded from disk.
 */
export interface IdeIdentity {
  readonly product: IdeProductKey;
  readonly version: string;
  readonly buildNumber: string;
}

/**
 * Plugin release as listed by the marketplace details endpoint.
 *
 * @property version - Release version string.
 * @property since - Inclusive minimum IDE build, may end in a wildcard.
 * @property until - Inclusive maximum IDE build, may end in a wildcard.
 */
export interface PluginRelease {
  readonly version: string;
  readonly since?: string;
  readonly until?: string;
}

/**
 * Content address of one plugin artifact.
 *
 * @property p - Download path relative to the marketplace download host.
 * @property h - Base64 sha256 of the (unpacked) artifact contents.
 *
 * Invariant: immutable once computed for a given plugin key.
 */
export interface PluginEntry {
  readonly p: string;
  readonly h: string;
}

/**
 * Plugin id → chosen version for one IDE.
 */
export type IdePluginTable = ReadonlyMap<string, string>;

/**
 * Counters reported after a database maintenance operation or crawl.
 */
export interface DatabaseStats {
  readonly entries: number;
  readonly ides: number;
  readonly mappings: number;
}
