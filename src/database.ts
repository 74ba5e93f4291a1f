// CHANGE: In-memory plugin database with idempotent merge and reachability garbage collection.
// WHY: Many crawl tasks merge into one store; entries are shared by key between IDE tables.

import { ideKey } from "./ides/products.js";
import { debug, warn } from "./logger.js";
import type { DatabaseStats, IdeIdentity, IdePluginTable, PluginEntry } from "./types.js";
import { pluginKey } from "./utils/plugin-key.js";

interface IdeTable {
  readonly ide: IdeIdentity;
  readonly plugins: Map<string, string>;
}

/**
 * Deduplicated content-address table plus one plugin → version table per IDE.
 *
 * Invariant: every (plugin, version) pair in an IDE table has an entry. All mutators are
 * synchronous, so concurrent crawl tasks never observe a half-applied insert.
 */
export class PluginDatabase {
  private readonly entryTable = new Map<string, PluginEntry>();
  private readonly ideTables = new Map<string, IdeTable>();

  /**
   * Seed a database from a persisted entries table.
   *
   * @param entries - Pairs of plugin key and entry.
   */
  static fromEntries(entries: Iterable<readonly [string, PluginEntry]>): PluginDatabase {
    const db = new PluginDatabase();
    for (const [key, entry] of entries) {
      db.entryTable.set(key, entry);
    }
    return db;
  }

  /**
   * Look up a content address.
   */
  getEntry(pluginId: string, version: string): PluginEntry | undefined {
    return this.entryTable.get(pluginKey(pluginId, version));
  }

  /**
   * Record that an IDE uses a plugin version.
   *
   * The first entry stored for a key wins. The IDE mapping is written in every case.
   *
   * @param ide - IDE the version was resolved for.
   * @param pluginId - Marketplace plugin id.
   * @param version - Chosen release.
   * @param entry - Content address of that release.
   */
  insert(ide: IdeIdentity, pluginId: string, version: string, entry: PluginEntry): void {
    const key = pluginKey(pluginId, version);
    const existing = this.entryTable.get(key);
    if (!existing) {
      this.entryTable.set(key, entry);
    } else if (existing.p !== entry.p || existing.h !== entry.h) {
      warn(`${key}: upstream artifact changed (kept ${existing.h}, saw ${entry.h})`);
    }
    this.tableFor(ide).plugins.set(pluginId, version);
  }

  /**
   * Attach a complete plugin table for an IDE, replacing any previous one.
   *
   * Used when reloading persisted tables; every referenced version must already have an entry.
   *
   * @returns Keys the table references that have no entry.
   */
  setIdeTable(ide: IdeIdentity, plugins: IdePluginTable): string[] {
    const missing: string[] = [];
    for (const [pluginId, version] of plugins) {
      const key = pluginKey(pluginId, version);
      if (!this.entryTable.has(key)) {
        missing.push(key);
      }
    }
    this.ideTables.set(ideKey(ide), { ide, plugins: new Map(plugins) });
    return missing;
  }

  /**
   * Remove every entry no IDE table references.
   *
   * Only correct when all IDE tables are loaded; a partial load evicts live entries.
   *
   * @returns Number of removed entries.
   */
  garbageCollect(): number {
    const reachable = new Set<string>();
    for (const table of this.ideTables.values()) {
      for (const [pluginId, version] of table.plugins) {
        reachable.add(pluginKey(pluginId, version));
      }
    }
    let removed = 0;
    for (const key of [...this.entryTable.keys()]) {
      if (!reachable.has(key)) {
        this.entryTable.delete(key);
        removed += 1;
      }
    }
    debug(`Garbage collection removed ${removed} entries, kept ${this.entryTable.size}.`);
    return removed;
  }

  /**
   * Entries sorted by key.
   */
  entries(): Array<[string, PluginEntry]> {
    return [...this.entryTable.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  }

  /**
   * IDE tables in insertion order.
   */
  ides(): Array<{ readonly ide: IdeIdentity; readonly plugins: IdePluginTable }> {
    return [...this.ideTables.values()];
  }

  ideTable(ide: Pick<IdeIdentity, "product" | "version">): IdePluginTable | undefined {
    return this.ideTables.get(ideKey(ide))?.plugins;
  }

  stats(): DatabaseStats {
    let mappings = 0;
    for (const table of this.ideTables.values()) {
      mappings += table.plugins.size;
    }
    return {
      entries: this.entryTable.size,
      ides: this.ideTables.size,
      mappings
    };
  }

  private tableFor(ide: IdeIdentity): IdeTable {
    const key = ideKey(ide);
    const existing = this.ideTables.get(key);
    if (existing) {
      return existing;
    }
    const created: IdeTable = { ide, plugins: new Map() };
    this.ideTables.set(key, created);
    return created;
  }
}

/**
 * Plugin keys known to have no downloadable artifact during the current run.
 */
export class NegativeResultCache {
  private readonly keys = new Set<string>();

  has(pluginId: string, version: string): boolean {
    return this.keys.has(pluginKey(pluginId, version));
  }

  add(pluginId: string, version: string): void {
    this.keys.add(pluginKey(pluginId, version));
  }

  get size(): number {
    return this.keys.size;
  }
}
