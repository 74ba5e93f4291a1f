// CHANGE: Directory-based persistence of the plugin database with atomic file replacement.
// WHY: The packaging side reads `all_plugins.json` and one `ides/<product>-<version>.json` per IDE.

import fs from "fs-extra";
import path from "path";
import { DATABASE } from "./config.js";
import { PluginDatabase } from "./database.js";
import { DatabaseFormatError, describeError } from "./errors.js";
import { ideFileName, ideFromFileName } from "./ides/products.js";
import { debug, info, warn } from "./logger.js";
import type { JsonValue, PluginEntry } from "./types.js";
import { isRecord } from "./utils/json.js";

async function readJsonFile(file: string): Promise<JsonValue> {
  try {
    const parsed: JsonValue = await fs.readJson(file);
    return parsed;
  } catch (cause) {
    throw new DatabaseFormatError(file, describeError(cause), { cause });
  }
}

function toEntries(value: JsonValue, file: string): Array<[string, PluginEntry]> {
  if (!isRecord(value)) {
    throw new DatabaseFormatError(file, "expected an object of plugin entries");
  }
  return Object.entries(value).map(([key, raw]): [string, PluginEntry] => {
    if (!isRecord(raw) || typeof raw.p !== "string" || typeof raw.h !== "string") {
      throw new DatabaseFormatError(file, `entry "${key}" must have string "p" and "h"`);
    }
    return [key, { p: raw.p, h: raw.h }];
  });
}

function toIdeTable(value: JsonValue, file: string): Map<string, string> {
  if (!isRecord(value)) {
    throw new DatabaseFormatError(file, "expected an object of plugin versions");
  }
  const table = new Map<string, string>();
  for (const [pluginId, version] of Object.entries(value)) {
    if (typeof version !== "string") {
      throw new DatabaseFormatError(file, `version of "${pluginId}" must be a string`);
    }
    table.set(pluginId, version);
  }
  return table;
}

function sortedObject<T>(pairs: Iterable<readonly [string, T]>): Record<string, T> {
  const sorted = [...pairs].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  return Object.fromEntries(sorted);
}

/**
 * Write JSON next to its target and move it into place.
 */
async function writeJsonAtomic(file: string, payload: unknown): Promise<void> {
  const tempPath = `${file}.tmp`;
  await fs.writeJson(tempPath, payload, { spaces: 2 });
  await fs.move(tempPath, file, { overwrite: true });
}

/**
 * Load the entries table only. IDE tables stay empty.
 *
 * @param outputDir - Database directory.
 * @returns Database seeded with persisted entries, empty when the file is absent.
 * @throws DatabaseFormatError when the entries file cannot be parsed.
 */
export async function loadDatabase(outputDir: string): Promise<PluginDatabase> {
  const file = path.join(outputDir, DATABASE.ENTRIES_FILE);
  if (!(await fs.pathExists(file))) {
    debug(`${file} absent, starting with an empty database.`);
    return new PluginDatabase();
  }
  const db = PluginDatabase.fromEntries(toEntries(await readJsonFile(file), file));
  debug(`Loaded ${db.stats().entries} entries from ${file}.`);
  return db;
}

/**
 * Load the entries table and every persisted IDE table.
 *
 * Identities reloaded this way carry no build number.
 *
 * @param outputDir - Database directory.
 * @throws DatabaseFormatError when a file cannot be parsed or the IDE directory is missing.
 */
export async function loadFullDatabase(outputDir: string): Promise<PluginDatabase> {
  const db = await loadDatabase(outputDir);
  const idesDir = path.join(outputDir, DATABASE.IDES_DIR);
  if (!(await fs.pathExists(idesDir))) {
    throw new DatabaseFormatError(idesDir, "IDE directory does not exist");
  }
  const fileNames = (await fs.readdir(idesDir)).sort();
  for (const fileName of fileNames) {
    const file = path.join(idesDir, fileName);
    const ide = ideFromFileName(fileName);
    if (!ide) {
      warn(`Invalid file in IDE directory skipped: ${file}`);
      continue;
    }
    const missing = db.setIdeTable(ide, toIdeTable(await readJsonFile(file), file));
    if (missing.length > 0) {
      warn(`${file} references ${missing.length} versions without entries, e.g. ${missing[0]}`);
    }
  }
  const stats = db.stats();
  info(`Loaded ${stats.entries} entries and ${stats.ides} IDE tables from ${outputDir}.`);
  return db;
}

/**
 * Persist the database. Every file is replaced atomically; IDE files of IDEs absent from
 * the database are left untouched.
 *
 * @param outputDir - Database directory, created when missing.
 * @param db - Database to write.
 */
export async function saveDatabase(outputDir: string, db: PluginDatabase): Promise<void> {
  const idesDir = path.join(outputDir, DATABASE.IDES_DIR);
  await fs.ensureDir(idesDir);

  const entriesFile = path.join(outputDir, DATABASE.ENTRIES_FILE);
  debug(`Generating ${entriesFile}...`);
  await writeJsonAtomic(entriesFile, sortedObject(db.entries()));

  for (const { ide, plugins } of db.ides()) {
    const file = path.join(idesDir, ideFileName(ide));
    debug(`Generating ${file}...`);
    await writeJsonAtomic(file, sortedObject(plugins));
  }
  const stats = db.stats();
  info(`Saved ${stats.entries} entries and ${stats.ides} IDE tables to ${outputDir}.`);
}
