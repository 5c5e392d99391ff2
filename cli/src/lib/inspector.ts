import fs from "node:fs";
import path from "node:path";
import type { LocalModRecord } from "../types/index.js";

const MOD_ID_REGEX = /^\d+$/;

export function isModId(name: string): boolean {
  return MOD_ID_REGEX.test(name.toLowerCase());
}

function hasAddons(modPath: string): boolean {
  let entries: fs.Dirent[];
  try {
    entries = fs.readdirSync(modPath, { withFileTypes: true });
  } catch {
    return false;
  }
  const addons = entries.find((e) => e.isDirectory() && e.name.toLowerCase() === "addons");
  if (!addons) return false;
  return fs.readdirSync(path.join(modPath, addons.name)).length > 0;
}

function isNormalized(modPath: string): boolean {
  if (path.basename(modPath) !== path.basename(modPath).toLowerCase()) return false;
  return fs.readdirSync(modPath).every((name) => name === name.toLowerCase());
}

/**
 * Scans the workshop content directory for installed mods, keyed by id.
 * Entries that are not mod-id directories are ignored. Never writes.
 */
export function inspectMods(modsRoot: string): Map<string, LocalModRecord> {
  const records = new Map<string, LocalModRecord>();

  let entries: fs.Dirent[];
  try {
    entries = fs.readdirSync(modsRoot, { withFileTypes: true });
  } catch {
    return records;
  }

  const dirs = entries
    .filter((entry) => entry.isDirectory() && isModId(entry.name))
    .map((entry) => entry.name)
    .sort();

  for (const name of dirs) {
    const modPath = path.join(modsRoot, name);
    const id = name.toLowerCase();
    if (records.has(id)) continue;
    records.set(id, {
      id,
      path: modPath,
      normalized: isNormalized(modPath),
      complete: hasAddons(modPath),
      lastCheckedMarker: fs.statSync(modPath).mtimeMs,
    });
  }

  return records;
}
