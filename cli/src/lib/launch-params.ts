import fs from "node:fs";
import path from "node:path";
import { inspectMods } from "./inspector.js";
import { modLinkPath, pointsAt } from "./links.js";
import type { ModRequirement } from "../types/index.js";

export interface LaunchParameterInput {
  serverDir: string;
  workshopDir: string;
  modsDir: string;
  /** Manifest order; without it mods are listed in directory scan order. */
  order?: ModRequirement[];
  platform?: NodeJS.Platform;
}

export interface LaunchParameterSet {
  tokens: string[];
  value: string;
}

export function launchSeparator(platform: NodeJS.Platform = process.platform): string {
  return platform === "win32" ? ";" : "\\;";
}

function isDirectory(p: string): boolean {
  try {
    return fs.statSync(p).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Builds the `-mod=` value from what is on disk right now. Mods that never
 * landed are left out; nothing is written.
 */
export function buildLaunchParameters(input: LaunchParameterInput): LaunchParameterSet {
  const { serverDir, workshopDir, modsDir } = input;
  const tokens: string[] = [];
  const seen = new Set<string>();

  const add = (id: string, preferred?: string) => {
    const modDir = path.join(workshopDir, id);
    if (seen.has(id) || !isDirectory(modDir)) return;
    seen.add(id);
    // A link only stands in for the mod it resolves to.
    const dir = preferred && pointsAt(preferred, modDir) ? preferred : modDir;
    tokens.push(path.relative(serverDir, dir));
  };

  if (input.order) {
    for (const req of input.order) add(req.id, modLinkPath(modsDir, req));
  } else {
    for (const record of inspectMods(workshopDir).values()) add(record.id);
  }

  return { tokens, value: tokens.join(launchSeparator(input.platform)) };
}

export function writeLaunchParameters(file: string, params: LaunchParameterSet): void {
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, `${params.value}\n`, "utf-8");
}
