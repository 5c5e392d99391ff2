import fs from "node:fs";
import path from "node:path";
import { logger } from "./logger.js";
import { modLinkPath } from "./links.js";
import type { EventSink, ModRequirement, SyncConfig } from "../types/index.js";

function removeEntry(p: string): boolean {
  try {
    fs.lstatSync(p);
  } catch {
    return false;
  }
  fs.rmSync(p, { recursive: true, force: true });
  return true;
}

/** Deletes the content and link of every mod in the manifest. */
export function clearMods(
  requirements: ModRequirement[],
  config: Pick<SyncConfig, "workshopDir" | "modsDir">,
  onEvent: EventSink = logger.event,
): string[] {
  const removed: string[] = [];
  for (const req of requirements) {
    const contentRemoved = removeEntry(path.join(config.workshopDir, req.id));
    removeEntry(modLinkPath(config.modsDir, req));
    if (contentRemoved) {
      removed.push(req.id);
      onEvent({ stage: "clear", modId: req.id, outcome: "deleted", detail: req.displayName });
    }
  }
  return removed;
}

function emptyDir(dir: string, onEvent: EventSink): number {
  if (!fs.existsSync(dir)) {
    onEvent({ stage: "clear", outcome: "missing", detail: dir });
    return 0;
  }
  const names = fs.readdirSync(dir);
  for (const name of names) {
    fs.rmSync(path.join(dir, name), { recursive: true, force: true });
  }
  onEvent({ stage: "clear", outcome: "cleared", detail: dir });
  return names.length;
}

/**
 * Wipes all workshop content, the mod links and SteamCMD's workshop
 * manifests (`*.acf`) so the next update starts from nothing.
 */
export function clearAllMods(
  config: Pick<SyncConfig, "server" | "workshopDir" | "modsDir">,
  onEvent: EventSink = logger.event,
): number {
  const workshopRoot = path.join(config.server.dir, "steamapps", "workshop");
  if (fs.existsSync(workshopRoot)) {
    for (const name of fs.readdirSync(workshopRoot)) {
      if (!name.endsWith(".acf")) continue;
      fs.rmSync(path.join(workshopRoot, name), { force: true });
      onEvent({ stage: "clear", outcome: "deleted", detail: name });
    }
  }
  return emptyDir(config.workshopDir, onEvent) + emptyDir(config.modsDir, onEvent);
}
