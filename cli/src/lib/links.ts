import fs from "node:fs";
import path from "node:path";
import { errorMessage } from "./errors.js";
import { logger } from "./logger.js";
import { modFolderName } from "./manifest.js";
import type { EventSink, ModRequirement } from "../types/index.js";

export interface LinkReport {
  created: string[];
  existing: string[];
  missing: string[];
  failures: string[];
}

function linkExists(linkPath: string): boolean {
  try {
    fs.lstatSync(linkPath);
    return true;
  } catch {
    return false;
  }
}

/** True when `link` resolves to the same directory as `target`. */
export function pointsAt(link: string, target: string): boolean {
  try {
    return fs.realpathSync(link) === fs.realpathSync(target);
  } catch {
    return false;
  }
}

export function modLinkPath(modsDir: string, requirement: ModRequirement): string {
  return path.join(modsDir, modFolderName(requirement.displayName));
}

/**
 * Points `<modsDir>/@name` at each installed mod's workshop directory.
 * Links that already exist are left as they are; a folder name already
 * held by another mod is reported as a failure.
 */
export function linkMods(
  requirements: ModRequirement[],
  workshopDir: string,
  modsDir: string,
  onEvent: EventSink = logger.event,
): LinkReport {
  const report: LinkReport = { created: [], existing: [], missing: [], failures: [] };
  fs.mkdirSync(modsDir, { recursive: true });

  for (const req of requirements) {
    const target = path.join(workshopDir, req.id);
    const link = modLinkPath(modsDir, req);

    if (!fs.existsSync(target)) {
      report.missing.push(req.id);
      onEvent({ stage: "link", modId: req.id, outcome: "missing", detail: target });
      continue;
    }
    if (linkExists(link)) {
      if (pointsAt(link, target)) {
        report.existing.push(link);
      } else {
        const message = `Cannot link ${req.displayName} (${req.id}): ${link} belongs to another mod`;
        report.failures.push(message);
        onEvent({ stage: "link", modId: req.id, outcome: "failed", detail: message });
      }
      continue;
    }

    try {
      // "junction" only matters on Windows, where it needs no elevation.
      fs.symlinkSync(target, link, "junction");
      report.created.push(link);
      onEvent({ stage: "link", modId: req.id, outcome: "created", detail: path.basename(link) });
    } catch (err) {
      const message = `Cannot link ${link}: ${errorMessage(err)}`;
      report.failures.push(message);
      onEvent({ stage: "link", modId: req.id, outcome: "failed", detail: message });
    }
  }

  return report;
}
