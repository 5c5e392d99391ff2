import fs, { type Dirent } from "node:fs";
import path from "node:path";
import { NameCollisionError, errorMessage } from "./errors.js";
import { logger } from "./logger.js";
import type { EventSink } from "../types/index.js";

export interface NormalizeReport {
  renamed: string[];
  collisions: NameCollisionError[];
  failures: string[];
}

function sameEntry(a: string, b: string): boolean {
  const sa = fs.lstatSync(a);
  const sb = fs.lstatSync(b);
  return sa.ino === sb.ino && sa.dev === sb.dev;
}

function renameEntry(dir: string, name: string, report: NormalizeReport, onEvent: EventSink) {
  const lower = name.toLowerCase();
  const source = path.join(dir, name);
  const target = path.join(dir, lower);

  try {
    if (fs.existsSync(target)) {
      if (!sameEntry(source, target)) {
        const collision = new NameCollisionError(source, target);
        report.collisions.push(collision);
        onEvent({ stage: "normalize", outcome: "collision", detail: collision.message });
        return;
      }
      // Case-insensitive filesystem: the target is the entry itself.
      const temp = path.join(dir, `${name}.__tmp__`);
      fs.renameSync(source, temp);
      fs.renameSync(temp, target);
    } else {
      fs.renameSync(source, target);
    }
    report.renamed.push(target);
  } catch (err) {
    const message = `Rename failed for ${source}: ${errorMessage(err)}`;
    report.failures.push(message);
    onEvent({ stage: "normalize", outcome: "failed", detail: message });
  }
}

function walk(dir: string, report: NormalizeReport, onEvent: EventSink) {
  let entries: Dirent[];
  try {
    entries = fs.readdirSync(dir, { withFileTypes: true }).sort((a, b) => (a.name < b.name ? -1 : 1));
  } catch (err) {
    const message = `Cannot read ${dir}: ${errorMessage(err)}`;
    report.failures.push(message);
    onEvent({ stage: "normalize", outcome: "failed", detail: message });
    return;
  }

  // Children first, so a directory is renamed only after its contents.
  for (const entry of entries) {
    if (entry.isDirectory()) walk(path.join(dir, entry.name), report, onEvent);
  }
  for (const entry of entries) {
    if (entry.name !== entry.name.toLowerCase()) renameEntry(dir, entry.name, report, onEvent);
  }
}

/**
 * Lowercases every file and directory name below `root`. Running it again
 * on the result changes nothing.
 */
export function normalizeNames(root: string, onEvent: EventSink = logger.event): NormalizeReport {
  const report: NormalizeReport = { renamed: [], collisions: [], failures: [] };
  if (!fs.existsSync(root)) return report;

  walk(root, report, onEvent);
  onEvent({
    stage: "normalize",
    outcome: "done",
    detail: `${report.renamed.length} renamed, ${report.collisions.length} collisions`,
  });
  return report;
}
