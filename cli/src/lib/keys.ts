import fs from "node:fs";
import path from "node:path";
import crypto from "node:crypto";
import { KeyCopyError, errorMessage } from "./errors.js";
import { logger } from "./logger.js";
import type { EventSink } from "../types/index.js";

export const KEY_EXTENSION = ".bikey";

export interface KeyArtifact {
  sourcePath: string;
  contentIdentity: string;
}

export interface KeyReport {
  copied: string[];
  overwritten: string[];
  duplicates: string[];
  removedLinks: string[];
  errors: KeyCopyError[];
}

export function contentIdentity(file: string): string {
  return `sha256:${crypto.createHash("sha256").update(fs.readFileSync(file)).digest("hex")}`;
}

/** Finds key files anywhere below a mod directory, in a stable order. */
export function findKeyArtifacts(modDir: string): KeyArtifact[] {
  const found: KeyArtifact[] = [];
  const visit = (dir: string) => {
    const entries = fs.readdirSync(dir, { withFileTypes: true }).sort((a, b) => (a.name < b.name ? -1 : 1));
    for (const entry of entries) {
      const full = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        visit(full);
      } else if (entry.isFile() && entry.name.toLowerCase().endsWith(KEY_EXTENSION)) {
        found.push({ sourcePath: full, contentIdentity: contentIdentity(full) });
      }
    }
  };
  if (fs.existsSync(modDir)) visit(modDir);
  return found;
}

/** Removes symlinks in the key directory whose target is gone. */
export function pruneBrokenLinks(keysDir: string): string[] {
  const removed: string[] = [];
  for (const entry of fs.readdirSync(keysDir, { withFileTypes: true })) {
    const full = path.join(keysDir, entry.name);
    if (entry.isSymbolicLink() && !fs.existsSync(full)) {
      fs.unlinkSync(full);
      removed.push(entry.name);
    }
  }
  return removed;
}

function existingIdentities(keysDir: string): Map<string, string> {
  const identities = new Map<string, string>();
  for (const entry of fs.readdirSync(keysDir, { withFileTypes: true })) {
    const full = path.join(keysDir, entry.name);
    if (fs.existsSync(full) && fs.statSync(full).isFile()) {
      identities.set(contentIdentity(full), entry.name);
    }
  }
  return identities;
}

/**
 * Copies every mod's keys into the server key directory, in the order given.
 * Content already present under any name is skipped; a different file with
 * the same name is replaced. Keys that belong to no listed mod stay put.
 */
export function collectKeys(
  modDirs: string[],
  keysDir: string,
  onEvent: EventSink = logger.event,
): KeyReport {
  const report: KeyReport = { copied: [], overwritten: [], duplicates: [], removedLinks: [], errors: [] };

  fs.mkdirSync(keysDir, { recursive: true });
  report.removedLinks = pruneBrokenLinks(keysDir);
  for (const name of report.removedLinks) {
    onEvent({ stage: "keys", outcome: "removed", detail: `broken link ${name}` });
  }

  const identities = existingIdentities(keysDir);

  for (const modDir of modDirs) {
    const modId = path.basename(modDir);
    let artifacts: KeyArtifact[];
    try {
      artifacts = findKeyArtifacts(modDir);
    } catch (err) {
      const error = new KeyCopyError(modDir, errorMessage(err));
      report.errors.push(error);
      onEvent({ stage: "keys", modId, outcome: "failed", detail: error.message });
      continue;
    }

    for (const artifact of artifacts) {
      const name = path.basename(artifact.sourcePath);
      const dest = path.join(keysDir, name);

      const holder = identities.get(artifact.contentIdentity);
      if (holder !== undefined) {
        report.duplicates.push(name);
        onEvent({ stage: "keys", modId, outcome: "duplicate", detail: `${name} matches ${holder}` });
        continue;
      }

      try {
        const replacing = fs.existsSync(dest) || isLink(dest);
        if (replacing) {
          for (const [identity, holderName] of identities) {
            if (holderName === name) identities.delete(identity);
          }
          fs.rmSync(dest, { force: true });
        }
        fs.copyFileSync(artifact.sourcePath, dest);
        identities.set(artifact.contentIdentity, name);
        (replacing ? report.overwritten : report.copied).push(name);
        onEvent({ stage: "keys", modId, outcome: replacing ? "overwritten" : "copied", detail: name });
      } catch (err) {
        const error = new KeyCopyError(artifact.sourcePath, errorMessage(err));
        report.errors.push(error);
        onEvent({ stage: "keys", modId, outcome: "failed", detail: error.message });
      }
    }
  }

  return report;
}

function isLink(file: string): boolean {
  try {
    return fs.lstatSync(file).isSymbolicLink();
  } catch {
    return false;
  }
}
