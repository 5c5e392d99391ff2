import fs from "node:fs";
import path from "node:path";
import { EmptyManifestError, ManifestSelectionError, NoManifestError } from "./errors.js";
import type { ManifestCandidate, ManifestChooser, ModRequirement } from "../types/index.js";

const MOD_ROW_REGEX = /<tr\b[^>]*data-type=["']ModContainer["'][^>]*>([\s\S]*?)<\/tr>/gi;
const DISPLAY_NAME_REGEX = /<td\b[^>]*data-type=["']DisplayName["'][^>]*>([\s\S]*?)<\/td>/i;
const ANCHOR_REGEX = /<a\b([^>]*)>([\s\S]*?)<\/a>/gi;
const HREF_REGEX = /href\s*=\s*["']([^"']*)["']/i;
const WORKSHOP_ID_REGEX = /filedetails\/?\?(?:[^"'#]*&(?:amp;)?)?id=(\d+)/i;

const ENTITIES: Record<string, string> = {
  amp: "&",
  lt: "<",
  gt: ">",
  quot: '"',
  apos: "'",
  nbsp: " ",
};

const MAX_CODE_POINT = 0x10ffff;

export function decodeEntities(text: string): string {
  return text.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (whole, entity: string) => {
    if (entity.startsWith("#")) {
      const hex = entity[1] === "x" || entity[1] === "X";
      const code = parseInt(entity.slice(hex ? 2 : 1), hex ? 16 : 10);
      // Out-of-range references stay as written.
      return code <= MAX_CODE_POINT ? String.fromCodePoint(code) : whole;
    }
    return ENTITIES[entity.toLowerCase()] ?? whole;
  });
}

function textContent(markup: string): string {
  return decodeEntities(markup.replace(/<[^>]*>/g, "")).replace(/\s+/g, " ").trim();
}

/**
 * Returns the workshop id a link points at, or null for any other target.
 */
export function workshopIdFromHref(href: string): string | null {
  const match = decodeEntities(href).match(WORKSHOP_ID_REGEX);
  return match?.[1] ?? null;
}

function anchors(markup: string): { id: string; text: string }[] {
  const found: { id: string; text: string }[] = [];
  for (const match of markup.matchAll(ANCHOR_REGEX)) {
    const href = (match[1] ?? "").match(HREF_REGEX)?.[1];
    const id = href ? workshopIdFromHref(href) : null;
    if (id) found.push({ id, text: textContent(match[2] ?? "") });
  }
  return found;
}

/**
 * Extracts workshop references from preset markup, in document order.
 * Launcher presets list one mod per `ModContainer` row; any other page falls
 * back to plain workshop links. The first occurrence of an id wins.
 */
export function extractModReferences(markup: string): ModRequirement[] {
  const references: ModRequirement[] = [];

  const rows = [...markup.matchAll(MOD_ROW_REGEX)];
  if (rows.length > 0) {
    for (const row of rows) {
      const body = row[1] ?? "";
      const link = anchors(body)[0];
      if (!link) continue;
      const nameCell = body.match(DISPLAY_NAME_REGEX)?.[1];
      const displayName = nameCell !== undefined ? textContent(nameCell) : link.text;
      references.push({ id: link.id, displayName: displayName || link.id });
    }
  } else {
    for (const link of anchors(markup)) {
      references.push({ id: link.id, displayName: link.text || link.id });
    }
  }

  const seen = new Set<string>();
  return references.filter((ref) => {
    if (seen.has(ref.id)) return false;
    seen.add(ref.id);
    return true;
  });
}

/**
 * Turns a display name into the `@folder` name used for mod links,
 * e.g. "Enhanced Movement (Rework)" -> "@enhanced_movement_rework".
 */
export function modFolderName(displayName: string): string {
  const cleaned = displayName
    .replace(/[!#$%^&*()[\]{};:,./<>?\\|`~='+\-]/g, "")
    .toLowerCase()
    .trim()
    .replace(/\s+/g, "_")
    .replace(/_+/g, "_");
  return `@${cleaned}`;
}

// ── Manifest files ──

/** Lists HTML manifests, newest first. */
export function listManifests(dir: string): ManifestCandidate[] {
  let entries: fs.Dirent[];
  try {
    entries = fs.readdirSync(dir, { withFileTypes: true });
  } catch {
    return [];
  }

  return entries
    .filter((entry) => entry.isFile() && /\.html?$/i.test(entry.name))
    .map((entry) => {
      const fullPath = path.join(dir, entry.name);
      return { name: entry.name, path: fullPath, modifiedAt: fs.statSync(fullPath).mtime };
    })
    .sort((a, b) => b.modifiedAt.getTime() - a.modifiedAt.getTime() || a.name.localeCompare(b.name));
}

export interface SelectManifestOptions {
  /** File name (or path) chosen up front, bypassing the prompt. */
  preferred?: string;
  choose?: ManifestChooser;
}

export async function selectManifest(
  dir: string,
  options: SelectManifestOptions = {},
): Promise<ManifestCandidate> {
  const candidates = listManifests(dir);
  if (candidates.length === 0) {
    throw new NoManifestError(dir);
  }

  if (options.preferred) {
    const wanted = path.basename(options.preferred);
    const match = candidates.find((c) => c.name === wanted);
    if (!match) {
      throw new ManifestSelectionError(`Manifest "${wanted}" not found in ${dir}`);
    }
    return match;
  }

  const [only] = candidates;
  if (only && candidates.length === 1) {
    return only;
  }

  if (!options.choose) {
    throw new ManifestSelectionError(
      `Found ${candidates.length} manifests in ${dir}. Pick one with --manifest <file>.`,
    );
  }

  const chosen = await options.choose(candidates);
  if (!candidates.some((c) => c.path === chosen.path)) {
    throw new ManifestSelectionError(`Invalid manifest choice: ${chosen.name}`);
  }
  return chosen;
}

export function readManifest(file: string): ModRequirement[] {
  const markup = fs.readFileSync(file, "utf-8");
  const requirements = extractModReferences(markup);
  if (requirements.length === 0) {
    throw new EmptyManifestError(file);
  }
  return requirements;
}

export interface LoadedManifest {
  file: ManifestCandidate;
  requirements: ModRequirement[];
}

export async function loadManifest(
  dir: string,
  options: SelectManifestOptions = {},
): Promise<LoadedManifest> {
  const file = await selectManifest(dir, options);
  return { file, requirements: readManifest(file.path) };
}
