import fs from "node:fs";
import { parse, stringify } from "yaml";
import { z } from "zod/v4";
import { logger } from "./logger.js";
import { errorMessage } from "./errors.js";
import type { FailedModsFile, ModRequirement } from "../types/index.js";

const entrySchema = z.object({
  id: z.union([z.string().regex(/^\d+$/), z.number().int().nonnegative()]).transform(String),
  name: z.string().optional(),
});

const fileSchema = z.object({ mods: z.array(z.unknown()).default([]) });

/** Mods recorded by the last run; entries without a usable id are dropped. */
export function readFailedMods(file: string): ModRequirement[] {
  if (!fs.existsSync(file)) return [];

  let data: unknown;
  try {
    data = parse(fs.readFileSync(file, "utf-8"));
  } catch (err) {
    logger.warn(`Ignoring unreadable ${file}: ${errorMessage(err)}`);
    return [];
  }

  const parsed = fileSchema.safeParse(data ?? {});
  if (!parsed.success) {
    logger.warn(`Ignoring ${file}: no mod list`);
    return [];
  }

  const mods: ModRequirement[] = [];
  for (const raw of parsed.data.mods) {
    const entry = entrySchema.safeParse(raw);
    if (entry.success) {
      mods.push({ id: entry.data.id, displayName: entry.data.name || entry.data.id });
    }
  }
  return mods;
}

/** Records permanently failed mods; an empty list removes the file. */
export function writeFailedMods(file: string, mods: ModRequirement[]): void {
  if (mods.length === 0) {
    fs.rmSync(file, { force: true });
    return;
  }
  const data: FailedModsFile = {
    recorded_at: new Date().toISOString(),
    mods: mods.map((mod) => ({ id: mod.id, name: mod.displayName })),
  };
  fs.writeFileSync(file, stringify(data), "utf-8");
}
