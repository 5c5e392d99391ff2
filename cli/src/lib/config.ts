import fs from "node:fs";
import path from "node:path";
import { parse } from "yaml";
import { z } from "zod/v4";
import { ConfigError, errorMessage } from "./errors.js";
import { DEFAULT_MAX_TRIES } from "./planner.js";
import type { SyncConfig } from "../types/index.js";

const DEFAULT_CONFIG_FILE = "a3modsync.yaml";

const idString = z
  .union([z.string().regex(/^\d+$/, "must be a numeric id"), z.number().int().nonnegative()])
  .transform((value) => String(value));

const settingsSchema = z.object({
  steamcmd: z.string().min(1),
  steam: z.object({
    user: z.string().min(1),
    password: z.string().default(""),
  }),
  server: z.object({
    app_id: idString.default("233780"),
    dir: z.string().min(1),
    dlc: z.boolean().default(false),
  }),
  workshop_app_id: idString.default("107410"),
  manifest_dir: z.string().min(1),
  mods_dir: z.string().min(1),
  keys_dir: z.string().min(1).optional(),
  max_tries: z.number().int().positive().default(DEFAULT_MAX_TRIES),
  launch_params_file: z.string().min(1).default("ModsParam.txt"),
  failed_mods_file: z.string().min(1).default("failed-mods.yaml"),
  log: z
    .object({
      enabled: z.boolean().default(false),
      dir: z.string().min(1).default("logs"),
      name: z.string().min(1).default("a3modsync"),
    })
    .default({ enabled: false, dir: "logs", name: "a3modsync" }),
});

export type RawSettings = z.input<typeof settingsSchema>;

export function resolveConfigPath(option?: string, cwd: string = process.cwd()): string {
  const chosen = option ?? process.env["A3MODSYNC_CONFIG"] ?? DEFAULT_CONFIG_FILE;
  return path.resolve(cwd, chosen);
}

export function workshopContentDir(serverDir: string, workshopAppId: string): string {
  return path.join(serverDir, "steamapps", "workshop", "content", workshopAppId);
}

/**
 * Validates raw settings and resolves every path against the settings file's directory.
 */
export function buildConfig(data: unknown, configPath: string): SyncConfig {
  const result = settingsSchema.safeParse(data ?? {});
  if (!result.success) {
    const issues = result.error.issues.map((issue) => {
      const key = issue.path.map(String).join(".") || "(root)";
      return `${key}: ${issue.message}`;
    });
    throw new ConfigError(`Invalid settings in ${configPath}`, issues);
  }

  const settings = result.data;
  const baseDir = path.dirname(configPath);
  const resolve = (p: string) => path.resolve(baseDir, p);
  const serverDir = resolve(settings.server.dir);

  return {
    configPath,
    steamcmd: resolve(settings.steamcmd),
    steam: {
      user: settings.steam.user,
      password: process.env["A3MODSYNC_STEAM_PASSWORD"] ?? settings.steam.password,
    },
    server: {
      appId: settings.server.app_id,
      dir: serverDir,
      dlc: settings.server.dlc,
    },
    workshopAppId: settings.workshop_app_id,
    workshopDir: workshopContentDir(serverDir, settings.workshop_app_id),
    manifestDir: resolve(settings.manifest_dir),
    modsDir: resolve(settings.mods_dir),
    keysDir: settings.keys_dir ? resolve(settings.keys_dir) : path.join(serverDir, "keys"),
    maxTries: settings.max_tries,
    launchParamsFile: resolve(settings.launch_params_file),
    failedModsFile: resolve(settings.failed_mods_file),
    log: {
      enabled: settings.log.enabled,
      dir: resolve(settings.log.dir),
      name: settings.log.name,
    },
  };
}

export function loadConfig(configPath: string): SyncConfig {
  let raw: string;
  try {
    raw = fs.readFileSync(configPath, "utf-8");
  } catch {
    throw new ConfigError(`Settings file not found: ${configPath}`);
  }

  let data: unknown;
  try {
    data = parse(raw);
  } catch (err) {
    throw new ConfigError(`Invalid YAML in ${configPath}: ${errorMessage(err)}`);
  }
  return buildConfig(data, configPath);
}

/** Fails before any download stage when the download tool is not on disk. */
export function assertSteamCmd(config: SyncConfig): void {
  if (!fs.existsSync(config.steamcmd)) {
    throw new ConfigError(`SteamCMD not found at ${config.steamcmd}`);
  }
}
