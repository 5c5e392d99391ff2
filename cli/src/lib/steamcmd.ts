import fs from "node:fs";
import path from "node:path";
import { spawn } from "node:child_process";
import { createInterface } from "node:readline";
import { ConfigError } from "./errors.js";
import { logger } from "./logger.js";
import type { FetchResult, Fetcher, SyncConfig } from "../types/index.js";

/** Runs a command to completion and resolves with its exit status. */
export type CommandRunner = (command: string, args: string[]) => Promise<number | null>;

export const spawnRunner: CommandRunner = (command, args) =>
  new Promise((resolve, reject) => {
    const child = spawn(command, args, { stdio: ["ignore", "pipe", "pipe"] });

    for (const stream of [child.stdout, child.stderr]) {
      createInterface({ input: stream }).on("line", (line) => {
        if (line.trim()) logger.dim(line.trimEnd());
      });
    }

    child.on("error", (err: NodeJS.ErrnoException) => {
      if (err.code === "ENOENT" || err.code === "EACCES") {
        reject(new ConfigError(`Cannot run ${command}: ${err.message}`));
      } else {
        reject(err);
      }
    });
    child.on("close", (code) => resolve(code));
  });

function loginArgs(config: SyncConfig): string[] {
  const args = ["+force_install_dir", config.server.dir, "+login", config.steam.user];
  if (config.steam.password) args.push(config.steam.password);
  return args;
}

export function serverUpdateArgs(config: SyncConfig): string[] {
  const branch = config.server.dlc ? ["-beta", "creatordlc"] : [];
  return [...loginArgs(config), "+app_update", config.server.appId, ...branch, "validate", "+quit"];
}

export function modDownloadArgs(config: SyncConfig, modId: string): string[] {
  return [
    ...loginArgs(config),
    "+workshop_download_item",
    config.workshopAppId,
    modId,
    "validate",
    "+quit",
  ];
}

/**
 * Fetches workshop items through SteamCMD, one process per item.
 * SteamCMD can exit 0 without delivering anything, so a download only counts
 * once the item's directory exists.
 */
export class SteamCmdFetcher implements Fetcher {
  constructor(
    private readonly config: SyncConfig,
    private readonly run: CommandRunner = spawnRunner,
  ) {}

  async fetch(modId: string): Promise<FetchResult> {
    const exitCode = await this.run(this.config.steamcmd, modDownloadArgs(this.config, modId));
    if (exitCode !== 0) {
      return { ok: false, exitCode, reason: `steamcmd exited with ${exitCode ?? "a signal"}` };
    }
    if (!fs.existsSync(path.join(this.config.workshopDir, modId))) {
      return { ok: false, exitCode, reason: "no content delivered" };
    }
    return { ok: true };
  }
}

export async function updateServer(
  config: SyncConfig,
  run: CommandRunner = spawnRunner,
): Promise<boolean> {
  const exitCode = await run(config.steamcmd, serverUpdateArgs(config));
  return exitCode === 0;
}
