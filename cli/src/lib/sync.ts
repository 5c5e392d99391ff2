import fs from "node:fs";
import path from "node:path";
import { EmptyManifestError, NoManifestError, type DownloadFailure } from "./errors.js";
import { logger } from "./logger.js";
import { loadManifest } from "./manifest.js";
import { inspectMods } from "./inspector.js";
import { planUpdates } from "./planner.js";
import { runDownloads, type DownloadReport } from "./downloader.js";
import { SteamCmdFetcher, updateServer, type CommandRunner } from "./steamcmd.js";
import { normalizeNames, type NormalizeReport } from "./normalizer.js";
import { linkMods, type LinkReport } from "./links.js";
import { collectKeys, type KeyReport } from "./keys.js";
import {
  buildLaunchParameters,
  writeLaunchParameters,
  type LaunchParameterSet,
} from "./launch-params.js";
import { readFailedMods, writeFailedMods } from "./failed-mods.js";
import type {
  EventSink,
  Fetcher,
  ManifestChooser,
  ModRequirement,
  PlanMode,
  SyncConfig,
  UpdatePlan,
} from "../types/index.js";

export interface SyncOptions {
  mode: PlanMode;
  serverUpdate?: boolean;
  debug?: boolean;
  /** Manifest file picked on the command line. */
  manifest?: string;
  choose?: ManifestChooser;
  fetcher?: Fetcher;
  runner?: CommandRunner;
  platform?: NodeJS.Platform;
  onEvent?: EventSink;
}

export interface SyncReport {
  status: "clean" | "partial";
  manifest: string | null;
  requirements: ModRequirement[];
  plan: UpdatePlan;
  serverUpdate: "ok" | "failed" | null;
  installed: string[];
  refreshed: string[];
  skipped: string[];
  failed: DownloadFailure[];
  normalize: NormalizeReport;
  links: LinkReport;
  keys: KeyReport;
  launch: LaunchParameterSet;
}

async function resolveRequirements(
  config: SyncConfig,
  options: SyncOptions,
  onEvent: EventSink,
): Promise<{ manifest: string | null; requirements: ModRequirement[] | null }> {
  try {
    const loaded = await loadManifest(config.manifestDir, {
      preferred: options.manifest,
      choose: options.choose,
    });
    onEvent({
      stage: "manifest",
      outcome: "loaded",
      detail: `${loaded.file.name}, ${loaded.requirements.length} mods`,
    });
    return { manifest: loaded.file.name, requirements: loaded.requirements };
  } catch (err) {
    // Launch options only need a manifest for ordering and link names.
    if (options.mode === "keys-only" && (err instanceof NoManifestError || err instanceof EmptyManifestError)) {
      onEvent({ stage: "manifest", outcome: "skipped", detail: err.message });
      return { manifest: null, requirements: null };
    }
    throw err;
  }
}

function installedModDirs(workshopDir: string, requirements: ModRequirement[] | null): string[] {
  if (!requirements) {
    return [...inspectMods(workshopDir).values()].map((record) => record.path);
  }
  return requirements
    .map((req) => path.join(workshopDir, req.id))
    .filter((dir) => fs.existsSync(dir));
}

/**
 * Runs the whole synchronization: manifest, plan, downloads, then the
 * on-disk passes (lowercase, links, keys, launch parameters).
 * Per-mod problems end up in the report; only setup errors throw.
 */
export async function runSync(config: SyncConfig, options: SyncOptions): Promise<SyncReport> {
  const onEvent = options.onEvent ?? logger.event;

  const { manifest, requirements } = await resolveRequirements(config, options, onEvent);

  let serverUpdate: SyncReport["serverUpdate"] = null;
  if (options.serverUpdate) {
    onEvent({ stage: "server", modId: config.server.appId, outcome: "updating" });
    serverUpdate = (await updateServer(config, options.runner)) ? "ok" : "failed";
    onEvent({ stage: "server", modId: config.server.appId, outcome: serverUpdate === "ok" ? "done" : "failed" });
  }

  const local = inspectMods(config.workshopDir);
  const plan = planUpdates(requirements ?? [], local, {
    mode: options.mode,
    maxTries: config.maxTries,
    debug: options.debug,
  });
  const actionable = plan.entries.filter((e) => e.action !== "skip").length;
  onEvent({ stage: "plan", outcome: options.mode, detail: `${actionable} to download, ${plan.entries.length - actionable} up to date` });

  let downloads: DownloadReport = { installed: [], refreshed: [], skipped: [], failed: [] };
  if (plan.entries.length > 0) {
    const fetcher = options.fetcher ?? new SteamCmdFetcher(config, options.runner);
    downloads = await runDownloads(plan.entries, fetcher, onEvent);
    writeFailedMods(
      config.failedModsFile,
      downloads.failed.map((f) => ({ id: f.modId, displayName: f.displayName })),
    );
  }

  const normalize = normalizeNames(config.workshopDir, onEvent);
  const links: LinkReport = requirements
    ? linkMods(requirements, config.workshopDir, config.modsDir, onEvent)
    : { created: [], existing: [], missing: [], failures: [] };
  const keys = collectKeys(installedModDirs(config.workshopDir, requirements), config.keysDir, onEvent);

  const launch = buildLaunchParameters({
    serverDir: config.server.dir,
    workshopDir: config.workshopDir,
    modsDir: config.modsDir,
    order: requirements ?? undefined,
    platform: options.platform,
  });
  writeLaunchParameters(config.launchParamsFile, launch);
  onEvent({ stage: "launch", outcome: "written", detail: `${launch.tokens.length} mods to ${config.launchParamsFile}` });

  const problems =
    downloads.failed.length +
    normalize.collisions.length +
    normalize.failures.length +
    links.failures.length +
    keys.errors.length +
    (serverUpdate === "failed" ? 1 : 0);

  return {
    status: problems > 0 ? "partial" : "clean",
    manifest,
    requirements: requirements ?? [],
    plan,
    serverUpdate,
    installed: downloads.installed,
    refreshed: downloads.refreshed,
    skipped: downloads.skipped,
    failed: downloads.failed,
    normalize,
    links,
    keys,
    launch,
  };
}

export interface RetryOptions {
  fetcher?: Fetcher;
  runner?: CommandRunner;
  onEvent?: EventSink;
}

/**
 * Downloads the mods recorded as failed by the last run again. Returns null
 * when nothing is recorded.
 */
export async function retryFailedMods(
  config: SyncConfig,
  options: RetryOptions = {},
): Promise<{ downloads: DownloadReport; normalize: NormalizeReport } | null> {
  const onEvent = options.onEvent ?? logger.event;
  const failed = readFailedMods(config.failedModsFile);
  if (failed.length === 0) return null;

  const plan = planUpdates(failed, new Map(), { mode: "force", maxTries: config.maxTries });
  const fetcher = options.fetcher ?? new SteamCmdFetcher(config, options.runner);
  const downloads = await runDownloads(plan.entries, fetcher, onEvent);
  writeFailedMods(
    config.failedModsFile,
    downloads.failed.map((f) => ({ id: f.modId, displayName: f.displayName })),
  );
  return { downloads, normalize: normalizeNames(config.workshopDir, onEvent) };
}
