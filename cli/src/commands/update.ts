import { Command } from "commander";
import { assertSteamCmd } from "../lib/config.js";
import { logger } from "../lib/logger.js";
import { isInteractive, promptForManifest } from "../lib/prompts.js";
import { printSyncReport } from "../lib/report.js";
import { exitWithError, openSession, type GlobalOptions } from "../lib/session.js";
import { runSync } from "../lib/sync.js";
import type { PlanMode } from "../types/index.js";

interface PipelineOptions extends GlobalOptions {
  manifest?: string;
}

export async function runPipeline(
  command: Command,
  mode: PlanMode,
  serverUpdate = false,
): Promise<void> {
  try {
    const options = command.optsWithGlobals<PipelineOptions>();
    const config = openSession(options);
    if (mode !== "keys-only") assertSteamCmd(config);

    logger.blank();
    const report = await runSync(config, {
      mode,
      serverUpdate,
      debug: options.debug,
      manifest: options.manifest,
      choose: isInteractive() ? promptForManifest : undefined,
    });
    printSyncReport(report);
  } catch (err) {
    exitWithError(err);
  }
}

export const updateCommand = new Command("update")
  .description("Install missing mods, then refresh links, keys and launch parameters")
  .option("-m, --manifest <file>", "Manifest file to use instead of prompting")
  .action(async (_options: unknown, command: Command) => {
    await runPipeline(command, "normal");
  });
