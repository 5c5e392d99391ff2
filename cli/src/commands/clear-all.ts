import { Command } from "commander";
import { clearAllMods } from "../lib/clear.js";
import { SyncError } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import { confirmAction, isInteractive } from "../lib/prompts.js";
import { exitWithError, openSession, type GlobalOptions } from "../lib/session.js";

export const clearAllCommand = new Command("clear-all")
  .description("Delete all workshop content and mod links")
  .option("-y, --yes", "Skip the confirmation prompt")
  .action(async (_options: unknown, command: Command) => {
    try {
      const options = command.optsWithGlobals<GlobalOptions & { yes?: boolean }>();
      const config = openSession(options);

      if (!options.yes) {
        if (!isInteractive()) {
          throw new SyncError("confirmation-required", "clear-all deletes every mod; pass --yes to run it unattended");
        }
        const confirmed = await confirmAction(`Delete everything in ${config.workshopDir} and ${config.modsDir}?`);
        if (!confirmed) {
          logger.info("Nothing deleted.");
          return;
        }
      }

      const removed = clearAllMods(config);
      logger.success(`Removed ${removed} entries`);
    } catch (err) {
      exitWithError(err);
    }
  });
