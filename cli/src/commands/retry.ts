import { Command } from "commander";
import { assertSteamCmd } from "../lib/config.js";
import { logger } from "../lib/logger.js";
import { exitWithError, openSession, type GlobalOptions } from "../lib/session.js";
import { retryFailedMods } from "../lib/sync.js";

export const retryCommand = new Command("retry")
  .description("Download the mods that failed in the last run again")
  .action(async (_options: unknown, command: Command) => {
    try {
      const config = openSession(command.optsWithGlobals<GlobalOptions>());
      assertSteamCmd(config);

      const result = await retryFailedMods(config);
      if (!result) {
        logger.info("No failed mods recorded. Nothing to retry.");
        return;
      }

      const { downloads } = result;
      for (const failure of downloads.failed) logger.warn(failure.message);
      if (downloads.failed.length === 0) {
        logger.success(`Recovered ${downloads.refreshed.length} mods`);
      } else {
        logger.warn(`${downloads.failed.length} mods still failing`);
      }
    } catch (err) {
      exitWithError(err);
    }
  });
