import { Command } from "commander";
import { logger } from "../lib/logger.js";
import { normalizeNames } from "../lib/normalizer.js";
import { exitWithError, openSession, type GlobalOptions } from "../lib/session.js";

export const lowercaseCommand = new Command("lowercase")
  .description("Lowercase every file and folder name in the workshop directory")
  .action((_options: unknown, command: Command) => {
    try {
      const config = openSession(command.optsWithGlobals<GlobalOptions>());
      const report = normalizeNames(config.workshopDir);

      for (const collision of report.collisions) logger.warn(collision.message);
      for (const message of report.failures) logger.warn(message);
      if (report.collisions.length + report.failures.length === 0) {
        logger.success(`Renamed ${report.renamed.length} entries`);
      }
    } catch (err) {
      exitWithError(err);
    }
  });
