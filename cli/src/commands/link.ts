import { Command } from "commander";
import { linkMods } from "../lib/links.js";
import { logger } from "../lib/logger.js";
import { loadManifest } from "../lib/manifest.js";
import { isInteractive, promptForManifest } from "../lib/prompts.js";
import { exitWithError, openSession, type GlobalOptions } from "../lib/session.js";

export const linkCommand = new Command("link")
  .description("Create the @mod links for every installed mod in a manifest")
  .option("-m, --manifest <file>", "Manifest file to use instead of prompting")
  .action(async (_options: unknown, command: Command) => {
    try {
      const options = command.optsWithGlobals<GlobalOptions & { manifest?: string }>();
      const config = openSession(options);
      const { requirements } = await loadManifest(config.manifestDir, {
        preferred: options.manifest,
        choose: isInteractive() ? promptForManifest : undefined,
      });

      const report = linkMods(requirements, config.workshopDir, config.modsDir);
      for (const message of report.failures) logger.warn(message);
      if (report.created.length === 0) {
        logger.info("No links were created.");
      } else {
        logger.success(`Created ${report.created.length} links`);
      }
    } catch (err) {
      exitWithError(err);
    }
  });
