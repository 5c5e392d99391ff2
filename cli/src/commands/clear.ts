import { Command } from "commander";
import { clearMods } from "../lib/clear.js";
import { logger } from "../lib/logger.js";
import { loadManifest } from "../lib/manifest.js";
import { isInteractive, promptForManifest } from "../lib/prompts.js";
import { exitWithError, openSession, type GlobalOptions } from "../lib/session.js";

export const clearCommand = new Command("clear")
  .description("Delete the mods listed in one manifest")
  .option("-m, --manifest <file>", "Manifest file to use instead of prompting")
  .action(async (_options: unknown, command: Command) => {
    try {
      const options = command.optsWithGlobals<GlobalOptions & { manifest?: string }>();
      const config = openSession(options);
      const { file, requirements } = await loadManifest(config.manifestDir, {
        preferred: options.manifest,
        choose: isInteractive() ? promptForManifest : undefined,
      });

      const removed = clearMods(requirements, config);
      logger.success(`Removed ${removed.length} of ${requirements.length} mods listed in ${file.name}`);
    } catch (err) {
      exitWithError(err);
    }
  });
