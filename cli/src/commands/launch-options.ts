import { Command } from "commander";
import { runPipeline } from "./update.js";

export const launchOptionsCommand = new Command("launch-options")
  .description("Copy keys and write launch parameters for the mods already on disk")
  .option("-m, --manifest <file>", "Manifest file used for ordering")
  .action(async (_options: unknown, command: Command) => {
    await runPipeline(command, "keys-only");
  });
