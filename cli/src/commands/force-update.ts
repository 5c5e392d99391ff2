import { Command } from "commander";
import { runPipeline } from "./update.js";

export const forceUpdateCommand = new Command("force-update")
  .description("Re-download every mod in the manifest, installed or not")
  .option("-m, --manifest <file>", "Manifest file to use instead of prompting")
  .action(async (_options: unknown, command: Command) => {
    await runPipeline(command, "force");
  });
