import { Command } from "commander";
import { runPipeline } from "./update.js";

export const serverUpdateCommand = new Command("server-update")
  .description("Update the dedicated server, then run a full mod update")
  .option("-m, --manifest <file>", "Manifest file to use instead of prompting")
  .action(async (_options: unknown, command: Command) => {
    await runPipeline(command, "normal", true);
  });
