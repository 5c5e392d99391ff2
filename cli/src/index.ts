#!/usr/bin/env node
import { Command } from "commander";
import { updateCommand } from "./commands/update.js";
import { serverUpdateCommand } from "./commands/server-update.js";
import { forceUpdateCommand } from "./commands/force-update.js";
import { launchOptionsCommand } from "./commands/launch-options.js";
import { clearCommand } from "./commands/clear.js";
import { clearAllCommand } from "./commands/clear-all.js";
import { lowercaseCommand } from "./commands/lowercase.js";
import { linkCommand } from "./commands/link.js";
import { retryCommand } from "./commands/retry.js";

const program = new Command();

program
  .name("a3modsync")
  .description("Keep an Arma 3 dedicated server and its workshop mods in sync with launcher presets.")
  .version("1.0.0")
  .option("-c, --config <path>", "Settings file (default: ./a3modsync.yaml)")
  .option("--debug", "Print how every mod was classified before downloading");

program.addCommand(serverUpdateCommand);
program.addCommand(updateCommand);
program.addCommand(forceUpdateCommand);
program.addCommand(launchOptionsCommand);
program.addCommand(clearCommand);
program.addCommand(clearAllCommand);
program.addCommand(lowercaseCommand);
program.addCommand(linkCommand);
program.addCommand(retryCommand);

await program.parseAsync();
