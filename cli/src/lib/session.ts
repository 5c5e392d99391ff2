import { loadConfig, resolveConfigPath } from "./config.js";
import { errorMessage, isSyncError } from "./errors.js";
import { logger } from "./logger.js";
import type { SyncConfig } from "../types/index.js";

export interface GlobalOptions {
  config?: string;
  debug?: boolean;
}

/** Loads settings once per invocation and starts the log file if enabled. */
export function openSession(options: GlobalOptions): SyncConfig {
  const config = loadConfig(resolveConfigPath(options.config));
  if (config.log.enabled) {
    const file = logger.attachFile(config.log.dir, config.log.name);
    logger.dim(`Logging to ${file}`);
  }
  return config;
}

/** Known failures print their message; anything else also gets its stack. */
export function exitWithError(err: unknown): never {
  logger.error(errorMessage(err));
  if (!isSyncError(err) && err instanceof Error && err.stack) logger.dim(err.stack);
  process.exit(1);
}
