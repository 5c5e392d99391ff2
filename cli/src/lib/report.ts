import { logger } from "./logger.js";
import type { SyncReport } from "./sync.js";
import type { ClassificationRow } from "../types/index.js";

export function printDiagnostics(rows: ClassificationRow[]): void {
  logger.blank();
  logger.bold("Mod classification");
  logger.table(
    ["id", "name", "state", "action"],
    rows.map((row) => [row.id, row.name, row.classification, row.action]),
  );
}

function outcomeRows(report: SyncReport): string[][] {
  const failed = new Set(report.failed.map((f) => f.modId));
  const outcome = (id: string): string => {
    if (report.installed.includes(id)) return "installed";
    if (report.refreshed.includes(id)) return "refreshed";
    if (report.skipped.includes(id)) return "skipped";
    if (failed.has(id)) return "failed";
    return "-";
  };
  return report.requirements.map((req) => [req.id, req.displayName, outcome(req.id)]);
}

/** Prints the end-of-run summary: mod outcomes, then every recorded problem. */
export function printSyncReport(report: SyncReport): void {
  if (report.plan.diagnostics) printDiagnostics(report.plan.diagnostics);

  logger.blank();
  if (report.requirements.length > 0) {
    logger.table(["id", "name", "result"], outcomeRows(report));
    logger.blank();
  }

  logger.info(
    `${report.installed.length} installed, ${report.refreshed.length} refreshed, ` +
      `${report.skipped.length} skipped, ${report.failed.length} failed`,
  );
  logger.info(
    `Keys: ${report.keys.copied.length} copied, ${report.keys.overwritten.length} replaced, ` +
      `${report.keys.duplicates.length} duplicates`,
  );

  if (report.serverUpdate === "failed") logger.warn("Server update failed");
  for (const failure of report.failed) logger.warn(failure.message);
  for (const collision of report.normalize.collisions) logger.warn(collision.message);
  for (const message of report.normalize.failures) logger.warn(message);
  for (const message of report.links.failures) logger.warn(message);
  for (const error of report.keys.errors) logger.warn(error.message);

  logger.blank();
  logger.dim(report.launch.value || "(no mods installed)");
  logger.blank();

  if (report.status === "clean") {
    logger.success("Sync complete");
  } else {
    logger.warn("Sync finished with problems, see above");
  }
}
