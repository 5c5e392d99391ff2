import { ConfigError, DownloadFailure } from "./errors.js";
import { logger } from "./logger.js";
import type { EventSink, FetchResult, Fetcher, UpdatePlanEntry } from "../types/index.js";

export interface DownloadReport {
  installed: string[];
  refreshed: string[];
  skipped: string[];
  failed: DownloadFailure[];
}

/**
 * Works through the plan one mod at a time. A mod is retried until its
 * attempts run out; an exhausted mod is recorded and the run moves on.
 */
export async function runDownloads(
  entries: UpdatePlanEntry[],
  fetcher: Fetcher,
  onEvent: EventSink = logger.event,
): Promise<DownloadReport> {
  const report: DownloadReport = { installed: [], refreshed: [], skipped: [], failed: [] };

  for (const entry of entries) {
    const { id, displayName } = entry.requirement;

    if (entry.action === "skip") {
      report.skipped.push(id);
      onEvent({ stage: "download", modId: id, outcome: "skipped", detail: displayName });
      continue;
    }

    let attempts = 0;
    let done = false;
    while (!done && entry.attemptsRemaining > 0) {
      attempts++;
      onEvent({ stage: "download", modId: id, outcome: entry.action, detail: `${displayName}, try ${attempts}` });

      let result: FetchResult;
      try {
        result = await fetcher.fetch(id);
      } catch (err) {
        // A missing tool fails every mod the same way; stop the run instead.
        if (err instanceof ConfigError || !(err instanceof Error)) throw err;
        result = { ok: false, exitCode: null, reason: err.message };
      }
      entry.attemptsRemaining--;

      if (result.ok) {
        done = true;
        (entry.action === "install" ? report.installed : report.refreshed).push(id);
        onEvent({ stage: "download", modId: id, outcome: "done", detail: displayName });
      } else if (entry.attemptsRemaining > 0) {
        onEvent({ stage: "download", modId: id, outcome: "retry", detail: result.reason });
      } else {
        report.failed.push(new DownloadFailure(id, displayName, attempts, result.exitCode, result.reason));
        onEvent({ stage: "download", modId: id, outcome: "failed", detail: `${attempts} tries, ${result.reason}` });
      }
    }
  }

  return report;
}
