import type {
  ClassificationRow,
  LocalModRecord,
  ModRequirement,
  PlanAction,
  PlanMode,
  UpdatePlan,
} from "../types/index.js";

export const DEFAULT_MAX_TRIES = 3;

export interface PlanOptions {
  mode: PlanMode;
  maxTries?: number;
  debug?: boolean;
}

function actionFor(mode: PlanMode, local: LocalModRecord | undefined): PlanAction {
  if (mode === "force") return "refresh";
  return local ? "skip" : "install";
}

/**
 * Diffs the manifest against what is on disk. Presence alone counts as up to
 * date in normal mode; the download tool decides what actually changed.
 */
export function planUpdates(
  requirements: ModRequirement[],
  local: Map<string, LocalModRecord>,
  options: PlanOptions,
): UpdatePlan {
  const maxTries = options.maxTries ?? DEFAULT_MAX_TRIES;
  if (!Number.isInteger(maxTries) || maxTries < 1) {
    throw new RangeError(`maxTries must be a positive integer, got ${maxTries}`);
  }

  const entries =
    options.mode === "keys-only"
      ? []
      : requirements.map((requirement) => ({
          requirement,
          action: actionFor(options.mode, local.get(requirement.id)),
          attemptsRemaining: maxTries,
        }));

  const plan: UpdatePlan = { mode: options.mode, entries };
  if (options.debug) {
    plan.diagnostics = classify(requirements, local, plan);
  }
  return plan;
}

function classify(
  requirements: ModRequirement[],
  local: Map<string, LocalModRecord>,
  plan: UpdatePlan,
): ClassificationRow[] {
  const actions = new Map(plan.entries.map((e): [string, PlanAction] => [e.requirement.id, e.action]));
  const required = new Set(requirements.map((r) => r.id));

  const rows = requirements.map((req): ClassificationRow => {
    const record = local.get(req.id);
    return {
      id: req.id,
      name: req.displayName,
      classification: !record ? "missing" : record.complete ? "installed" : "incomplete",
      action: actions.get(req.id) ?? "none",
    };
  });

  for (const record of local.values()) {
    if (required.has(record.id)) continue;
    rows.push({ id: record.id, name: "", classification: "unlisted", action: "none" });
  }
  return rows;
}
