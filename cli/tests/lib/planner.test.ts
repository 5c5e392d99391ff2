import { describe, it, expect } from "vitest";
import { planUpdates } from "../../src/lib/planner.js";
import type { LocalModRecord, ModRequirement } from "../../src/types/index.js";

const required: ModRequirement[] = [
  { id: "101", displayName: "Alpha" },
  { id: "102", displayName: "Bravo" },
  { id: "103", displayName: "Charlie" },
];

function record(id: string, complete = true): LocalModRecord {
  return { id, path: `/mods/${id}`, normalized: true, complete, lastCheckedMarker: 0 };
}

function localOf(...records: LocalModRecord[]): Map<string, LocalModRecord> {
  return new Map(records.map((r): [string, LocalModRecord] => [r.id, r]));
}

describe("planUpdates — normal mode", () => {
  it("installs missing mods and skips present ones", () => {
    const plan = planUpdates(required, localOf(record("102")), { mode: "normal" });
    expect(plan.entries.map((e) => [e.requirement.id, e.action])).toEqual([
      ["101", "install"],
      ["102", "skip"],
      ["103", "install"],
    ]);
  });

  it("treats an incomplete mod as present", () => {
    const plan = planUpdates(required.slice(0, 1), localOf(record("101", false)), { mode: "normal" });
    expect(plan.entries[0]?.action).toBe("skip");
  });
});

describe("planUpdates — force mode", () => {
  it("refreshes every required mod regardless of local state", () => {
    const plan = planUpdates(required, localOf(record("101"), record("103")), { mode: "force" });
    expect(plan.entries.map((e) => e.action)).toEqual(["refresh", "refresh", "refresh"]);
  });
});

describe("planUpdates — keys-only mode", () => {
  it("produces an empty plan", () => {
    const plan = planUpdates(required, localOf(), { mode: "keys-only" });
    expect(plan.entries).toEqual([]);
    expect(plan.mode).toBe("keys-only");
  });
});

describe("planUpdates — retry budget", () => {
  it("defaults to three attempts", () => {
    const plan = planUpdates(required, localOf(), { mode: "normal" });
    expect(plan.entries.every((e) => e.attemptsRemaining === 3)).toBe(true);
  });

  it("uses the configured budget", () => {
    const plan = planUpdates(required, localOf(), { mode: "normal", maxTries: 5 });
    expect(plan.entries[0]?.attemptsRemaining).toBe(5);
  });

  it("rejects a budget below one", () => {
    expect(() => planUpdates(required, localOf(), { mode: "normal", maxTries: 0 })).toThrow(RangeError);
  });
});

describe("planUpdates — debug", () => {
  it("classifies required and unlisted mods without changing the plan", () => {
    const local = localOf(record("101"), record("102", false), record("999"));
    const quiet = planUpdates(required, local, { mode: "normal" });
    const debug = planUpdates(required, local, { mode: "normal", debug: true });

    expect(debug.entries).toEqual(quiet.entries);
    expect(quiet.diagnostics).toBeUndefined();
    expect(debug.diagnostics).toEqual([
      { id: "101", name: "Alpha", classification: "installed", action: "skip" },
      { id: "102", name: "Bravo", classification: "incomplete", action: "skip" },
      { id: "103", name: "Charlie", classification: "missing", action: "install" },
      { id: "999", name: "", classification: "unlisted", action: "none" },
    ]);
  });
});
