// ── Settings (a3modsync.yaml) ──

export interface LogSettings {
  enabled: boolean;
  dir: string;
  name: string;
}

export interface SyncConfig {
  configPath: string;
  steamcmd: string;
  steam: {
    user: string;
    password: string;
  };
  server: {
    appId: string;
    dir: string;
    dlc: boolean;
  };
  workshopAppId: string;
  workshopDir: string;
  manifestDir: string;
  modsDir: string;
  keysDir: string;
  maxTries: number;
  launchParamsFile: string;
  failedModsFile: string;
  log: LogSettings;
}

// ── Manifests ──

export interface ModRequirement {
  readonly id: string;
  readonly displayName: string;
}

export interface ManifestCandidate {
  name: string;
  path: string;
  modifiedAt: Date;
}

export type ManifestChooser = (candidates: ManifestCandidate[]) => Promise<ManifestCandidate>;

// ── Local state ──

export interface LocalModRecord {
  id: string;
  path: string;
  normalized: boolean;
  complete: boolean;
  lastCheckedMarker: number;
}

// ── Planning ──

export type PlanMode = "normal" | "force" | "keys-only";
export type PlanAction = "install" | "refresh" | "skip";

export interface UpdatePlanEntry {
  requirement: ModRequirement;
  action: PlanAction;
  attemptsRemaining: number;
}

export type Classification = "missing" | "installed" | "incomplete" | "unlisted";

export interface ClassificationRow {
  id: string;
  name: string;
  classification: Classification;
  action: PlanAction | "none";
}

export interface UpdatePlan {
  mode: PlanMode;
  entries: UpdatePlanEntry[];
  diagnostics?: ClassificationRow[];
}

// ── Download tool ──

export type FetchResult =
  | { ok: true }
  | { ok: false; exitCode: number | null; reason: string };

export interface Fetcher {
  fetch(modId: string): Promise<FetchResult>;
}

// ── Events ──

export type SyncStage =
  | "manifest"
  | "plan"
  | "server"
  | "download"
  | "normalize"
  | "link"
  | "keys"
  | "launch"
  | "clear";

export interface SyncEvent {
  stage: SyncStage;
  modId?: string;
  outcome: string;
  detail?: string;
}

export type EventSink = (event: SyncEvent) => void;

// ── Failed-mods state file ──

export interface FailedModsFile {
  recorded_at: string;
  mods: { id: string; name: string }[];
}
