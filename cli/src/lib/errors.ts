export type SyncErrorCode =
  | "config"
  | "no-manifest"
  | "empty-manifest"
  | "manifest-selection"
  | "download"
  | "name-collision"
  | "key-copy"
  | "confirmation-required";

export class SyncError extends Error {
  readonly code: SyncErrorCode;

  constructor(code: SyncErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ConfigError extends SyncError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super("config", issues.length > 0 ? `${message}\n  ${issues.join("\n  ")}` : message);
    this.issues = issues;
  }
}

export class NoManifestError extends SyncError {
  constructor(dir: string) {
    super("no-manifest", `No HTML manifest found in ${dir}`);
  }
}

export class EmptyManifestError extends SyncError {
  constructor(file: string) {
    super("empty-manifest", `No workshop mods found in ${file}`);
  }
}

export class ManifestSelectionError extends SyncError {
  constructor(message: string) {
    super("manifest-selection", message);
  }
}

/** Recorded once a mod has used up its retry budget. */
export class DownloadFailure extends SyncError {
  readonly modId: string;
  readonly displayName: string;
  readonly attempts: number;
  readonly exitCode: number | null;

  constructor(modId: string, displayName: string, attempts: number, exitCode: number | null, reason: string) {
    super("download", `${displayName} (${modId}) failed after ${attempts} tries: ${reason}`);
    this.modId = modId;
    this.displayName = displayName;
    this.attempts = attempts;
    this.exitCode = exitCode;
  }
}

export class NameCollisionError extends SyncError {
  readonly source: string;
  readonly target: string;

  constructor(source: string, target: string) {
    super("name-collision", `Cannot rename ${source}: ${target} already exists`);
    this.source = source;
    this.target = target;
  }
}

export class KeyCopyError extends SyncError {
  readonly source: string;

  constructor(source: string, reason: string) {
    super("key-copy", `Failed to copy key ${source}: ${reason}`);
    this.source = source;
  }
}

export function isSyncError(err: unknown): err is SyncError {
  return err instanceof SyncError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
