import * as p from "@clack/prompts";
import { ManifestSelectionError } from "./errors.js";
import type { ManifestCandidate } from "../types/index.js";

/**
 * Returns true if the CLI is running in an interactive terminal.
 * False when piped or in CI.
 */
export function isInteractive(): boolean {
  return Boolean(process.stdin.isTTY) && !process.env.CI;
}

/**
 * Unwraps a clack prompt result. Ctrl+C prints a cancel message and exits.
 */
export function handleCancel<T>(value: T | symbol): T {
  if (p.isCancel(value)) {
    p.cancel("Cancelled.");
    process.exit(0);
  }
  return value;
}

function formatDate(date: Date): string {
  return date.toISOString().slice(0, 16).replace("T", " ");
}

/**
 * Asks the operator which manifest to use. Cancelling is a selection
 * failure, not a clean exit.
 */
export async function promptForManifest(candidates: ManifestCandidate[]): Promise<ManifestCandidate> {
  const value = await p.select({
    message: "Choose a mod manifest",
    options: candidates.map((candidate) => ({
      value: candidate.path,
      label: candidate.name,
      hint: formatDate(candidate.modifiedAt),
    })),
  });

  if (p.isCancel(value)) {
    p.cancel("No manifest selected.");
    throw new ManifestSelectionError("Manifest selection cancelled");
  }

  const chosen = candidates.find((candidate) => candidate.path === value);
  if (!chosen) {
    throw new ManifestSelectionError(`Invalid manifest choice: ${String(value)}`);
  }
  return chosen;
}

export async function confirmAction(message: string): Promise<boolean> {
  return handleCancel(await p.confirm({ message, initialValue: false }));
}
