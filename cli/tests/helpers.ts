import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { buildConfig } from "../src/lib/config.js";
import type { FetchResult, Fetcher, SyncConfig } from "../src/types/index.js";

export function createTmpDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), "a3modsync-test-"));
}

export function writeFile(dir: string, relativePath: string, content: string): void {
  const fullPath = path.join(dir, relativePath);
  fs.mkdirSync(path.dirname(fullPath), { recursive: true });
  fs.writeFileSync(fullPath, content, "utf-8");
}

/** Lists every path below `dir`, relative and sorted. */
export function listTree(dir: string): string[] {
  const out: string[] = [];
  const visit = (current: string) => {
    for (const entry of fs.readdirSync(current, { withFileTypes: true })) {
      const full = path.join(current, entry.name);
      out.push(path.relative(dir, full));
      if (entry.isDirectory()) visit(full);
    }
  };
  visit(dir);
  return out.sort();
}

/** A launcher preset export listing the given mods. */
export function presetHtml(mods: { id: string; name: string }[]): string {
  const rows = mods
    .map(
      (mod) => `        <tr data-type="ModContainer">
          <td data-type="DisplayName">${mod.name}</td>
          <td><span class="from-steam">Steam</span></td>
          <td><a href="https://steamcommunity.com/sharedfiles/filedetails/?id=${mod.id}" data-type="Link">https://steamcommunity.com/sharedfiles/filedetails/?id=${mod.id}</a></td>
        </tr>`,
    )
    .join("\n");
  return `<?xml version="1.0" encoding="utf-8"?>
<html>
  <head><meta name="arma:Type" content="preset" /></head>
  <body>
    <div class="mod-list">
      <table>
${rows}
      </table>
    </div>
  </body>
</html>
`;
}

export function testConfig(root: string, overrides: Partial<SyncConfig> = {}): SyncConfig {
  const config = buildConfig(
    {
      steamcmd: "steamcmd/steamcmd.sh",
      steam: { user: "test-user", password: "test-secret" },
      server: { dir: "server" },
      manifest_dir: "presets",
      mods_dir: "server/mods",
      max_tries: 2,
    },
    path.join(root, "a3modsync.yaml"),
  );
  return { ...config, ...overrides };
}

export interface FakeMod {
  /** Number of failing attempts before the download succeeds. */
  failTimes?: number;
  /** Files the download delivers, relative to the mod directory. */
  files?: Record<string, string>;
}

/** Stands in for SteamCMD: writes files into the workshop directory. */
export class FakeFetcher implements Fetcher {
  readonly calls: string[] = [];

  constructor(
    private readonly workshopDir: string,
    private readonly mods: Record<string, FakeMod> = {},
  ) {}

  async fetch(modId: string): Promise<FetchResult> {
    this.calls.push(modId);
    const mod = this.mods[modId] ?? {};
    const attempt = this.calls.filter((id) => id === modId).length;
    if (attempt <= (mod.failTimes ?? 0)) {
      return { ok: false, exitCode: 5, reason: "steamcmd exited with 5" };
    }
    const files = mod.files ?? { "addons/mod.pbo": `content of ${modId}` };
    for (const [relative, content] of Object.entries(files)) {
      writeFile(path.join(this.workshopDir, modId), relative, content);
    }
    return { ok: true };
  }
}
