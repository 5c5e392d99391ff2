import { describe, it, expect, afterEach } from "vitest";
import fs from "node:fs";
import path from "node:path";
import {
  buildLaunchParameters,
  launchSeparator,
  writeLaunchParameters,
} from "../../src/lib/launch-params.js";
import { createTmpDir, writeFile } from "../helpers.js";
import type { ModRequirement } from "../../src/types/index.js";

let tmpDirs: string[] = [];

function useTmpDir(): string {
  const dir = createTmpDir();
  tmpDirs.push(dir);
  return dir;
}

afterEach(() => {
  for (const dir of tmpDirs) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
  tmpDirs = [];
});

const A: ModRequirement = { id: "103", displayName: "Alpha" };
const B: ModRequirement = { id: "101", displayName: "Bravo" };
const C: ModRequirement = { id: "102", displayName: "Charlie" };

function layout() {
  const serverDir = useTmpDir();
  const workshopDir = path.join(serverDir, "steamapps", "workshop", "content", "107410");
  const modsDir = path.join(serverDir, "mods");
  const install = (...ids: string[]) => {
    for (const id of ids) writeFile(workshopDir, `${id}/addons/a.pbo`, "x");
  };
  return { serverDir, workshopDir, modsDir, install };
}

const workshopToken = (id: string) => path.join("steamapps", "workshop", "content", "107410", id);

describe("launchSeparator", () => {
  it("uses a plain semicolon on Windows and an escaped one elsewhere", () => {
    expect(launchSeparator("win32")).toBe(";");
    expect(launchSeparator("linux")).toBe("\\;");
  });
});

describe("buildLaunchParameters", () => {
  it("follows manifest order", () => {
    const { serverDir, workshopDir, modsDir, install } = layout();
    install("101", "102", "103");

    const params = buildLaunchParameters({ serverDir, workshopDir, modsDir, order: [A, B, C], platform: "win32" });
    expect(params.tokens).toEqual([workshopToken("103"), workshopToken("101"), workshopToken("102")]);
    expect(params.value).toBe(params.tokens.join(";"));
  });

  it("leaves out mods that are not installed", () => {
    const { serverDir, workshopDir, modsDir, install } = layout();
    install("103", "102");

    const params = buildLaunchParameters({ serverDir, workshopDir, modsDir, order: [A, B, C], platform: "linux" });
    expect(params.tokens).toEqual([workshopToken("103"), workshopToken("102")]);
    expect(params.value).toBe(`${workshopToken("103")}\\;${workshopToken("102")}`);
  });

  it("prefers the mod link when one exists", () => {
    const { serverDir, workshopDir, modsDir, install } = layout();
    install("103");
    fs.mkdirSync(modsDir, { recursive: true });
    fs.symlinkSync(path.join(workshopDir, "103"), path.join(modsDir, "@alpha"));

    const params = buildLaunchParameters({ serverDir, workshopDir, modsDir, order: [A], platform: "linux" });
    expect(params.tokens).toEqual([path.join("mods", "@alpha")]);
  });

  it("ignores a link that resolves to another mod", () => {
    const { serverDir, workshopDir, modsDir, install } = layout();
    install("103", "999");
    fs.mkdirSync(modsDir, { recursive: true });
    fs.symlinkSync(path.join(workshopDir, "999"), path.join(modsDir, "@alpha"));

    const params = buildLaunchParameters({ serverDir, workshopDir, modsDir, order: [A], platform: "linux" });
    expect(params.tokens).toEqual([workshopToken("103")]);
  });

  it("gives each mod its own token when folder names coincide", () => {
    const { serverDir, workshopDir, modsDir, install } = layout();
    install("101", "102");
    fs.mkdirSync(modsDir, { recursive: true });
    fs.symlinkSync(path.join(workshopDir, "101"), path.join(modsDir, "@cba_a3"));
    const order: ModRequirement[] = [
      { id: "101", displayName: "CBA A3" },
      { id: "102", displayName: "CBA_A3" },
    ];

    const params = buildLaunchParameters({ serverDir, workshopDir, modsDir, order, platform: "linux" });
    expect(params.tokens).toEqual([path.join("mods", "@cba_a3"), workshopToken("102")]);
  });

  it("uses directory scan order without a manifest", () => {
    const { serverDir, workshopDir, modsDir, install } = layout();
    install("103", "101");

    const params = buildLaunchParameters({ serverDir, workshopDir, modsDir, platform: "linux" });
    expect(params.tokens).toEqual([workshopToken("101"), workshopToken("103")]);
  });

  it("returns an empty value when nothing is installed", () => {
    const { serverDir, workshopDir, modsDir } = layout();
    const params = buildLaunchParameters({ serverDir, workshopDir, modsDir, order: [A], platform: "linux" });
    expect(params).toEqual({ tokens: [], value: "" });
  });

  it("gives the same answer on repeated calls", () => {
    const { serverDir, workshopDir, modsDir, install } = layout();
    install("101");
    const input = { serverDir, workshopDir, modsDir, order: [B], platform: "linux" as const };
    expect(buildLaunchParameters(input)).toEqual(buildLaunchParameters(input));
  });
});

describe("writeLaunchParameters", () => {
  it("writes the value on one line", () => {
    const dir = useTmpDir();
    const file = path.join(dir, "out", "ModsParam.txt");
    writeLaunchParameters(file, { tokens: ["mods/@a", "mods/@b"], value: "mods/@a;mods/@b" });
    expect(fs.readFileSync(file, "utf-8")).toBe("mods/@a;mods/@b\n");
  });
});
