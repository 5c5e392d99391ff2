import { describe, it, expect, afterEach } from "vitest";
import fs from "node:fs";
import path from "node:path";
import { linkMods, modLinkPath } from "../../src/lib/links.js";
import { createTmpDir, writeFile } from "../helpers.js";

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

const quiet = () => {};

describe("linkMods", () => {
  it("links installed mods under their folder name", () => {
    const root = useTmpDir();
    const workshop = path.join(root, "workshop");
    const modsDir = path.join(root, "mods");
    writeFile(workshop, "101/addons/a.pbo", "x");

    const report = linkMods([{ id: "101", displayName: "CBA_A3" }], workshop, modsDir, quiet);
    const link = path.join(modsDir, "@cba_a3");
    expect(report.created).toEqual([link]);
    expect(fs.realpathSync(link)).toBe(fs.realpathSync(path.join(workshop, "101")));
  });

  it("reports mods that are not on disk", () => {
    const root = useTmpDir();
    const report = linkMods(
      [{ id: "102", displayName: "Missing" }],
      path.join(root, "workshop"),
      path.join(root, "mods"),
      quiet,
    );
    expect(report.missing).toEqual(["102"]);
    expect(report.created).toEqual([]);
  });

  it("reports a folder name already held by another mod", () => {
    const root = useTmpDir();
    const workshop = path.join(root, "workshop");
    const modsDir = path.join(root, "mods");
    writeFile(workshop, "101/addons/a.pbo", "x");
    writeFile(workshop, "102/addons/b.pbo", "x");

    const report = linkMods(
      [
        { id: "101", displayName: "CBA A3" },
        { id: "102", displayName: "CBA_A3" },
      ],
      workshop,
      modsDir,
      quiet,
    );
    const link = path.join(modsDir, "@cba_a3");
    expect(report.created).toEqual([link]);
    expect(report.failures).toEqual([`Cannot link CBA_A3 (102): ${link} belongs to another mod`]);
    expect(fs.realpathSync(link)).toBe(fs.realpathSync(path.join(workshop, "101")));
  });

  it("does not accept a leftover link to a different mod", () => {
    const root = useTmpDir();
    const workshop = path.join(root, "workshop");
    const modsDir = path.join(root, "mods");
    writeFile(workshop, "101/addons/a.pbo", "x");
    writeFile(workshop, "999/addons/z.pbo", "x");
    fs.mkdirSync(modsDir, { recursive: true });
    const link = path.join(modsDir, "@alpha");
    fs.symlinkSync(path.join(workshop, "999"), link);

    const report = linkMods([{ id: "101", displayName: "Alpha" }], workshop, modsDir, quiet);
    expect(report.existing).toEqual([]);
    expect(report.failures).toEqual([`Cannot link Alpha (101): ${link} belongs to another mod`]);
  });

  it("leaves existing links alone", () => {
    const root = useTmpDir();
    const workshop = path.join(root, "workshop");
    const modsDir = path.join(root, "mods");
    writeFile(workshop, "101/addons/a.pbo", "x");
    const req = { id: "101", displayName: "Alpha" };

    linkMods([req], workshop, modsDir, quiet);
    const second = linkMods([req], workshop, modsDir, quiet);
    expect(second.created).toEqual([]);
    expect(second.existing).toEqual([modLinkPath(modsDir, req)]);
  });
});
