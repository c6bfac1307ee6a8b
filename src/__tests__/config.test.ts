import { describe, it, expect, afterEach, beforeEach, vi } from "vitest";
import fs from "node:fs/promises";
import path from "node:path";
import { CONFIG_ENV, DEFAULT_CONFIG, loadConfig, normalizeConfig, resolveConfigPath } from "../config.js";
import { findProjectRoot, listRoadmaps, resolveRoadmap } from "../documents.js";
import { makeTempDir } from "./helpers.js";

describe("normalizeConfig", () => {
  it("falls back to the defaults for an empty file", () => {
    expect(normalizeConfig(null)).toEqual(DEFAULT_CONFIG);
  });

  it("merges partial class settings and widens a numeric indent", () => {
    const c = normalizeConfig({ indent: 2, classes: { open: "ready" }, documents: ["plans/*.md"] });
    expect(c.indent).toBe("  ");
    expect(c.classes).toEqual({ open: "ready", blocked: "blocked", milestone: "milestone" });
    expect(c.classDefs).toEqual(DEFAULT_CONFIG.classDefs);
    expect(c.documents).toEqual(["plans/*.md"]);
  });

  it("names unknown keys", () => {
    expect(() => normalizeConfig({ colors: {} }, ".roadmap-sync.yml")).toThrow(".roadmap-sync.yml: unknown key(s) 'colors'");
    expect(() => normalizeConfig({ classes: { done: "x" } })).toThrow("config: unknown key 'classes.done' (expected open, blocked, milestone)");
  });

  it("rejects values of the wrong type", () => {
    expect(() => normalizeConfig({ documents: "ROADMAP.md" })).toThrow("config: 'documents' must be a non-empty list of globs");
    expect(() => normalizeConfig({ indent: "xx" })).toThrow("config: 'indent' must be a whitespace string or a number of spaces");
    expect(() => normalizeConfig({ classDefs: { open: "" } })).toThrow("config: 'classDefs.open' must be a non-empty string");
    expect(() => normalizeConfig(["documents"])).toThrow("config: expected a mapping at the top level");
  });
});

describe("loadConfig", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
    vi.stubEnv(CONFIG_ENV, "");
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("uses the defaults without a config file", async () => {
    expect(resolveConfigPath(dir)).toBeNull();
    expect(await loadConfig(dir)).toEqual({ config: DEFAULT_CONFIG, path: null });
  });

  it("reads .roadmap-sync.yml from the directory", async () => {
    await fs.writeFile(path.join(dir, ".roadmap-sync.yml"), "indent: 2\nclasses:\n  open: ready\n", "utf8");
    const { config, path: p } = await loadConfig(dir);
    expect(p).toBe(path.join(dir, ".roadmap-sync.yml"));
    expect(config.indent).toBe("  ");
    expect(config.classes.open).toBe("ready");
  });

  it("prefers the file named by the environment", async () => {
    await fs.writeFile(path.join(dir, ".roadmap-sync.yml"), "indent: 2\n", "utf8");
    await fs.writeFile(path.join(dir, "custom.yaml"), "indent: 8\n", "utf8");
    vi.stubEnv(CONFIG_ENV, "custom.yaml");
    const { config, path: p } = await loadConfig(dir);
    expect(p).toBe(path.join(dir, "custom.yaml"));
    expect(config.indent).toBe(" ".repeat(8));
  });

  it("fails when the environment names a missing file", async () => {
    vi.stubEnv(CONFIG_ENV, "missing.yml");
    await expect(loadConfig(dir)).rejects.toThrow(`config not found: ${path.join(dir, "missing.yml")}`);
  });

  it("reports the file name with validation errors", async () => {
    await fs.writeFile(path.join(dir, ".roadmap-sync.yaml"), "theme: dark\n", "utf8");
    await expect(loadConfig(dir)).rejects.toThrow(".roadmap-sync.yaml: unknown key(s) 'theme'");
  });
});

describe("roadmap discovery", () => {
  it("finds documents by glob, skipping node_modules", async () => {
    const dir = await makeTempDir();
    await fs.mkdir(path.join(dir, "docs", "api"), { recursive: true });
    await fs.mkdir(path.join(dir, "node_modules", "pkg"), { recursive: true });
    await fs.writeFile(path.join(dir, "docs", "api", "ROADMAP.md"), "", "utf8");
    await fs.writeFile(path.join(dir, "node_modules", "pkg", "ROADMAP.md"), "", "utf8");
    expect(await listRoadmaps(dir, ["**/ROADMAP.md"])).toEqual([path.join(dir, "docs", "api", "ROADMAP.md")]);
    expect(await resolveRoadmap(dir, undefined, DEFAULT_CONFIG.documents)).toBe(path.join(dir, "docs", "api", "ROADMAP.md"));
  });

  it("prefers an explicit path and reports a missing one", async () => {
    const dir = await makeTempDir();
    await fs.writeFile(path.join(dir, "PLAN.md"), "", "utf8");
    expect(await resolveRoadmap(dir, "PLAN.md", ["ROADMAP.md"])).toBe(path.join(dir, "PLAN.md"));
    await expect(resolveRoadmap(dir, "nope.md", ["ROADMAP.md"])).rejects.toThrow("Roadmap not found: nope.md");
    await expect(resolveRoadmap(dir, undefined, ["ROADMAP.md"])).rejects.toThrow("No roadmap found (looked for ROADMAP.md); pass a file path");
  });

  it("walks up to the directory holding the config file", async () => {
    const dir = await makeTempDir();
    await fs.writeFile(path.join(dir, ".roadmap-sync.yml"), "", "utf8");
    await fs.mkdir(path.join(dir, "a", "b"), { recursive: true });
    expect(await findProjectRoot(path.join(dir, "a", "b"))).toBe(dir);
  });
});
