import path from "node:path";
import * as fss from "node:fs";
import { readYaml } from "./utils.js";
import { CLASS_KEYS } from "./types.js";
import type { ClassNames, RenderOptions } from "./types.js";

export type RoadmapConfig = RenderOptions & {
  // Globs (relative to the config's directory) naming roadmap documents
  documents: string[];
};

export const CONFIG_ENV = "ROADMAP_SYNC_CONFIG";
export const CONFIG_FILES = [".roadmap-sync.yml", ".roadmap-sync.yaml"];

export const DEFAULT_RENDER_OPTIONS: RenderOptions = {
  classes: { open: "open", blocked: "blocked", milestone: "milestone" },
  classDefs: {
    open: "fill:#e6f4ea,stroke:#34a853,color:#1e4620",
    blocked: "fill:#fce8e6,stroke:#d93025,color:#5f2120",
    milestone: "fill:#e8f0fe,stroke:#1a73e8,color:#174ea6,font-weight:bold",
  },
  indent: "    ",
};

export const DEFAULT_CONFIG: RoadmapConfig = {
  ...DEFAULT_RENDER_OPTIONS,
  documents: ["ROADMAP.md", "docs/**/ROADMAP.md"],
};

const KNOWN_KEYS = ["documents", "classes", "classDefs", "indent"];

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function stringMap(v: unknown, key: string, source: string): Partial<ClassNames> {
  if (v === undefined) return {};
  if (!isRecord(v)) throw new Error(`${source}: '${key}' must be a mapping`);
  const out: Partial<ClassNames> = {};
  for (const [k, val] of Object.entries(v)) {
    const name = CLASS_KEYS.find(c => c === k);
    if (!name) throw new Error(`${source}: unknown key '${key}.${k}' (expected ${CLASS_KEYS.join(", ")})`);
    if (typeof val !== "string" || !val.trim()) throw new Error(`${source}: '${key}.${k}' must be a non-empty string`);
    out[name] = val.trim();
  }
  return out;
}

/** Validate a parsed config file and fill in defaults. */
export function normalizeConfig(raw: unknown, source = "config"): RoadmapConfig {
  if (raw === null || raw === undefined) return DEFAULT_CONFIG;
  if (!isRecord(raw)) throw new Error(`${source}: expected a mapping at the top level`);
  const unknown = Object.keys(raw).filter(k => !KNOWN_KEYS.includes(k));
  if (unknown.length) throw new Error(`${source}: unknown key(s) ${unknown.map(k => `'${k}'`).join(", ")}`);

  let documents = DEFAULT_CONFIG.documents;
  if (raw.documents !== undefined) {
    const docs = raw.documents;
    if (!Array.isArray(docs) || docs.length === 0 || !docs.every((d): d is string => typeof d === "string" && d.trim() !== "")) {
      throw new Error(`${source}: 'documents' must be a non-empty list of globs`);
    }
    documents = docs;
  }

  let indent = DEFAULT_CONFIG.indent;
  if (raw.indent !== undefined) {
    if (typeof raw.indent === "number" && Number.isInteger(raw.indent) && raw.indent >= 0) indent = " ".repeat(raw.indent);
    else if (typeof raw.indent === "string" && /^[ \t]*$/.test(raw.indent)) indent = raw.indent;
    else throw new Error(`${source}: 'indent' must be a whitespace string or a number of spaces`);
  }

  return {
    documents,
    classes: { ...DEFAULT_CONFIG.classes, ...stringMap(raw.classes, "classes", source) },
    classDefs: { ...DEFAULT_CONFIG.classDefs, ...stringMap(raw.classDefs, "classDefs", source) },
    indent,
  };
}

export function resolveConfigPath(cwd = process.cwd()): string | null {
  const env = (process.env[CONFIG_ENV] || "").trim();
  if (env) return path.resolve(cwd, env);
  for (const name of CONFIG_FILES) {
    const p = path.join(cwd, name);
    if (fss.existsSync(p)) return p;
  }
  return null;
}

export async function loadConfig(cwd = process.cwd()): Promise<{ config: RoadmapConfig; path: string | null }> {
  const p = resolveConfigPath(cwd);
  if (!p) return { config: DEFAULT_CONFIG, path: null };
  if (!fss.existsSync(p)) throw new Error(`config not found: ${p}`);
  const raw = await readYaml(p);
  return { config: normalizeConfig(raw, path.relative(cwd, p) || p), path: p };
}
