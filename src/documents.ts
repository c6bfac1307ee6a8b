import path from "node:path";
import * as fss from "node:fs";
import fg from "fast-glob";
import { CONFIG_FILES } from "./config.js";

const IGNORE = ["**/node_modules/**", "**/.git/**", "**/dist/**"];

export async function findProjectRoot(start = process.cwd()): Promise<string> {
  let dir = path.resolve(start);
  // walk up to a config file or .git
  // eslint-disable-next-line no-constant-condition
  while (true) {
    if (CONFIG_FILES.some(f => fss.existsSync(path.join(dir, f)))) return dir;
    if (fss.existsSync(path.join(dir, ".git"))) return dir;
    const parent = path.dirname(dir);
    if (parent === dir) return path.resolve(start);
    dir = parent;
  }
}

export async function listRoadmaps(cwd: string, globs: string[]): Promise<string[]> {
  const found = await fg(globs, { cwd, absolute: true, onlyFiles: true, unique: true, ignore: IGNORE });
  return found.sort();
}

/** An explicit path wins; otherwise the first document the globs match. */
export async function resolveRoadmap(cwd: string, file: string | undefined, globs: string[]): Promise<string> {
  if (file) {
    const p = path.resolve(cwd, file);
    if (!fss.existsSync(p)) throw new Error(`Roadmap not found: ${file}`);
    return p;
  }
  for (const g of globs) {
    const [first] = await listRoadmaps(cwd, [g]);
    if (first) return first;
  }
  throw new Error(`No roadmap found (looked for ${globs.join(", ")}); pass a file path`);
}
