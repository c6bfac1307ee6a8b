import fs from "node:fs/promises";
import path from "node:path";
import YAML from "yaml";

export async function ensureDir(p: string) {
  await fs.mkdir(p, { recursive: true });
}

export async function readYaml(filePath: string): Promise<unknown> {
  const raw = await fs.readFile(filePath, "utf8");
  return YAML.parse(raw);
}

export async function readText(filePath: string): Promise<string> {
  return fs.readFile(filePath, "utf8");
}

// Temp file in the same directory, then rename over the target
export async function writeFileAtomic(filePath: string, data: string) {
  await ensureDir(path.dirname(filePath));
  const tmp = `${filePath}.tmp-${process.pid}-${Math.random().toString(36).slice(2)}`;
  try {
    await fs.writeFile(tmp, data, "utf8");
    await fs.rename(tmp, filePath);
  } catch (e) {
    await fs.rm(tmp, { force: true });
    throw e;
  }
}

export function plural(n: number, word: string) {
  return `${n} ${word}${n === 1 ? "" : "s"}`;
}
