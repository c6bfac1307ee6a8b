#!/usr/bin/env node
import * as fss from "node:fs";
import { fileURLToPath } from "node:url";
import { buildProgram } from "./program.js";

// Resolve package version without JSON import attributes
let pkgVersion = "0.0.0";
try {
  const pkgPath = fileURLToPath(new URL("../package.json", import.meta.url));
  const raw: unknown = JSON.parse(fss.readFileSync(pkgPath, "utf8"));
  if (typeof raw === "object" && raw !== null && "version" in raw && typeof raw.version === "string") pkgVersion = raw.version;
} catch {
  // running from an unpacked source tree without package.json
}

buildProgram(pkgVersion).parseAsync(process.argv).catch((e) => {
  console.error(e);
  process.exit(1);
});
