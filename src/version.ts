import { readFileSync, existsSync } from "node:fs";
import { join, dirname } from "node:path";
import { fileURLToPath } from "node:url";

/** Read version from package.json, whether running from src/ or dist/src/. */
function readVersion(): string {
  const selfDir = dirname(fileURLToPath(import.meta.url));
  const candidates = [
    join(selfDir, "..", "package.json"),
    join(selfDir, "..", "..", "package.json"),
  ];
  for (const p of candidates) {
    if (!existsSync(p)) continue;
    try {
      const pkg: unknown = JSON.parse(readFileSync(p, "utf-8"));
      if (typeof pkg === "object" && pkg !== null && "name" in pkg && "version" in pkg
        && pkg.name === "barsync" && typeof pkg.version === "string") {
        return pkg.version;
      }
    } catch {
      // try next candidate
    }
  }
  return "unknown";
}

const BARSYNC_VERSION = readVersion();

export function getVersion(): string {
  return BARSYNC_VERSION;
}
