/**
 * Per-output companion config: a small JSON file that includes the user's
 * base config and pins the companion to one output.
 *
 * Written to a temp file and renamed over the target, so the companion
 * reads either the old file or the new one, never a partial write.
 */

import { mkdir, writeFile, rename, rm } from "node:fs/promises";
import { join } from "node:path";

export interface ArtifactOptions {
  cacheDir: string;
  baseConfig: string;
  prefix?: string;
}

export interface ConfigArtifact {
  include: string;
  output: [string];
}

/**
 * Deterministic artifact path for an output. Percent-encoding keeps the
 * name a single path segment and maps distinct outputs to distinct files.
 */
export function artifactPath(opts: ArtifactOptions, output: string): string {
  return join(opts.cacheDir, `${opts.prefix ?? "bar"}-${encodeURIComponent(output)}.jsonc`);
}

export function artifactContent(baseConfig: string, output: string): ConfigArtifact {
  return { include: baseConfig, output: [output] };
}

export async function ensureConfigArtifact(opts: ArtifactOptions, output: string): Promise<string> {
  await mkdir(opts.cacheDir, { recursive: true });
  const target = artifactPath(opts, output);
  const tmp = `${target}.${process.pid}.tmp`;
  const body = JSON.stringify(artifactContent(opts.baseConfig, output), null, 2);
  try {
    await writeFile(tmp, body, "utf-8");
    await rename(tmp, target);
  } catch (e: unknown) {
    await rm(tmp, { force: true });
    throw e;
  }
  return target;
}
