/**
 * State prober — samples the compositor through its JSON query command.
 *
 * Two read-only queries per probe: the output list and the window list.
 * Any failure (missing executable, non-zero exit, timeout, bad JSON)
 * degrades to an empty list for that query. The next poll corrects it,
 * so there are no retries here and probe() never rejects.
 */

import { execFile } from "node:child_process";
import { Logger } from "../logger.js";
import { barsyncError, asError, errorLogFields } from "../errors.js";
import type {
  CommandRunner,
  CompositorSnapshot,
  WindowState,
  WorkspaceId,
} from "./types.js";

const MAX_QUERY_OUTPUT = 16 * 1024 * 1024;

export const execRunner: CommandRunner = (command, args, timeoutMs) =>
  new Promise((resolve, reject) => {
    execFile(
      command,
      args,
      { encoding: "utf-8", timeout: timeoutMs, maxBuffer: MAX_QUERY_OUTPUT },
      (err, stdout) => {
        if (!err) {
          resolve({ code: 0, stdout });
          return;
        }
        // Numeric code = the command ran and exited non-zero
        if (typeof err.code === "number") {
          resolve({ code: err.code, stdout });
          return;
        }
        reject(err);
      },
    );
  });

export interface ProbeOptions {
  /** Compositor control command, e.g. "hyprctl". */
  command: string;
  timeoutMs: number;
  runner?: CommandRunner;
}

export class StateProber {
  private readonly runner: CommandRunner;

  constructor(private readonly opts: ProbeOptions) {
    this.runner = opts.runner ?? execRunner;
  }

  async probe(): Promise<CompositorSnapshot> {
    const outputs = await this.queryList("monitors");
    const windows = await this.queryList("clients");
    return {
      outputs: normalizeOutputs(outputs),
      windows: normalizeWindows(windows),
    };
  }

  private async queryList(what: "monitors" | "clients"): Promise<unknown[]> {
    const args = ["-j", what];
    const where = `${this.opts.command} ${args.join(" ")}`;
    try {
      const res = await this.runner(this.opts.command, args, this.opts.timeoutMs);
      if (res.code !== 0) {
        Logger.debug(`probe: ${where} exited with code ${res.code}`);
        return [];
      }
      const parsed: unknown = JSON.parse(res.stdout);
      if (!Array.isArray(parsed)) {
        Logger.debug(`probe: ${where} did not return a JSON array`);
        return [];
      }
      return parsed;
    } catch (e: unknown) {
      const pe = barsyncError("probe_error", `${where} failed: ${asError(e).message}`, {
        command: where,
        retryable: true,
        cause: e,
      });
      Logger.debug(pe.message, errorLogFields(pe));
      return [];
    }
  }
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function workspaceIdOf(holder: unknown): WorkspaceId | undefined {
  if (!isRecord(holder)) return undefined;
  const id = holder.id;
  if (typeof id === "number" && Number.isFinite(id)) return id;
  if (typeof id === "string" && id !== "") return id;
  return undefined;
}

/**
 * Output name → active workspace id, for every enabled output that has
 * both a name and an active workspace.
 */
export function normalizeOutputs(raw: unknown[]): Map<string, WorkspaceId> {
  const byOutput = new Map<string, WorkspaceId>();
  for (const entry of raw) {
    if (!isRecord(entry)) continue;
    if (entry.disabled === true) continue;
    const name = entry.name;
    const workspace = workspaceIdOf(entry.activeWorkspace);
    if (typeof name !== "string" || name === "" || workspace === undefined) continue;
    byOutput.set(name, workspace);
  }
  return byOutput;
}

export function normalizeWindows(raw: unknown[]): WindowState[] {
  const windows: WindowState[] = [];
  for (const entry of raw) {
    if (!isRecord(entry)) continue;
    windows.push({
      workspace: workspaceIdOf(entry.workspace),
      mapped: entry.mapped === true,
      hidden: entry.hidden === true,
    });
  }
  return windows;
}
