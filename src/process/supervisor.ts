/**
 * Process supervisor — owns the output → companion process table.
 *
 * Nothing else reads or writes the table. Liveness is always asked of the
 * process handle at the moment it matters; the table never caches a
 * "running" flag.
 *
 * Start is idempotent while the previous instance lives. Stop asks for a
 * graceful exit, waits a bounded time, then force-kills, and always drops
 * the entry: a leaked child is tolerable, a leaked entry would block every
 * later start for that output.
 */

import { spawn, type ChildProcess } from "node:child_process";
import { Logger } from "../logger.js";
import { barsyncError, asError, errorLogFields } from "../errors.js";
import { sleep } from "../utils/sleep.js";
import { ensureConfigArtifact, type ArtifactOptions } from "./artifact.js";

export interface CompanionHandle {
  readonly pid: number;
  isAlive(): boolean;
  /** Ask for a graceful exit (SIGTERM). */
  terminate(): void;
  /** Force termination (SIGKILL). */
  kill(): void;
}

/** Launches a companion process. Throws when it cannot be started. */
export type CompanionLauncher = (
  command: string,
  args: string[],
  env: NodeJS.ProcessEnv,
) => CompanionHandle;

export type StartOutcome = "launched" | "running" | "failed";

export interface ManagedProcess {
  output: string;
  handle: CompanionHandle;
  startedAt: number;
}

function childHandle(child: ChildProcess, pid: number): CompanionHandle {
  return {
    pid,
    isAlive: () => child.exitCode === null && child.signalCode === null,
    terminate: () => { child.kill("SIGTERM"); },
    kill: () => { child.kill("SIGKILL"); },
  };
}

/**
 * Spawn detached into its own process group with stdio discarded, so a
 * signal aimed at barsync's group does not reach the companions.
 */
export const spawnCompanion: CompanionLauncher = (command, args, env) => {
  const child = spawn(command, args, { detached: true, stdio: "ignore", env });
  // Launch errors (ENOENT, EACCES) arrive as an event; without a listener they crash the daemon
  child.on("error", (err) => {
    Logger.debug(`companion ${command}: ${err.message}`);
  });
  if (child.pid === undefined) {
    throw barsyncError("launch_error", `could not launch ${command}`, { command, retryable: true });
  }
  child.unref();
  return childHandle(child, child.pid);
};

export interface SupervisorOptions {
  /** Companion executable, looked up on PATH. */
  bin: string;
  stylesheet: string;
  artifact: ArtifactOptions;
  /** Log-verbosity variable set for the companion only when unset. */
  logEnv?: { name: string; value: string };
  launcher?: CompanionLauncher;
  env?: NodeJS.ProcessEnv;
  stopPollMs?: number;
  stopPolls?: number;
}

export class ProcessSupervisor {
  private readonly table = new Map<string, ManagedProcess>();
  private readonly launcher: CompanionLauncher;
  private readonly stopPollMs: number;
  private readonly stopPolls: number;

  constructor(private readonly opts: SupervisorOptions) {
    this.launcher = opts.launcher ?? spawnCompanion;
    this.stopPollMs = opts.stopPollMs ?? 50;
    this.stopPolls = opts.stopPolls ?? 20;
  }

  outputs(): string[] {
    return [...this.table.keys()];
  }

  has(output: string): boolean {
    return this.table.has(output);
  }

  ensureConfigArtifact(output: string): Promise<string> {
    return ensureConfigArtifact(this.opts.artifact, output);
  }

  /**
   * Make sure a companion runs for `output`. On "failed" no entry is
   * recorded, and the next cycle tries again.
   */
  async start(output: string): Promise<StartOutcome> {
    const existing = this.table.get(output);
    if (existing) {
      if (existing.handle.isAlive()) return "running";
      this.table.delete(output);
    }

    try {
      const config = await this.ensureConfigArtifact(output);
      const handle = this.launcher(
        this.opts.bin,
        ["-c", config, "-s", this.opts.stylesheet],
        this.companionEnv(),
      );
      this.table.set(output, { output, handle, startedAt: Date.now() });
      Logger.debug(`started companion for ${output} (pid ${handle.pid})`);
      return "launched";
    } catch (e: unknown) {
      const le = barsyncError("launch_error", `start ${output}: ${asError(e).message}`, {
        output,
        command: this.opts.bin,
        retryable: true,
        cause: e,
      });
      Logger.debug(le.message, errorLogFields(le));
      return "failed";
    }
  }

  /** Stop the companion for `output`. Never rejects. */
  async stop(output: string): Promise<void> {
    const entry = this.table.get(output);
    if (!entry) return;

    const { handle } = entry;
    try {
      if (handle.isAlive()) {
        handle.terminate();
        for (let i = 0; i < this.stopPolls && handle.isAlive(); i++) {
          await sleep(this.stopPollMs);
        }
        if (handle.isAlive()) {
          Logger.debug(`companion for ${output} ignored SIGTERM, killing pid ${handle.pid}`);
          handle.kill();
        }
      }
    } catch (e: unknown) {
      const se = barsyncError("stop_error", `stop ${output}: ${asError(e).message}`, { output, cause: e });
      Logger.debug(se.message, errorLogFields(se));
    } finally {
      this.table.delete(output);
    }
    Logger.debug(`stopped companion for ${output}`);
  }

  /** Drop entries whose process exited on its own. Returns their outputs. */
  sweepDead(): string[] {
    const swept: string[] = [];
    for (const [output, entry] of this.table) {
      if (!entry.handle.isAlive()) {
        this.table.delete(output);
        swept.push(output);
      }
    }
    return swept;
  }

  async stopAll(): Promise<void> {
    for (const output of this.outputs()) {
      await this.stop(output);
    }
  }

  private companionEnv(): NodeJS.ProcessEnv {
    const env: NodeJS.ProcessEnv = { ...(this.opts.env ?? process.env) };
    const logEnv = this.opts.logEnv;
    if (logEnv && env[logEnv.name] === undefined) env[logEnv.name] = logEnv.value;
    return env;
  }
}
