/**
 * Reconciliation loop — drives the companion table toward the desired set.
 *
 * Per cycle: probe → desired set → stop what is no longer wanted → start
 * what is missing → sweep processes that died on their own. Stops finish
 * before any start in the same cycle, so an old and a new companion never
 * overlap.
 *
 * A failed cycle costs an extra backoff sleep and nothing more; the loop
 * ends only when the shutdown signal aborts, and then stops every companion.
 */

import { Logger } from "../logger.js";
import { barsyncError, asError, errorLogFields } from "../errors.js";
import { sleep as abortableSleep } from "../utils/sleep.js";
import { desiredOutputs } from "./desired.js";
import type { CompositorSnapshot } from "../compositor/types.js";
import type { StartOutcome } from "../process/supervisor.js";

export interface SnapshotSource {
  probe(): Promise<CompositorSnapshot>;
}

/** The supervisor operations the loop drives. */
export interface CompanionTable {
  outputs(): string[];
  start(output: string): Promise<StartOutcome>;
  stop(output: string): Promise<void>;
  sweepDead(): string[];
  stopAll(): Promise<void>;
}

export interface CycleReport {
  desired: string[];
  stopped: string[];
  started: string[];
  failed: string[];
  swept: string[];
}

export interface ReconcilerOptions {
  intervalMs: number;
  backoffMs: number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  onCycle?: (report: CycleReport) => void;
}

export class Reconciler {
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;

  constructor(
    private readonly source: SnapshotSource,
    private readonly table: CompanionTable,
    private readonly opts: ReconcilerOptions,
  ) {
    this.sleep = opts.sleep ?? abortableSleep;
  }

  async runCycle(): Promise<CycleReport> {
    const snapshot = await this.source.probe();
    const desired = desiredOutputs(snapshot.outputs, snapshot.windows);

    const stopped: string[] = [];
    for (const output of this.table.outputs()) {
      if (desired.has(output)) continue;
      await this.table.stop(output);
      stopped.push(output);
    }

    const started: string[] = [];
    const failed: string[] = [];
    for (const output of desired) {
      const outcome = await this.table.start(output);
      if (outcome === "launched") started.push(output);
      else if (outcome === "failed") failed.push(output);
    }

    const swept = this.table.sweepDead();
    return { desired: [...desired], stopped, started, failed, swept };
  }

  /** Run cycles until `signal` aborts, then stop every companion. */
  async run(signal: AbortSignal): Promise<void> {
    let cycles = 0;
    let failures = 0;
    while (!signal.aborted) {
      cycles++;
      try {
        const report = await this.runCycle();
        if (report.stopped.length || report.started.length || report.failed.length || report.swept.length) {
          Logger.debug(`cycle ${cycles}:`, JSON.stringify(report));
        }
        this.opts.onCycle?.(report);
      } catch (e: unknown) {
        failures++;
        const ce = barsyncError("cycle_error", `cycle ${cycles} failed: ${asError(e).message}`, {
          retryable: true,
          cause: e,
        });
        Logger.debug(ce.message, errorLogFields(ce));
        if (signal.aborted) break;
        await this.sleep(this.opts.backoffMs, signal);
      }
      if (signal.aborted) break;
      await this.sleep(this.opts.intervalMs, signal);
    }

    Logger.debug(`shutting down after ${cycles} cycle(s), ${failures} failed`);
    await this.table.stopAll();
  }
}
