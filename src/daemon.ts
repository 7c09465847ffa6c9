/**
 * Daemon mode: base-config preflight, shutdown signal wiring, and the
 * reconciliation loop run until a signal arrives.
 */

import { existsSync } from "node:fs";
import { Logger } from "./logger.js";
import type { BarsyncConfig } from "./cli/config.js";
import { StateProber } from "./compositor/probe.js";
import { ProcessSupervisor } from "./process/supervisor.js";
import { Reconciler } from "./reconcile/loop.js";

/** The part of `process` the shutdown wiring listens on. */
export interface SignalTarget {
  on(event: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
  removeListener(event: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
}

export interface ShutdownHandle {
  /** First signal received, or null while still running. */
  received(): NodeJS.Signals | null;
  dispose(): void;
}

export interface RunnableLoop {
  run(signal: AbortSignal): Promise<void>;
}

export interface DaemonDeps {
  signals?: SignalTarget;
  exists?: (path: string) => boolean;
  createReconciler?: (config: BarsyncConfig) => RunnableLoop;
}

/** Every generated artifact includes the base config, so it must exist. */
export function preflight(baseConfig: string, exists: (path: string) => boolean = existsSync): boolean {
  if (exists(baseConfig)) return true;
  Logger.error(`Missing base config at ${baseConfig}`);
  return false;
}

/**
 * Abort `controller` on the first SIGINT or SIGTERM. Later signals are
 * ignored while the companions are being stopped.
 */
export function installShutdown(
  controller: AbortController,
  target: SignalTarget = process,
  signals: readonly NodeJS.Signals[] = ["SIGINT", "SIGTERM"],
): ShutdownHandle {
  let first: NodeJS.Signals | null = null;
  const onSignal = (sig: NodeJS.Signals) => {
    if (controller.signal.aborted) return;
    first = sig;
    Logger.debug(`received ${sig}, stopping companions`);
    controller.abort();
  };
  for (const sig of signals) target.on(sig, onSignal);

  return {
    received: () => first,
    dispose: () => {
      for (const sig of signals) target.removeListener(sig, onSignal);
    },
  };
}

export function createReconciler(config: BarsyncConfig): RunnableLoop {
  const prober = new StateProber({ command: config.compositor, timeoutMs: config.queryTimeoutMs });
  const supervisor = new ProcessSupervisor({
    bin: config.bin,
    stylesheet: config.stylesheet,
    artifact: { cacheDir: config.cacheDir, baseConfig: config.baseConfig },
    logEnv: config.logEnv,
  });
  return new Reconciler(prober, supervisor, {
    intervalMs: config.intervalMs,
    backoffMs: config.backoffMs,
  });
}

/** Run until SIGINT/SIGTERM. Resolves the process exit code. */
export async function runDaemon(config: BarsyncConfig, deps: DaemonDeps = {}): Promise<number> {
  if (!preflight(config.baseConfig, deps.exists)) return 1;

  const loop = (deps.createReconciler ?? createReconciler)(config);
  const controller = new AbortController();
  const shutdown = installShutdown(controller, deps.signals);
  try {
    await loop.run(controller.signal);
  } finally {
    shutdown.dispose();
  }
  return 0;
}
