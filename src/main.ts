#!/usr/bin/env node
/**
 * barsync — keeps one companion bar per compositor output, running only
 * while that output's active workspace shows a window.
 *
 * Exit codes:
 *   0  = shut down by SIGINT/SIGTERM, or --help / --version / --check
 *   1  = bad arguments, or the base config is missing
 */

import { Logger } from "./logger.js";
import { asError, isBarsyncError, errorLogFields } from "./errors.js";
import { loadConfig, usage, type BarsyncConfig } from "./cli/config.js";
import { getVersion } from "./version.js";
import { StateProber } from "./compositor/probe.js";
import { runDaemon } from "./daemon.js";
import { describeState } from "./reconcile/desired.js";

async function main(): Promise<number> {
  let config: BarsyncConfig;
  try {
    config = loadConfig();
  } catch (e: unknown) {
    if (!isBarsyncError(e)) throw e;
    Logger.error(e.message);
    return 1;
  }

  if (config.mode === "help") {
    Logger.info(usage(getVersion()));
    return 0;
  }
  if (config.mode === "version") {
    Logger.info(`barsync ${getVersion()}`);
    return 0;
  }

  Logger.setVerbose(config.verbose);

  if (config.mode === "check") {
    const prober = new StateProber({ command: config.compositor, timeoutMs: config.queryTimeoutMs });
    const snapshot = await prober.probe();
    Logger.info(JSON.stringify(describeState(snapshot.outputs, snapshot.windows), null, 2));
    return 0;
  }

  return runDaemon(config);
}

main().then(
  (code) => process.exit(code),
  (e: unknown) => {
    const err = asError(e);
    if (isBarsyncError(err)) Logger.debug(errorLogFields(err));
    Logger.error(`barsync: ${err.message}`);
    process.exit(1);
  },
);
