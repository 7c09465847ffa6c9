/**
 * Tests for daemon startup: base-config preflight and shutdown signals.
 */

import { test, describe } from "node:test";
import assert from "node:assert";
import { EventEmitter } from "node:events";
import { preflight, installShutdown, runDaemon, type RunnableLoop } from "../src/daemon.js";
import { loadConfig } from "../src/cli/config.js";

const config = loadConfig(["--base-config", "/etc/bar/base.jsonc"], {}, "/home/tester");

/** Loop stand-in that resolves once its signal aborts. */
class WaitingLoop implements RunnableLoop {
  runs = 0;
  started: Promise<void>;
  private markStarted: () => void = () => {};

  constructor() {
    this.started = new Promise((resolve) => {
      this.markStarted = resolve;
    });
  }

  run(signal: AbortSignal): Promise<void> {
    this.runs++;
    this.markStarted();
    return new Promise((resolve) => {
      if (signal.aborted) return resolve();
      signal.addEventListener("abort", () => resolve(), { once: true });
    });
  }
}

describe("preflight", () => {
  test("passes when the base config exists", () => {
    assert.strictEqual(preflight("/etc/bar/base.jsonc", (p) => p === "/etc/bar/base.jsonc"), true);
  });

  test("fails when the base config is missing", () => {
    assert.strictEqual(preflight("/etc/bar/base.jsonc", () => false), false);
  });
});

describe("installShutdown", () => {
  test("the first signal aborts the controller", () => {
    const target = new EventEmitter();
    const controller = new AbortController();
    const handle = installShutdown(controller, target);

    assert.strictEqual(handle.received(), null);
    target.emit("SIGTERM", "SIGTERM");
    assert.strictEqual(controller.signal.aborted, true);
    assert.strictEqual(handle.received(), "SIGTERM");
  });

  test("a second signal is ignored", () => {
    const target = new EventEmitter();
    const controller = new AbortController();
    let aborts = 0;
    controller.signal.addEventListener("abort", () => aborts++);
    const handle = installShutdown(controller, target);

    target.emit("SIGINT", "SIGINT");
    target.emit("SIGTERM", "SIGTERM");
    assert.strictEqual(aborts, 1);
    assert.strictEqual(handle.received(), "SIGINT");
  });

  test("dispose removes the listeners", () => {
    const target = new EventEmitter();
    const handle = installShutdown(new AbortController(), target);
    assert.strictEqual(target.listenerCount("SIGINT"), 1);
    assert.strictEqual(target.listenerCount("SIGTERM"), 1);
    handle.dispose();
    assert.strictEqual(target.listenerCount("SIGINT"), 0);
    assert.strictEqual(target.listenerCount("SIGTERM"), 0);
  });
});

describe("runDaemon", () => {
  test("missing base config returns 1 and never builds the loop", async () => {
    let built = 0;
    const code = await runDaemon(config, {
      signals: new EventEmitter(),
      exists: () => false,
      createReconciler: () => {
        built++;
        return new WaitingLoop();
      },
    });
    assert.strictEqual(code, 1);
    assert.strictEqual(built, 0);
  });

  test("runs the loop until SIGTERM, then returns 0 and unhooks the signals", async () => {
    const signals = new EventEmitter();
    const loop = new WaitingLoop();
    let builtWith: string | null = null;

    const done = runDaemon(config, {
      signals,
      exists: () => true,
      createReconciler: (cfg) => {
        builtWith = cfg.baseConfig;
        return loop;
      },
    });
    await loop.started;
    assert.strictEqual(builtWith, "/etc/bar/base.jsonc");
    assert.strictEqual(signals.listenerCount("SIGTERM"), 1);

    signals.emit("SIGTERM", "SIGTERM");
    assert.strictEqual(await done, 0);
    assert.strictEqual(loop.runs, 1);
    assert.strictEqual(signals.listenerCount("SIGINT"), 0);
    assert.strictEqual(signals.listenerCount("SIGTERM"), 0);
  });
});
