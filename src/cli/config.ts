/**
 * CLI argument parsing, configuration defaults, and help text.
 */

import { homedir } from "node:os";
import { join } from "node:path";
import { Logger } from "../logger.js";
import { barsyncError } from "../errors.js";

export type RunMode = "run" | "check" | "help" | "version";

export interface BarsyncConfig {
  mode: RunMode;
  /** User's companion config, included by every generated artifact. */
  baseConfig: string;
  stylesheet: string;
  cacheDir: string;
  bin: string;
  compositor: string;
  intervalMs: number;
  backoffMs: number;
  queryTimeoutMs: number;
  verbose: boolean;
  logEnv: { name: string; value: string };
}

function expandHome(p: string, home: string): string {
  if (p === "~") return home;
  if (p.startsWith("~/")) return join(home, p.slice(2));
  return p;
}

function parseDuration(flag: string, raw: string): number {
  const n = Number(raw);
  if (raw.trim() === "" || !Number.isFinite(n) || n <= 0) {
    throw barsyncError("config_error", `${flag} expects a positive number of milliseconds, got "${raw}"`);
  }
  return n;
}

export function loadConfig(
  argv: string[] = process.argv.slice(2),
  env: NodeJS.ProcessEnv = process.env,
  home: string = homedir(),
): BarsyncConfig {
  const flags: Record<string, string> = {};
  let mode: RunMode = "run";

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const takeValue = (): string => {
      const value = argv[i + 1];
      if (value === undefined) throw barsyncError("config_error", `${arg} requires a value`);
      i++;
      return value;
    };

    if (arg === "--base-config") { flags.baseConfig = takeValue(); }
    else if (arg === "--style") { flags.stylesheet = takeValue(); }
    else if (arg === "--cache-dir") { flags.cacheDir = takeValue(); }
    else if (arg === "--bin") { flags.bin = takeValue(); }
    else if (arg === "--compositor") { flags.compositor = takeValue(); }
    else if (arg === "--interval") { flags.interval = takeValue(); }
    else if (arg === "--backoff") { flags.backoff = takeValue(); }
    else if (arg === "--query-timeout") { flags.queryTimeout = takeValue(); }
    else if (arg === "--verbose" || arg === "-v") { flags.verbose = "true"; }
    else if (arg === "--check") { mode = "check"; }
    else if (arg === "-V" || arg === "--version") { mode = "version"; }
    else if (arg === "-h" || arg === "--help") { mode = "help"; }
    else { Logger.warn(`Unknown argument: ${arg}`); }
  }

  const path = (flag: string | undefined, envVar: string, fallback: string) =>
    expandHome(flag ?? env[envVar] ?? fallback, home);

  return {
    mode,
    baseConfig: path(flags.baseConfig, "BARSYNC_BASE_CONFIG", "~/.config/waybar/config.jsonc"),
    stylesheet: path(flags.stylesheet, "BARSYNC_STYLE", "~/.config/waybar/style.css"),
    cacheDir: path(flags.cacheDir, "BARSYNC_CACHE_DIR", "~/.cache/barsync"),
    bin: flags.bin ?? env.BARSYNC_BIN ?? "waybar",
    compositor: flags.compositor ?? env.BARSYNC_COMPOSITOR ?? "hyprctl",
    intervalMs: parseDuration("--interval", flags.interval ?? env.BARSYNC_INTERVAL_MS ?? "500"),
    backoffMs: parseDuration("--backoff", flags.backoff ?? env.BARSYNC_BACKOFF_MS ?? "1000"),
    queryTimeoutMs: parseDuration("--query-timeout", flags.queryTimeout ?? "2000"),
    verbose: flags.verbose === "true",
    logEnv: { name: "WAYBAR_LOG_LEVEL", value: "error" },
  };
}

export function usage(version: string): string {
  return `barsync ${version} — one status bar per output, shown only over occupied workspaces

usage:
  barsync [options]

options:
  --base-config <path>   companion base config to include (default: ~/.config/waybar/config.jsonc)
  --style <path>         stylesheet passed to the companion (default: ~/.config/waybar/style.css)
  --cache-dir <path>     where per-output configs are written (default: ~/.cache/barsync)
  --bin <cmd>            companion executable (default: waybar)
  --compositor <cmd>     compositor control command (default: hyprctl)
  --interval <ms>        poll interval (default: 500)
  --backoff <ms>         extra sleep after a failed cycle (default: 1000)
  --query-timeout <ms>   bound on each compositor query (default: 2000)
  --check                probe once, print outputs / tallies / desired set as JSON, exit
  -v, --verbose          debug logging (also needs BARSYNC_LOG_LEVEL=DEBUG)
  -V, --version          print version
  -h, --help             this help

environment:
  BARSYNC_BASE_CONFIG, BARSYNC_STYLE, BARSYNC_CACHE_DIR, BARSYNC_BIN,
  BARSYNC_COMPOSITOR, BARSYNC_INTERVAL_MS, BARSYNC_BACKOFF_MS  (flags win)
  BARSYNC_LOG_LEVEL=DEBUG                                     (with --verbose)`;
}
