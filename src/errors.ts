/**
 * Structured error types for barsync.
 *
 * Error boundaries wrap failures with barsyncError instead of passing
 * e.message around, so the cause and stack survive into debug logs.
 */

export type BarsyncErrorKind =
  | "probe_error"
  | "launch_error"
  | "stop_error"
  | "config_error"
  | "cycle_error";

export interface BarsyncError extends Error {
  kind: BarsyncErrorKind;
  output?: string;
  command?: string;
  retryable: boolean;
  cause?: unknown;
}

/**
 * Create a BarsyncError with structured fields.
 */
export function barsyncError(
  kind: BarsyncErrorKind,
  message: string,
  opts: {
    output?: string;
    command?: string;
    retryable?: boolean;
    cause?: unknown;
  } = {},
): BarsyncError {
  const err: BarsyncError = Object.assign(new Error(message), {
    kind,
    retryable: opts.retryable ?? false,
  });
  if (opts.output) err.output = opts.output;
  if (opts.command) err.command = opts.command;
  if (opts.cause !== undefined) err.cause = opts.cause;
  return err;
}

/**
 * Normalize an unknown thrown value into an Error.
 * Handles strings, objects, nulls: whatever a callee may throw.
 */
export function asError(e: unknown): Error {
  if (e instanceof Error) return e;
  if (typeof e === "string") return new Error(e.slice(0, 1024));
  if (e === null || e === undefined) return new Error("Unknown error");
  try {
    return new Error(String(e));
  } catch {
    return new Error("Unknown error");
  }
}

export function isBarsyncError(e: unknown): e is BarsyncError {
  return e instanceof Error && "kind" in e && "retryable" in e;
}

/**
 * Format a BarsyncError for structured logging.
 * Returns a plain object suitable for JSON.stringify.
 */
export function errorLogFields(e: BarsyncError): Record<string, unknown> {
  const fields: Record<string, unknown> = {
    kind: e.kind,
    message: e.message,
    retryable: e.retryable,
  };
  if (e.output) fields.output = e.output;
  if (e.command) fields.command = e.command;
  if (e.cause) {
    const cause = asError(e.cause);
    fields.cause_message = cause.message;
    if (cause.stack) fields.cause_stack = cause.stack;
  }
  if (e.stack) fields.stack = e.stack;
  return fields;
}
