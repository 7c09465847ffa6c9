import type { WindowState, WorkspaceId } from "../compositor/types.js";

/** Count of mapped, non-hidden windows per workspace. */
export function tallyVisibleWindows(windows: readonly WindowState[]): Map<WorkspaceId, number> {
  const tally = new Map<WorkspaceId, number>();
  for (const w of windows) {
    if (w.workspace === undefined) continue;
    if (!w.mapped || w.hidden) continue;
    tally.set(w.workspace, (tally.get(w.workspace) ?? 0) + 1);
  }
  return tally;
}

/**
 * Outputs that should have a companion right now: those whose active
 * workspace holds at least one visible window. An empty active workspace
 * means no companion on that output.
 */
export function desiredOutputs(
  outputs: ReadonlyMap<string, WorkspaceId>,
  windows: readonly WindowState[],
): Set<string> {
  const tally = tallyVisibleWindows(windows);
  const desired = new Set<string>();
  for (const [output, workspace] of outputs) {
    if ((tally.get(workspace) ?? 0) > 0) desired.add(output);
  }
  return desired;
}

export interface StateReport {
  outputs: Record<string, string | number>;
  tallies: Record<string, number>;
  desired: string[];
}

/** Plain-object view of one probe, for `--check`. */
export function describeState(
  outputs: ReadonlyMap<string, WorkspaceId>,
  windows: readonly WindowState[],
): StateReport {
  const tallies: Record<string, number> = {};
  for (const [workspace, count] of tallyVisibleWindows(windows)) tallies[String(workspace)] = count;
  return {
    outputs: Object.fromEntries(outputs),
    tallies,
    desired: [...desiredOutputs(outputs, windows)].sort(),
  };
}
