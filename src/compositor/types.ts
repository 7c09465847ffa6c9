/**
 * Shapes exchanged with the compositor's JSON query interface, and the
 * normalized snapshot the reconciler works from.
 */

export type WorkspaceId = number | string;

export interface WindowState {
  workspace: WorkspaceId | undefined;
  mapped: boolean;
  hidden: boolean;
}

export interface CompositorSnapshot {
  /** Output name → id of the workspace currently active on it. */
  outputs: Map<string, WorkspaceId>;
  windows: WindowState[];
}

export interface CommandResult {
  code: number | null;
  stdout: string;
}

/**
 * Runs a command to completion and reports its exit code and stdout.
 * May reject when the command cannot be launched at all.
 */
export type CommandRunner = (
  command: string,
  args: string[],
  timeoutMs: number,
) => Promise<CommandResult>;
