import type { Readable } from "node:stream";

/**
 * Signals accepted by {@link ProcessHandle.kill}.
 * Names or numbers the platform does not know are rejected as bad signals.
 */
export type KillSignal = NodeJS.Signals | number;

/**
 * Which processes a kill request reaches.
 * "tree" signals the child's whole process group, and only differs from "process"
 * when the child was spawned as a group leader.
 */
export type KillScope = "process" | "tree";

/** A handle to a spawned process with piped stdout/stderr. */
export interface ProcessHandle {
  readonly pid: number;
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  /**
   * Non-blocking exit status query. Null while the process is running or its pipes are
   * still open; negative signal number when the process was killed by a signal.
   */
  exitCode(): number | null;
  /** Resolves with the same value `exitCode()` settles on. */
  readonly exited: Promise<number>;
  /** Send a signal. Throws TerminationError when the request cannot be delivered. */
  kill(signal?: KillSignal, scope?: KillScope): void;
}

export interface SpawnOptions {
  command: string;
  args: string[];
  cwd?: string;
  env?: Record<string, string | undefined>;
  /** Suppress the console window the platform would otherwise open (Windows). */
  hideConsole?: boolean;
  /** Start the child in its own process group so tree-scoped kills reach its descendants. */
  groupLeader?: boolean;
}

export interface ProcessManager {
  /** Spawn a process. Throws SpawnError when it cannot be created. */
  spawn(options: SpawnOptions): ProcessHandle;
  /** Check if a PID is alive (signal 0). */
  isAlive(pid: number): boolean;
}
