import type { z } from "zod";
import { commandSchema, jobConfigSchema } from "../config/config-schema.js";
import { ConfigError } from "../errors.js";

export type ExecMode = "async" | "sync";

/** Execution options for the spawned process. */
export interface ExecFlags {
  /** "sync" makes `Job.run()` reject when the process exits non-zero. */
  mode: ExecMode;
  /** Suppress the console window on platforms that open one. */
  hideConsole: boolean;
  /** Spawn the child as its own process-group leader. */
  groupLeader: boolean;
}

/** Job configuration with sensible defaults */
export interface JobConfig {
  pollIntervalMs?: number | null; // default: null (host calls poll())
  readerPollMs?: number; // default: 120
  killGracePeriodMs?: number; // default: 5000
  flags?: Partial<ExecFlags>;
  cwd?: string; // default: host cwd
  env?: Record<string, string | undefined>; // default: inherit
}

/** Fully resolved configuration with defaults applied. */
export interface ResolvedJobConfig {
  pollIntervalMs: number | null;
  readerPollMs: number;
  killGracePeriodMs: number;
  flags: ExecFlags;
  cwd: string | undefined;
  env: Record<string, string | undefined> | undefined;
}

export const DEFAULT_EXEC_FLAGS: Readonly<ExecFlags> = {
  mode: "async",
  hideConsole: false,
  groupLeader: false,
};

export const DEFAULT_JOB_CONFIG: Readonly<ResolvedJobConfig> = {
  pollIntervalMs: null,
  readerPollMs: 120,
  killGracePeriodMs: 5000,
  flags: DEFAULT_EXEC_FLAGS,
  cwd: undefined,
  env: undefined,
};

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) =>
      issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
    )
    .join("; ");
}

export function resolveJobConfig(config: JobConfig = {}): ResolvedJobConfig {
  const validation = jobConfigSchema.safeParse(config);
  if (!validation.success) {
    throw new ConfigError(`Invalid job configuration: ${describeIssues(validation.error)}`, {
      cause: validation.error,
    });
  }

  const parsed = validation.data;
  return {
    pollIntervalMs:
      parsed.pollIntervalMs === undefined
        ? DEFAULT_JOB_CONFIG.pollIntervalMs
        : parsed.pollIntervalMs,
    readerPollMs: parsed.readerPollMs ?? DEFAULT_JOB_CONFIG.readerPollMs,
    killGracePeriodMs: parsed.killGracePeriodMs ?? DEFAULT_JOB_CONFIG.killGracePeriodMs,
    flags: resolveExecFlags(parsed.flags),
    cwd: parsed.cwd,
    env: parsed.env,
  };
}

export function resolveExecFlags(flags: Partial<ExecFlags> = {}): ExecFlags {
  return { ...DEFAULT_EXEC_FLAGS, ...stripUndefined(flags) };
}

/** Validate an argv array; returns a fresh copy. */
export function parseCommand(argv: readonly string[]): string[] {
  const validation = commandSchema.safeParse(argv);
  if (!validation.success) {
    throw new ConfigError(`Invalid command: ${describeIssues(validation.error)}`, {
      cause: validation.error,
    });
  }
  return [...validation.data];
}

function stripUndefined(flags: Partial<ExecFlags>): Partial<ExecFlags> {
  const result: Partial<ExecFlags> = {};
  if (flags.mode !== undefined) result.mode = flags.mode;
  if (flags.hideConsole !== undefined) result.hideConsole = flags.hideConsole;
  if (flags.groupLeader !== undefined) result.groupLeader = flags.groupLeader;
  return result;
}
