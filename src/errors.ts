export class JobKeeperError extends Error {
  readonly code: string;

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "JobKeeperError";
    this.code = code;
  }
}

// ── Domain errors ──

/** The child process could not be created. Fatal to the Job that tried. */
export class SpawnError extends JobKeeperError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "SPAWN", options);
    this.name = "SpawnError";
  }
}

/** An operation or property change is not allowed in the Job's current state. */
export class InvalidStateError extends JobKeeperError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "INVALID_STATE", options);
    this.name = "InvalidStateError";
  }
}

/** Why a kill request failed. */
export type TerminationFailure = "bad_signal" | "access_denied" | "no_process" | "error";

export class TerminationError extends JobKeeperError {
  readonly reason: TerminationFailure;

  constructor(message: string, reason: TerminationFailure, options?: ErrorOptions) {
    super(message, "TERMINATION", options);
    this.name = "TerminationError";
    this.reason = reason;
  }
}

export class ConfigError extends JobKeeperError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "CONFIG", options);
    this.name = "ConfigError";
  }
}

/** A job started in sync mode exited with a non-zero code. */
export class JobExitError extends JobKeeperError {
  readonly exitCode: number;

  constructor(message: string, exitCode: number, options?: ErrorOptions) {
    super(message, "JOB_EXIT", options);
    this.name = "JobExitError";
    this.exitCode = exitCode;
  }
}

// ── Utilities ──

/** Coerce unknown thrown value to JobKeeperError (preserves cause chain). */
export function toJobKeeperError(value: unknown): JobKeeperError {
  if (value instanceof JobKeeperError) return value;
  if (value instanceof Error) return new JobKeeperError(value.message, "UNKNOWN", { cause: value });
  return new JobKeeperError(String(value ?? "Unknown error"), "UNKNOWN");
}

/** Extract error message string from unknown thrown value. */
export function errorMessage(value: unknown): string {
  if (value instanceof Error) return value.message;
  if (value == null) return "Unknown error";
  return String(value);
}

/** Read the errno-style `code` off a thrown value, if it has one. */
export function errnoCode(value: unknown): string | undefined {
  if (typeof value !== "object" || value === null || !("code" in value)) return undefined;
  const { code } = value;
  return typeof code === "string" ? code : undefined;
}
