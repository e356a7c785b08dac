import { constants } from "node:os";
import type { KillSignal } from "../interfaces/process-manager.js";

const SIGNAL_NUMBERS = new Map<string, number>(Object.entries(constants.signals));

/** Platform signal number for a signal name, or the number itself. */
export function signalNumber(signal: KillSignal): number | undefined {
  return typeof signal === "number" ? signal : SIGNAL_NUMBERS.get(signal);
}

/**
 * Exit code reported for a process ended by `signal`: the negated signal number
 * (SIGTERM → -15 on Linux), or -1 when the platform has no number for it.
 */
export function signalExitCode(signal: KillSignal): number {
  const n = signalNumber(signal);
  return n === undefined || n <= 0 ? -1 : -n;
}
