import type { Logger } from "../interfaces/logger.js";

/** Discards everything. */
export class NoopLogger implements Logger {
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
}

/** Default for every component that takes an optional logger. */
export const noopLogger: Logger = new NoopLogger();
