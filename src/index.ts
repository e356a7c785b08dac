/**
 * jobkeeper public API barrel.
 *
 * Re-exports the job supervisor, the stream reader, their host-side collaborators
 * (process manager, dispatchers, scheduler, logger), configuration and errors.
 * @module
 */

// Adapters
export { ImmediateDispatcher, immediateDispatcher } from "./adapters/immediate-dispatcher.js";
export { IntervalScheduler, intervalScheduler } from "./adapters/interval-scheduler.js";
export type { NodeProcessManagerOptions } from "./adapters/node-process-manager.js";
export { classifyKillError, NodeProcessManager } from "./adapters/node-process-manager.js";
export type { StructuredLoggerOptions } from "./adapters/structured-logger.js";
export { LogLevel, parseLogLevel, StructuredLogger } from "./adapters/structured-logger.js";
// Config
export {
  commandSchema,
  execFlagsSchema,
  jobConfigSchema,
  pollIntervalSchema,
} from "./config/config-schema.js";
// Core
export type {
  ExitCallback,
  JobOptions,
  JobState,
  KillResult,
  OutputCallback,
} from "./core/job.js";
export { Job } from "./core/job.js";
export type { OrphanReaperOptions } from "./core/orphan-reaper.js";
export { defaultReaper, OrphanReaper } from "./core/orphan-reaper.js";
export { QueueDispatcher } from "./core/queue-dispatcher.js";
export type { StreamReaderOptions } from "./core/stream-reader.js";
export { DEFAULT_READER_POLL_MS, StreamReader } from "./core/stream-reader.js";
// Errors
export type { TerminationFailure } from "./errors.js";
export {
  ConfigError,
  errorMessage,
  InvalidStateError,
  JobExitError,
  JobKeeperError,
  SpawnError,
  TerminationError,
  toJobKeeperError,
} from "./errors.js";
// Interfaces
export type { HostDispatcher } from "./interfaces/dispatcher.js";
export type { Logger } from "./interfaces/logger.js";
export type {
  KillScope,
  KillSignal,
  ProcessHandle,
  ProcessManager,
  SpawnOptions,
} from "./interfaces/process-manager.js";
export type { Scheduler, TickHandle } from "./interfaces/scheduler.js";
// Types
export type { ExecFlags, ExecMode, JobConfig, ResolvedJobConfig } from "./types/config.js";
export {
  DEFAULT_EXEC_FLAGS,
  DEFAULT_JOB_CONFIG,
  parseCommand,
  resolveExecFlags,
  resolveJobConfig,
} from "./types/config.js";
// Utils
export { NoopLogger, noopLogger } from "./utils/noop-logger.js";
export type { SignalHandlerOptions, SignalSource } from "./utils/signal-handler.js";
export { registerSignalHandlers } from "./utils/signal-handler.js";
export { signalExitCode, signalNumber } from "./utils/signals.js";
