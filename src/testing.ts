/**
 * Public test utilities, exported from the `"jobkeeper/testing"` entry point.
 * In-process stand-ins for the spawn capability and the scheduler, so jobs can be
 * driven deterministically without real child processes or timers.
 */
export { MockProcessHandle, MockProcessManager } from "./testing/mock-process-manager.js";
export { ManualScheduler } from "./testing/manual-scheduler.js";
export { QueueDispatcher } from "./core/queue-dispatcher.js";
export { NoopLogger, noopLogger } from "./utils/noop-logger.js";
