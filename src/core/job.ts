import { immediateDispatcher } from "../adapters/immediate-dispatcher.js";
import { intervalScheduler } from "../adapters/interval-scheduler.js";
import { NodeProcessManager } from "../adapters/node-process-manager.js";
import { execFlagsSchema, pollIntervalSchema } from "../config/config-schema.js";
import {
  ConfigError,
  errorMessage,
  InvalidStateError,
  JobExitError,
  SpawnError,
  TerminationError,
  type TerminationFailure,
} from "../errors.js";
import type { HostDispatcher } from "../interfaces/dispatcher.js";
import type { Logger } from "../interfaces/logger.js";
import type {
  KillScope,
  KillSignal,
  ProcessHandle,
  ProcessManager,
} from "../interfaces/process-manager.js";
import type { Scheduler, TickHandle } from "../interfaces/scheduler.js";
import {
  type ExecFlags,
  type JobConfig,
  parseCommand,
  type ResolvedJobConfig,
  resolveExecFlags,
  resolveJobConfig,
} from "../types/config.js";
import { noopLogger } from "../utils/noop-logger.js";
import { signalExitCode } from "../utils/signals.js";
import { defaultReaper, type OrphanReaper } from "./orphan-reaper.js";
import { StreamReader } from "./stream-reader.js";

export type JobState = "idle" | "running" | "terminated";

/** Outcome of {@link Job.terminate}. */
export type KillResult = "ok" | "not_running" | TerminationFailure;

export type OutputCallback = (text: string) => void;
export type ExitCallback = (pid: number, exitCode: number) => void;

export interface JobOptions extends JobConfig {
  /** argv: program first, then its arguments. */
  command: readonly string[];
  processManager?: ProcessManager;
  dispatcher?: HostDispatcher;
  scheduler?: Scheduler;
  logger?: Logger;
  /** Last-resort cleanup for abandoned jobs; null opts out. */
  reaper?: OrphanReaper | null;
  onData?: OutputCallback;
  onError?: OutputCallback;
  onExit?: ExitCallback;
}

interface ActiveProcess {
  handle: ProcessHandle;
  pid: number;
  stdout: StreamReader | null;
  stderr: StreamReader | null;
}

/**
 * Supervises one child process from the host's event loop.
 *
 * `start()` spawns the process and starts a {@link StreamReader} on each output pipe.
 * `poll()` forwards whatever the readers have staged to `onData`/`onError` and, once the
 * process has exited, drains both pipes one last time and fires `onExit`. The host either
 * calls `poll()` itself or sets `pollIntervalMs` to have a tick call it.
 *
 * State only moves forward: idle → running → terminated. A job runs at most once.
 * Callbacks are always delivered through the dispatcher, never from inside poll().
 */
export class Job {
  onData: OutputCallback | null;
  onError: OutputCallback | null;
  onExit: ExitCallback | null;

  private _command: string[];
  private _state: JobState = "idle";
  private active: ActiveProcess | null = null;
  private tick: TickHandle | null = null;
  private exitWaiters: Array<(exitCode: number) => void> = [];
  private readonly config: ResolvedJobConfig;
  private readonly processManager: ProcessManager;
  private readonly dispatcher: HostDispatcher;
  private readonly scheduler: Scheduler;
  private readonly logger: Logger;
  private readonly reaper: OrphanReaper | null;

  constructor(options: JobOptions) {
    const {
      command,
      processManager,
      dispatcher,
      scheduler,
      logger,
      reaper,
      onData,
      onError,
      onExit,
      ...config
    } = options;
    this._command = parseCommand(command);
    this.config = resolveJobConfig(config);
    this.logger = logger ?? noopLogger;
    this.processManager = processManager ?? new NodeProcessManager({ logger: this.logger });
    this.dispatcher = dispatcher ?? immediateDispatcher;
    this.scheduler = scheduler ?? intervalScheduler;
    this.reaper = reaper === undefined ? defaultReaper : reaper;
    this.onData = onData ?? null;
    this.onError = onError ?? null;
    this.onExit = onExit ?? null;
  }

  // ---------------------------------------------------------------------------
  // Properties
  // ---------------------------------------------------------------------------

  get state(): JobState {
    return this._state;
  }

  get isRunning(): boolean {
    return this._state === "running";
  }

  /** Pid of the running process; undefined before start and after termination. */
  get pid(): number | undefined {
    return this.active?.pid;
  }

  getPid(): number | undefined {
    return this.pid;
  }

  get command(): readonly string[] {
    return [...this._command];
  }

  set command(argv: readonly string[]) {
    this.assertNotRunning("command");
    this._command = parseCommand(argv);
  }

  get flags(): ExecFlags {
    return { ...this.config.flags };
  }

  /** Unset fields keep their defaults. */
  set flags(flags: Partial<ExecFlags>) {
    this.assertNotRunning("flags");
    const validation = execFlagsSchema.safeParse(flags);
    if (!validation.success) {
      throw new ConfigError(`Invalid flags: ${validation.error.issues[0]?.message ?? "unknown"}`, {
        cause: validation.error,
      });
    }
    this.config.flags = resolveExecFlags(validation.data);
  }

  get pollIntervalMs(): number | null {
    return this.config.pollIntervalMs;
  }

  /**
   * Milliseconds, truncated to an integer, or null for host-driven polling. Must be at least
   * 1 after truncation. Takes effect at once.
   */
  set pollIntervalMs(intervalMs: number | null) {
    const validation = pollIntervalSchema.safeParse(intervalMs);
    if (!validation.success) {
      throw new InvalidStateError(
        `pollIntervalMs must be a number of at least 1 or null, got ${String(intervalMs)}`,
        { cause: validation.error },
      );
    }
    this.config.pollIntervalMs = validation.data;
    if (this.isRunning) this.armTick();
  }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  /**
   * Spawn the process and start reading its output. Returns the pid.
   * A spawn failure is fatal: the job ends up terminated without firing onExit.
   */
  start(cwd?: string): number {
    if (this._state !== "idle") {
      throw new InvalidStateError(`Cannot start a job that is ${this._state}`);
    }

    const [program, ...args] = this._command;
    const { flags, env } = this.config;
    const workingDir = cwd ?? this.config.cwd;

    let handle: ProcessHandle;
    try {
      handle = this.processManager.spawn({
        command: program,
        args,
        cwd: workingDir,
        env,
        hideConsole: flags.hideConsole,
        groupLeader: flags.groupLeader,
      });
    } catch (err) {
      this._state = "terminated";
      this.logger.error("Failed to spawn job", { command: program, cwd: workingDir, error: err });
      if (err instanceof SpawnError) throw err;
      throw new SpawnError(`Failed to spawn ${program}: ${errorMessage(err)}`, { cause: err });
    }

    const readerOptions = { pollMs: this.config.readerPollMs, logger: this.logger };
    const stdout = handle.stdout
      ? new StreamReader(handle.stdout, { ...readerOptions, name: "stdout" })
      : null;
    const stderr = handle.stderr
      ? new StreamReader(handle.stderr, { ...readerOptions, name: "stderr" })
      : null;
    stdout?.start();
    stderr?.start();

    this.active = { handle, pid: handle.pid, stdout, stderr };
    this._state = "running";
    this.reaper?.track(this, handle);
    this.armTick();

    this.logger.info("Job started", { pid: handle.pid, command: program, args: args.join(" ") });
    return handle.pid;
  }

  /**
   * Send `signal` to the process and end the job without waiting for the process to exit.
   * Kill failures come back as the result; the job is terminated either way.
   */
  terminate(signal: KillSignal = "SIGTERM", scope: KillScope = "process"): KillResult {
    const active = this.active;
    if (!active) return "not_running";

    this.disarmTick();
    let result: KillResult = "ok";
    try {
      active.handle.kill(signal, scope);
    } catch (err) {
      result = err instanceof TerminationError ? err.reason : "error";
      this.logger.warn("Kill request failed", {
        pid: active.pid,
        signal,
        scope,
        reason: result,
        error: err,
      });
    }

    const exitCode = active.handle.exitCode() ?? signalExitCode(signal);
    // A process that may still be alive stays with the reaper.
    this.finish(exitCode, result === "ok" || !this.processManager.isAlive(active.pid));
    return result;
  }

  /**
   * Forward staged output to the callbacks and detect exit. Never blocks.
   * On exit both pipes are drained one last time, so output precedes onExit.
   */
  poll(): void {
    const active = this.active;
    if (!active) return;

    const exitCode = active.handle.exitCode();
    const exited = exitCode !== null;
    this.deliver(active.stdout, exited, this.onData);
    this.deliver(active.stderr, exited, this.onError);
    if (exited) this.finish(exitCode, true);
  }

  /**
   * SIGTERM, wait up to `graceMs` for the process to exit, then SIGKILL.
   * The whole process group is signalled when the job was started as group leader.
   */
  async shutdown(graceMs = this.config.killGracePeriodMs): Promise<void> {
    const active = this.active;
    if (!active) return;

    const { handle, pid } = active;
    const scope: KillScope = this.config.flags.groupLeader ? "tree" : "process";
    if (this.terminate("SIGTERM", scope) !== "ok") return;

    let killTimer: ReturnType<typeof setTimeout> | undefined;
    const exited = await Promise.race([
      handle.exited.then(() => true),
      new Promise<false>((resolve) => {
        killTimer = setTimeout(() => resolve(false), graceMs);
      }),
    ]);
    if (killTimer !== undefined) clearTimeout(killTimer);

    if (!exited) {
      this.logger.info("Force-killing job", { pid, graceMs });
      try {
        handle.kill("SIGKILL", scope);
      } catch (err) {
        this.logger.warn("Force kill failed", { pid, error: err });
      }
    }
  }

  /**
   * Start the job and resolve with its exit code once onExit has been delivered.
   * In "sync" mode a non-zero exit code rejects with a JobExitError.
   * Without a poll interval the job is polled once the process exits.
   */
  async run(cwd?: string): Promise<number> {
    this.start(cwd);
    const { handle } = this.requireActive();
    // The terminate sequence only runs from poll() or terminate(), never during start().
    const done = new Promise<number>((resolve) => {
      this.exitWaiters.push(resolve);
    });

    if (this.tick === null) {
      handle.exited
        .then(() => this.poll())
        .catch((err: unknown) => {
          this.logger.error("Final poll failed", { pid: handle.pid, error: err });
        });
    }

    const exitCode = await done;
    if (this.config.flags.mode === "sync" && exitCode !== 0) {
      throw new JobExitError(`${this._command[0]} exited with code ${exitCode}`, exitCode);
    }
    return exitCode;
  }

  /** Tick handler; the same path as an explicit poll(). */
  protected onTick(): void {
    this.poll();
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private deliver(
    reader: StreamReader | null,
    final: boolean,
    callback: OutputCallback | null,
  ): void {
    if (!reader) return;
    let text = "";
    if (final) {
      text = reader.flush();
    } else if (reader.hasData()) {
      text = reader.read();
    }
    if (text !== "" && callback) this.dispatcher.dispatch(callback, text);
  }

  /** The terminate sequence. Runs at most once per job. */
  private finish(exitCode: number, processGone: boolean): void {
    const active = this.active;
    if (!active) return;

    this.disarmTick();
    active.stdout?.stop();
    active.stderr?.stop();
    if (processGone) this.reaper?.untrack(this);
    this._state = "terminated";
    this.active = null;

    this.logger.info("Job exited", { pid: active.pid, exitCode });
    if (this.onExit) this.dispatcher.dispatch(this.onExit, active.pid, exitCode);
    const waiters = this.exitWaiters;
    this.exitWaiters = [];
    for (const resolve of waiters) this.dispatcher.dispatch(resolve, exitCode);
  }

  private armTick(): void {
    this.disarmTick();
    const intervalMs = this.config.pollIntervalMs;
    if (intervalMs === null) return;
    this.tick = this.scheduler.every(intervalMs, () => this.onTick());
  }

  private disarmTick(): void {
    this.tick?.cancel();
    this.tick = null;
  }

  private assertNotRunning(property: string): void {
    if (this.isRunning) {
      throw new InvalidStateError(`Cannot change ${property} while the job is running`);
    }
  }

  private requireActive(): ActiveProcess {
    if (!this.active) throw new InvalidStateError("Job is not running");
    return this.active;
  }
}
