import { spawn as nodeSpawn } from "node:child_process";
import { errnoCode, SpawnError, TerminationError, type TerminationFailure } from "../errors.js";
import type { Logger } from "../interfaces/logger.js";
import type {
  KillScope,
  KillSignal,
  ProcessHandle,
  ProcessManager,
  SpawnOptions,
} from "../interfaces/process-manager.js";
import { noopLogger } from "../utils/noop-logger.js";
import { signalExitCode } from "../utils/signals.js";

/** How long after "exit" to wait for stdio to close before reporting the exit anyway. */
const DEFAULT_STDIO_CLOSE_GRACE_MS = 2000;

export interface NodeProcessManagerOptions {
  logger?: Logger;
  /**
   * A grandchild that inherited the pipes can hold them open after the child exits.
   * The exit is reported this long after the child's "exit" event even if stdio is still open.
   */
  stdioCloseGraceMs?: number;
}

/** Map a failed kill(2) to the reason reported by Job.terminate(). */
export function classifyKillError(err: unknown): TerminationFailure {
  switch (errnoCode(err)) {
    case "ESRCH":
      return "no_process";
    case "EPERM":
      return "access_denied";
    case "EINVAL":
    case "ERR_UNKNOWN_SIGNAL":
      return "bad_signal";
    default:
      return "error";
  }
}

/**
 * Node.js process manager using child_process.spawn.
 * stdin is ignored; stdout and stderr are piped and left paused for a StreamReader to pull.
 */
export class NodeProcessManager implements ProcessManager {
  private readonly logger: Logger;
  private readonly stdioCloseGraceMs: number;

  constructor(options: NodeProcessManagerOptions = {}) {
    this.logger = options.logger ?? noopLogger;
    this.stdioCloseGraceMs = options.stdioCloseGraceMs ?? DEFAULT_STDIO_CLOSE_GRACE_MS;
  }

  spawn(options: SpawnOptions): ProcessHandle {
    const groupLeader = options.groupLeader ?? false;
    const child = nodeSpawn(options.command, options.args, {
      cwd: options.cwd,
      // undefined values unset inherited variables
      env: options.env ? { ...process.env, ...options.env } : undefined,
      stdio: ["ignore", "pipe", "pipe"],
      detached: groupLeader,
      windowsHide: options.hideConsole ?? false,
    });

    // ENOENT-style failures arrive as an async "error" event; keep them from becoming
    // unhandled exceptions. The missing pid below is what reports the failure.
    child.on("error", (err) => {
      this.logger.debug?.("Child process error", { command: options.command, error: err });
    });

    if (typeof child.pid !== "number") {
      child.stdout?.destroy();
      child.stderr?.destroy();
      throw new SpawnError(`Failed to spawn process: ${options.command}`);
    }

    const pid = child.pid;
    let exitSeen = false;
    let status: number | null = null;
    let settle: (code: number) => void = () => {};
    const exited = new Promise<number>((resolve) => {
      settle = (code) => {
        if (status !== null) return;
        status = code;
        resolve(code);
      };
    });

    const toExitCode = (code: number | null, signal: NodeJS.Signals | null): number => {
      if (code !== null) return code;
      return signal ? signalExitCode(signal) : -1;
    };

    child.once("exit", (code, signal) => {
      exitSeen = true;
      const timer = setTimeout(() => settle(toExitCode(code, signal)), this.stdioCloseGraceMs);
      timer.unref();
    });
    // "close" fires after "exit" once stdout/stderr are closed too, i.e. all output was read.
    child.once("close", (code, signal) => settle(toExitCode(code, signal)));

    const logger = this.logger;
    return {
      pid,
      stdout: child.stdout,
      stderr: child.stderr,
      exited,
      exitCode: () => status,
      kill(signal: KillSignal = "SIGTERM", scope: KillScope = "process") {
        if (exitSeen) {
          throw new TerminationError(`Process ${pid} has already exited`, "no_process");
        }
        if (scope === "tree" && groupLeader && process.platform === "win32") {
          killTreeWindows(pid, signal, logger);
          return;
        }
        // A negative pid addresses the whole process group led by the child.
        const target = scope === "tree" && groupLeader ? -pid : pid;
        try {
          process.kill(target, signal);
        } catch (err) {
          const reason = classifyKillError(err);
          logger.debug?.("Kill request failed", { pid, signal, scope, reason, error: err });
          throw new TerminationError(`Failed to signal process ${pid}: ${reason}`, reason, {
            cause: err,
          });
        }
      },
    };
  }

  isAlive(pid: number): boolean {
    try {
      process.kill(pid, 0);
      return true;
    } catch {
      return false;
    }
  }
}

function killTreeWindows(pid: number, signal: KillSignal, logger: Logger): void {
  const args = ["/T", "/PID", String(pid)];
  if (signal === "SIGKILL") args.unshift("/F");
  const killer = nodeSpawn("taskkill", args, {
    stdio: "ignore",
    detached: true,
    windowsHide: true,
  });
  killer.on("error", (err) => {
    logger.warn("taskkill failed", { pid, error: err });
  });
  killer.unref();
}
