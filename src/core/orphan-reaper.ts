import type { Logger } from "../interfaces/logger.js";
import type { ProcessHandle } from "../interfaces/process-manager.js";
import { noopLogger } from "../utils/noop-logger.js";

export interface OrphanReaperOptions {
  logger?: Logger;
  /** Registers the host-exit hook. Defaults to `process.once("exit", ...)`. */
  onHostExit?: (listener: () => void) => void;
}

/**
 * Last-resort cleanup for processes whose owner never shut them down.
 *
 * Owners register their running process with `track()` and remove it with `untrack()`
 * once they have terminated it. Anything still tracked is force-killed when its owner is
 * garbage-collected or when the host process exits. Kill failures are logged and dropped.
 */
export class OrphanReaper {
  private readonly owners = new WeakMap<object, ProcessHandle>();
  private readonly live = new Set<ProcessHandle>();
  private readonly registry: FinalizationRegistry<ProcessHandle>;
  private readonly logger: Logger;
  private readonly onHostExit: (listener: () => void) => void;
  private hookInstalled = false;

  constructor(options: OrphanReaperOptions = {}) {
    this.logger = options.logger ?? noopLogger;
    this.onHostExit = options.onHostExit ?? ((listener) => process.once("exit", listener));
    this.registry = new FinalizationRegistry((handle) => this.reap(handle, "owner collected"));
  }

  track(owner: object, handle: ProcessHandle): void {
    this.untrack(owner);
    this.owners.set(owner, handle);
    this.live.add(handle);
    this.registry.register(owner, handle, owner);
    if (!this.hookInstalled) {
      this.hookInstalled = true;
      this.onHostExit(() => this.reapAll("host exit"));
    }
  }

  untrack(owner: object): void {
    const handle = this.owners.get(owner);
    if (!handle) return;
    this.owners.delete(owner);
    this.live.delete(handle);
    this.registry.unregister(owner);
  }

  isTracked(owner: object): boolean {
    const handle = this.owners.get(owner);
    return handle !== undefined && this.live.has(handle);
  }

  get size(): number {
    return this.live.size;
  }

  /** Force-kill every tracked process. Returns how many kill requests were sent. */
  reapAll(reason = "reapAll"): number {
    let killed = 0;
    for (const handle of [...this.live]) {
      if (this.reap(handle, reason)) killed++;
    }
    return killed;
  }

  private reap(handle: ProcessHandle, reason: string): boolean {
    if (!this.live.delete(handle)) return false;
    if (handle.exitCode() !== null) return false;
    try {
      handle.kill("SIGKILL", "process");
      this.logger.warn("Killed orphaned process", { pid: handle.pid, reason });
      return true;
    } catch (err) {
      this.logger.debug?.("Orphan kill failed", { pid: handle.pid, reason, error: err });
      return false;
    }
  }
}

/** Process-wide reaper used by jobs that are not given their own. */
export const defaultReaper = new OrphanReaper();
