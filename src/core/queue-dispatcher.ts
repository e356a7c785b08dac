import type { HostDispatcher } from "../interfaces/dispatcher.js";

/**
 * Task-queue dispatcher for hosts that run their own loop.
 *
 * `dispatch()` only enqueues; nothing runs until the host calls `drain()` from the
 * context it wants callbacks on. Tasks dispatched while a drain is in progress wait
 * for the next drain, so one drain always terminates.
 */
export class QueueDispatcher implements HostDispatcher {
  private tasks: Array<() => void> = [];

  dispatch<TArgs extends unknown[]>(fn: (...args: TArgs) => void, ...args: TArgs): void {
    this.tasks.push(() => fn(...args));
  }

  /**
   * Run every task queued so far, in FIFO order. Returns how many ran.
   * If a task throws, the tasks after it stay queued and the error propagates.
   */
  drain(): number {
    const batch = this.tasks;
    this.tasks = [];
    let ran = 0;
    try {
      for (const task of batch) {
        ran++;
        task();
      }
    } finally {
      if (ran < batch.length) {
        this.tasks = [...batch.slice(ran), ...this.tasks];
      }
    }
    return ran;
  }

  get size(): number {
    return this.tasks.length;
  }

  clear(): void {
    this.tasks = [];
  }
}
