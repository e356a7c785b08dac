import type { Scheduler, TickHandle } from "../interfaces/scheduler.js";

/** setInterval-backed scheduler. */
export class IntervalScheduler implements Scheduler {
  every(intervalMs: number, action: () => void): TickHandle {
    const timer = setInterval(action, intervalMs);
    let cancelled = false;
    return {
      cancel() {
        if (cancelled) return;
        cancelled = true;
        clearInterval(timer);
      },
    };
  }
}

export const intervalScheduler: Scheduler = new IntervalScheduler();
