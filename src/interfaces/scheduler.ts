/** A cancellable periodic action. */
export interface TickHandle {
  cancel(): void;
}

/** Invokes a zero-argument action at a fixed interval until cancelled. */
export interface Scheduler {
  every(intervalMs: number, action: () => void): TickHandle;
}
