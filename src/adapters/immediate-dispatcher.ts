import type { HostDispatcher } from "../interfaces/dispatcher.js";

/**
 * Defers each callback to a later turn of the Node.js event loop via setImmediate.
 * Callbacks never run inline, so a poll() finishes before any host code it triggers.
 */
export class ImmediateDispatcher implements HostDispatcher {
  dispatch<TArgs extends unknown[]>(fn: (...args: TArgs) => void, ...args: TArgs): void {
    setImmediate(() => fn(...args));
  }
}

/** Shared default dispatcher. */
export const immediateDispatcher: HostDispatcher = new ImmediateDispatcher();
