/**
 * Delivers callbacks onto the host's own execution context.
 * Reader loops never call host callbacks directly; everything goes through here.
 */
export interface HostDispatcher {
  dispatch<TArgs extends unknown[]>(fn: (...args: TArgs) => void, ...args: TArgs): void;
}
