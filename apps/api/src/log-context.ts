import { AsyncLocalStorage } from "node:async_hooks";

export type LogContext = {
  requestId?: string;
  /** Username of the authenticated caller, once the auth hook has run. */
  actor?: string;
};

const storage = new AsyncLocalStorage<LogContext>();

export function setLogContext(context: LogContext): void {
  storage.enterWith(context);
}

export function mergeLogContext(patch: LogContext): void {
  setLogContext({ ...storage.getStore(), ...patch });
}

export function getLogContext(): LogContext | undefined {
  return storage.getStore();
}

/** Run a script or job step with its own context (no request in scope). */
export function runWithLogContext<T>(context: LogContext, work: () => T): T {
  return storage.run(context, work);
}
