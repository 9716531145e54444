import type { HostLoop } from "../types";
import { errorMessage, HostDeadlockError } from "../utils/errors";
import { createErrorLog, type DebugLog } from "./debugLog";
import { ResultSlot } from "./resultSlot";

function submit<T>(host: HostLoop, run: (slot: ResultSlot<T>) => void): ResultSlot<T> {
  const slot = new ResultSlot<T>();
  slot.markSubmitted();
  host.asyncCall(() => run(slot));
  return slot;
}

/**
 * Runs `fn` on the host loop and returns its result to the caller, which
 * stays blocked in the meantime. Errors thrown by `fn` are re-thrown here
 * unchanged.
 *
 * A JavaScript caller shares its thread with the host loop, so the call can
 * only complete if the loop runs it synchronously or can be pumped through
 * `flush`. Otherwise, or when called from inside a host callback, this
 * throws `HostDeadlockError` instead of waiting forever.
 */
export function threadsafeCall<A extends unknown[], T>(
  host: HostLoop,
  fn: (...args: A) => T,
  ...args: A
): T {
  if (host.isDraining?.()) throw new HostDeadlockError();
  let withdrawn = false;
  const slot = submit<T>(host, (s) => {
    if (withdrawn) return;
    try {
      s.resolve(fn(...args));
    } catch (err) {
      s.reject(err);
    }
  });
  if (!slot.isDone()) host.flush?.();
  if (!slot.isDone()) {
    // A call reported as failed never runs.
    withdrawn = true;
    throw new HostDeadlockError();
  }
  return slot.unwrap();
}

/**
 * Awaitable counterpart of `threadsafeCall`. When `fn` returns a promise the
 * call settles with it. Submitted work is never retracted.
 */
export function asyncCall<A extends unknown[], T>(
  host: HostLoop,
  fn: (...args: A) => T | PromiseLike<T>,
  ...args: A
): Promise<T> {
  const slot = submit<T>(host, (s) => {
    let ret: T | PromiseLike<T>;
    try {
      ret = fn(...args);
    } catch (err) {
      s.reject(err);
      return;
    }
    Promise.resolve(ret).then(
      (value) => { s.resolve(value); },
      (err: unknown) => { s.reject(err); },
    );
  });
  return slot.promise;
}

export type GoOptions = {
  suppress?: boolean;
  debugLog?: DebugLog;
};

/**
 * Lets `task` run in the background. Unless `suppress` is false, a failure
 * is logged and the returned promise resolves to `undefined`.
 */
export function go<T>(task: PromiseLike<T>, options: GoOptions & { suppress: false }): Promise<T>;
export function go<T>(task: PromiseLike<T>, options?: GoOptions): Promise<T | undefined>;
export function go<T>(task: PromiseLike<T>, options: GoOptions = {}): Promise<T | undefined> {
  const run = Promise.resolve(task);
  if (options.suppress === false) return run;
  const errorLog = createErrorLog(options);
  return run.catch((err: unknown) => {
    errorLog(`background task failed: ${errorMessage(err)}`);
    return undefined;
  });
}
