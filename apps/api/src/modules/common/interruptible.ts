import { CancellationError } from "./errors";

export type IterationResult =
  | { kind: "ok" }
  | { kind: "recoverable"; error: unknown }
  | { kind: "cancelled" };

export function isCancellation(err: unknown, signal?: AbortSignal): boolean {
  return err instanceof CancellationError || Boolean(signal?.aborted);
}

export function throwIfCancelled(signal: AbortSignal): void {
  if (signal.aborted) {
    throw new CancellationError();
  }
}

/**
 * Waits `ms` milliseconds. An abort on `signal` rejects at once with a CancellationError,
 * so a stop never has to sit out an hour-long interval.
 */
export function sleep(ms: number, signal: AbortSignal): Promise<void> {
  if (signal.aborted) {
    return Promise.reject(new CancellationError());
  }

  return new Promise<void>((resolve, reject) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new CancellationError());
    };
    const timer = setTimeout(() => {
      signal.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal.addEventListener("abort", onAbort, { once: true });
  });
}

/** Like sleep, but resolves false instead of rejecting when the wait was cancelled. */
export async function pause(ms: number, signal: AbortSignal): Promise<boolean> {
  try {
    await sleep(ms, signal);
    return true;
  } catch (err) {
    if (isCancellation(err, signal)) return false;
    throw err;
  }
}

/** Runs one loop iteration and tags how it ended. */
export async function runIteration(signal: AbortSignal, body: () => Promise<void>): Promise<IterationResult> {
  try {
    throwIfCancelled(signal);
    await body();
    return signal.aborted ? { kind: "cancelled" } : { kind: "ok" };
  } catch (err) {
    if (isCancellation(err, signal)) return { kind: "cancelled" };
    return { kind: "recoverable", error: err };
  }
}

export type Deferred<T> = {
  promise: Promise<T>;
  resolve: (value: T) => void;
};

export function createDeferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((res) => {
    resolve = res;
  });
  return { promise, resolve };
}
