import { PipelineCancelledError } from "../errors";

/**
 * Settles with `promise`, or rejects with `onTimeout()` after `timeoutMs`, or with
 * PipelineCancelledError once `signal` aborts. The timer never outlives the call.
 */
export function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  onTimeout: () => Error,
  signal?: AbortSignal,
): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => {
      settle();
      reject(new PipelineCancelledError());
    };
    const timer = setTimeout(() => {
      settle();
      reject(onTimeout());
    }, timeoutMs);
    function settle(): void {
      clearTimeout(timer);
      signal?.removeEventListener("abort", onAbort);
    }

    promise
      .then((value) => {
        settle();
        resolve(value);
      })
      .catch((error: unknown) => {
        settle();
        reject(error);
      });
    if (signal?.aborted) {
      onAbort();
    } else {
      signal?.addEventListener("abort", onAbort, { once: true });
    }
  });
}

export function throwIfCancelled(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new PipelineCancelledError();
  }
}
