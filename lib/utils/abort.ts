/**
 * Deadline + caller cancellation folded into one AbortSignal.
 *
 * `reason()` tells the two apart after the fact: "cancelled" when the caller's
 * signal fired, "timeout" when the deadline passed first.
 */
export type AbortReason = "cancelled" | "timeout";

export interface Deadline {
  signal: AbortSignal;
  reason(): AbortReason | null;
  dispose(): void;
}

export function createDeadline(timeoutMs: number, parent?: AbortSignal): Deadline {
  const controller = new AbortController();
  let reason: AbortReason | null = null;

  const onParentAbort = () => {
    if (reason === null) reason = "cancelled";
    controller.abort(parent?.reason);
  };

  if (parent?.aborted) {
    onParentAbort();
  } else if (parent) {
    parent.addEventListener("abort", onParentAbort, { once: true });
  }

  const timer = setTimeout(() => {
    if (reason === null) reason = "timeout";
    controller.abort(new Error(`Timed out after ${timeoutMs}ms`));
  }, timeoutMs);

  return {
    signal: controller.signal,
    reason: () => reason,
    dispose: () => {
      clearTimeout(timer);
      parent?.removeEventListener("abort", onParentAbort);
    },
  };
}

/**
 * Race a promise against a signal. The underlying work is expected to observe
 * the same signal; this only guarantees the caller stops waiting.
 */
export function raceAbort<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) {
    return Promise.reject(abortErrorFrom(signal));
  }
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(abortErrorFrom(signal));
    signal.addEventListener("abort", onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      }
    );
  });
}

function abortErrorFrom(signal: AbortSignal): Error {
  const error = new Error(
    signal.reason instanceof Error ? signal.reason.message : "The operation was aborted"
  );
  error.name = "AbortError";
  return error;
}
