/**
* Timeout and cancellation helpers
*
* Promise timeouts that also cancel the underlying work through an
* AbortSignal, linked to any signal the caller already holds.
*/

/** Upper bound for any single timeout, in milliseconds */
const MAX_TIMEOUT_MS = 300000;

export interface TimeoutOptions {
  /** Signal of the enclosing operation; its abort propagates to the child */
  parentSignal?: AbortSignal | undefined;
  /** Builds the rejection reason when the timeout fires */
  onTimeout?: (timeoutMs: number) => Error;
}

/**
* A controller whose signal aborts when either the parent aborts or the
* controller itself is aborted. Call `release()` once the work settles so the
* parent does not keep a listener alive.
*/
export function createLinkedAbortController(parent?: AbortSignal): {
  controller: AbortController;
  release: () => void;
} {
  const controller = new AbortController();
  if (!parent) {
    return { controller, release: () => undefined };
  }

  if (parent.aborted) {
    controller.abort(parent.reason);
    return { controller, release: () => undefined };
  }

  const onAbort = (): void => controller.abort(parent.reason);
  parent.addEventListener('abort', onAbort, { once: true });
  return {
    controller,
    release: () => parent.removeEventListener('abort', onAbort),
  };
}

/**
* Run `operation` with a deadline.
*
* The operation receives a signal that aborts when the deadline passes or the
* parent signal aborts. On timeout the returned promise rejects with the
* `onTimeout` error even if the operation ignores its signal.
*
* @param ms - Timeout in milliseconds (clamped to 1..300000)
*/
export async function withTimeout<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  ms: number,
  options: TimeoutOptions = {}
): Promise<T> {
  const boundedMs = Math.min(Math.max(1, ms), MAX_TIMEOUT_MS);
  const { controller, release } = createLinkedAbortController(options.parentSignal);
  let timeoutId: ReturnType<typeof setTimeout> | undefined;

  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      const reason = options.onTimeout?.(boundedMs) ?? new Error(`Timeout exceeded after ${boundedMs}ms`);
      controller.abort(reason);
      reject(reason);
    }, boundedMs);
  });

  try {
    return await Promise.race([operation(controller.signal), timeoutPromise]);
  } finally {
    clearTimeout(timeoutId);
    release();
  }
}
