/**
 * Promise timeout helper that clears its timer on resolve/reject.
 *
 * Avoid a bare `Promise.race([promise, timeoutRejectPromise])`: when `promise`
 * wins, the pending timer would keep the event loop alive and the timeout
 * promise could still reject later as an unhandled rejection.
 */

export class TimeoutError extends Error {
  constructor(readonly label: string, readonly timeoutMs: number) {
    super(`Timeout (${timeoutMs}ms): ${label}`);
    this.name = 'TimeoutError';
  }
}

export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  label: string,
): Promise<T> {
  const ms = Math.max(0, Math.floor(timeoutMs || 0));
  const name = label || 'operation';

  let timer: ReturnType<typeof setTimeout> | null = null;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(name, ms)), ms);
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    if (timer) clearTimeout(timer);
  }
}

/**
 * Resolves to the promise's value, or to `undefined` when it rejects or
 * exceeds `timeoutMs`. The error is passed to `onError` for logging.
 */
export async function settleWithin<T>(
  promise: Promise<T>,
  timeoutMs: number,
  label: string,
  onError?: (err: Error) => void,
): Promise<T | undefined> {
  try {
    return await withTimeout(promise, timeoutMs, label);
  } catch (err) {
    onError?.(err instanceof Error ? err : new Error(String(err)));
    return undefined;
  }
}

/** Resolves after `ms`, or as soon as `signal` aborts. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise(resolve => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
