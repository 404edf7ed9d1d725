/**
 * Abortable sleep
 */

/**
 * Sleep for the specified number of milliseconds
 *
 * Rejects with the signal's reason as soon as the signal aborts, and
 * immediately when it is already aborted.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timeoutId);
      reject(signal?.reason);
    };

    const timeoutId = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);

    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
