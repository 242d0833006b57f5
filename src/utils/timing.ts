/**
 * Timing helpers shared by the BLE layers.
 *
 * Timers are plain setTimeout so fake timers drive them in tests.
 */

/**
 * Error raised when a bounded operation runs out of time.
 */
export class TimeoutError extends Error {
  constructor(
    message: string,
    public readonly timeoutMs: number,
  ) {
    super(message);
    this.name = "TimeoutError";
  }
}

/**
 * Races a promise against a timer.
 * Rejects with TimeoutError if the timer fires first; the original promise
 * keeps running and its outcome is ignored.
 */
export const withTimeout = <T>(
  promise: Promise<T>,
  timeoutMs: number,
  label: string,
): Promise<T> =>
  new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(new TimeoutError(`${label} timed out after ${timeoutMs}ms`, timeoutMs));
    }, timeoutMs);

    promise
      .then(resolve)
      .catch(reject)
      .finally(() => {
        clearTimeout(timer);
      });
  });

/**
 * Resolve after the given delay.
 */
export const sleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Normalize an unknown thrown value into an Error.
 */
export const toError = (error: unknown): Error =>
  error instanceof Error ? error : new Error(String(error));
