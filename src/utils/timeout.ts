import { TimeoutFailure } from "./errors.js";

/**
 * Runs `fn` with an abort signal that fires after `timeoutMs`. Anything thrown
 * once the signal has fired is reported as a TimeoutFailure.
 */
export async function callWithTimeout<T>(
  label: string,
  timeoutMs: number,
  fn: (signal: AbortSignal) => Promise<T>
): Promise<T> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);

  try {
    return await fn(controller.signal);
  } catch (err) {
    if (controller.signal.aborted) {
      throw new TimeoutFailure(`${label} timed out after ${timeoutMs}ms`, { cause: err });
    }
    throw err;
  } finally {
    clearTimeout(timer);
  }
}
