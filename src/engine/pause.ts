import { setTimeout as delay } from "timers/promises";

/**
 * Sleep for `ms`, returning early (without throwing) when `signal` aborts.
 * Returns false when the sleep was cut short.
 */
export async function pause(ms: number, signal?: AbortSignal): Promise<boolean> {
  if (signal?.aborted) return false;
  try {
    await delay(ms, undefined, { signal });
    return true;
  } catch (err) {
    if (signal?.aborted) return false;
    throw err;
  }
}
