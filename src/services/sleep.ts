import { setTimeout as delay } from "timers/promises";

/**
 * Waits `ms` milliseconds. Resolves to false instead of waiting out the
 * delay when `signal` is aborted.
 */
export type Sleep = (ms: number, signal?: AbortSignal) => Promise<boolean>;

export const sleep: Sleep = async (ms, signal) => {
  if (signal?.aborted) {
    return false;
  }
  try {
    await delay(ms, undefined, { signal });
    return true;
  } catch (error) {
    if (signal?.aborted) {
      return false;
    }
    throw error;
  }
};
