import { errorMessage } from "./hedging/errors.js";

export interface PollingOptions {
  intervalMs: number;
  /** Stop after this many cycles (successful or not). Unlimited when omitted. */
  maxCycles?: number;
  signal?: AbortSignal;
  /** Called with the error of a failed cycle, after it has been logged. */
  onError?: (err: unknown, cycle: number) => void | Promise<void>;
}

/**
 * Run `cycle` back to back with `intervalMs` of sleep in between. Cycles never
 * overlap. A failed cycle is logged and the loop moves on to the next one.
 * Resolves with the number of cycles run.
 */
export async function runPolling(
  cycle: (n: number) => Promise<void>,
  opts: PollingOptions
): Promise<number> {
  const { intervalMs, maxCycles, signal, onError } = opts;
  let count = 0;

  while (!signal?.aborted && (maxCycles === undefined || count < maxCycles)) {
    count++;
    try {
      await cycle(count);
    } catch (err) {
      console.error(`[scheduler] Cycle ${count} failed: ${errorMessage(err)}`);
      if (onError) await onError(err, count);
    }

    if (maxCycles !== undefined && count >= maxCycles) break;
    await sleep(intervalMs, signal);
  }

  return count;
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) return resolve();
    const timer = setTimeout(done, ms);
    function done() {
      clearTimeout(timer);
      signal?.removeEventListener("abort", done);
      resolve();
    }
    signal?.addEventListener("abort", done, { once: true });
  });
}
