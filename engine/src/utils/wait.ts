/**
 * Warden Engine — Waiting for OS-side registration
 *
 * A freshly provisioned package becomes visible some time after the
 * installer command returns. Instead of one blind sleep, callers poll a
 * probe a bounded number of times with a growing delay.
 */

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export interface PollOptions {
  /** Total probe calls, including the first */
  attempts: number;
  /** Delay before the second probe */
  intervalMs: number;
  /** Upper bound for the doubling delay */
  maxIntervalMs: number;
  /** Called after every miss, before waiting */
  onMiss?: (attempt: number, nextDelayMs: number) => void;
}

/**
 * Call `probe` until it returns a non-null value or the attempts run out.
 * The delay doubles after every miss, capped at `maxIntervalMs`.
 *
 * Returns the last probe value (null if every attempt missed).
 */
export async function pollUntil<T>(
  probe: () => Promise<T | null>,
  opts: PollOptions,
): Promise<T | null> {
  const attempts = Math.max(1, Math.floor(opts.attempts));
  let delay = Math.max(0, opts.intervalMs);

  for (let attempt = 1; attempt <= attempts; attempt++) {
    const value = await probe();
    if (value !== null) return value;

    if (attempt < attempts) {
      opts.onMiss?.(attempt, delay);
      await sleep(delay);
      delay = Math.min(delay * 2, Math.max(opts.maxIntervalMs, opts.intervalMs));
    }
  }

  return null;
}
