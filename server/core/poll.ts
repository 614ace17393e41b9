export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export interface PollOptions {
  intervalMs: number;
  timeoutMs: number;
}

/**
 * Calls `check` every `intervalMs` until it yields a value or the deadline
 * passes. Resolves `undefined` on expiry; the caller decides what a timeout
 * means. Errors thrown by `check` propagate immediately.
 */
export async function pollUntil<T>(
  check: () => Promise<T | undefined>,
  { intervalMs, timeoutMs }: PollOptions,
): Promise<T | undefined> {
  const deadline = Date.now() + timeoutMs;
  for (;;) {
    const value = await check();
    if (value !== undefined) return value;
    const remaining = deadline - Date.now();
    if (remaining <= 0) return undefined;
    await sleep(Math.min(intervalMs, remaining));
  }
}
