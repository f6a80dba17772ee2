export interface PollOptions {
  readonly timeoutMs: number;
  readonly intervalMs: number;
}

export type PollOutcome<T> =
  | { readonly done: true; readonly value: T }
  | { readonly done: false; readonly attempts: number };

const TIMED_OUT = Symbol("timed out");

function delay(ms: number): Promise<void> {
  return new Promise<void>((resolve) => setTimeout(resolve, ms));
}

function beforeDeadline<T>(work: Promise<T>, deadline: number): Promise<T | typeof TIMED_OUT> {
  let timer: NodeJS.Timeout | undefined;
  const expired = new Promise<typeof TIMED_OUT>((resolve) => {
    timer = setTimeout(() => resolve(TIMED_OUT), Math.max(0, deadline - Date.now()));
  });
  return Promise.race([work, expired]).finally(() => clearTimeout(timer));
}

/**
 * Waits `intervalMs`, then calls `check`, until `check` returns a value other
 * than `undefined` or the deadline passes. A check still running at the
 * deadline counts as a timeout. Errors thrown by `check` propagate.
 */
export async function pollUntil<T>(
  check: (attempt: number) => Promise<T | undefined>,
  opts: PollOptions,
): Promise<PollOutcome<T>> {
  const deadline = Date.now() + opts.timeoutMs;
  let attempts = 0;

  while (Date.now() < deadline) {
    await delay(Math.min(opts.intervalMs, deadline - Date.now()));

    const value = await beforeDeadline(check(attempts), deadline);
    attempts++;
    if (value === TIMED_OUT) break;
    if (value !== undefined) {
      return { done: true, value };
    }
  }

  return { done: false, attempts };
}
