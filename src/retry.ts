export interface RetryResult<T> {
  value: T;
  attempts: number;
  accepted: boolean;
}

/**
 * Runs `fn` sequentially until `isAcceptable` approves a value or `attempts`
 * runs out. The last value is returned either way, flagged `accepted: false`
 * when the ceiling was hit. Errors thrown by `fn` are not retried.
 */
export async function retry<T>(
  attempts: number,
  fn: (attempt: number) => Promise<T>,
  isAcceptable: (value: T) => boolean,
): Promise<RetryResult<T>> {
  const ceiling = Math.max(1, Math.trunc(attempts));
  let attempt = 0;
  for (;;) {
    attempt += 1;
    const value = await fn(attempt);
    if (isAcceptable(value)) return { value, attempts: attempt, accepted: true };
    if (attempt >= ceiling) return { value, attempts: attempt, accepted: false };
  }
}
