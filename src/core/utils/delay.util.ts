/**
 * Utility function to create a delay/sleep in async code
 * @param ms - Milliseconds to wait
 *
 * @example
 * await delay(1000); // Wait 1 second
 */
export const delay = (ms: number): Promise<void> => {
  return new Promise((resolve) => setTimeout(resolve, ms));
};

/**
 * Exponential backoff delay for a zero-indexed attempt, capped at maxDelayMs
 *
 * @example
 * backoffDelayMs(0, 1000); // 1000
 * backoffDelayMs(3, 1000); // 8000
 * backoffDelayMs(10, 1000, 30000); // 30000
 */
export const backoffDelayMs = (
  attempt: number,
  baseDelayMs: number = 1000,
  maxDelayMs: number = 30000,
): number => {
  return Math.min(baseDelayMs * Math.pow(2, Math.max(0, attempt)), maxDelayMs);
};

/**
 * Waits for the exponential backoff delay of the given attempt
 */
export const exponentialBackoff = (
  attempt: number,
  baseDelayMs: number = 1000,
  maxDelayMs: number = 30000,
): Promise<void> => {
  return delay(backoffDelayMs(attempt, baseDelayMs, maxDelayMs));
};

/**
 * Parse a Retry-After value (seconds or HTTP date) into milliseconds
 * @param retryAfter - Number of seconds, numeric string, or HTTP date string
 * @param fallbackMs - Returned when the value is missing or unparseable
 */
export const parseRetryAfter = (
  retryAfter: string | number | undefined,
  fallbackMs: number = 5000,
): number => {
  if (retryAfter === undefined || retryAfter === '') return fallbackMs;

  if (typeof retryAfter === 'number') {
    return retryAfter * 1000;
  }

  const seconds = Number.parseInt(retryAfter, 10);
  if (!Number.isNaN(seconds) && String(seconds) === retryAfter.trim()) {
    return seconds * 1000;
  }

  const retryDate = new Date(retryAfter);
  if (!Number.isNaN(retryDate.getTime())) {
    return Math.max(retryDate.getTime() - Date.now(), 0);
  }

  return fallbackMs;
};
