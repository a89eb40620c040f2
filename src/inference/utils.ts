/**
 * Shared inference client utilities.
 */

const UNIT_MS: Record<string, number> = {
  h: 3_600_000,
  m: 60_000,
  s: 1_000,
  ms: 1,
};

/**
 * Parse a duration string (e.g., "6m23.456s", "1.5s", "37s", "500ms", "2h30m0s")
 * into milliseconds. Used for x-ratelimit-reset-* headers and Gemini's
 * RetryInfo.retryDelay.
 *
 * Supported formats:
 *   "6m23.456s"  -> 383456 ms
 *   "1.5s"       -> 1500 ms
 *   "2m0s"       -> 120000 ms
 *   "0s"         -> 0 ms
 *   "500ms"      -> 500 ms
 *   "2h30m0s"    -> 9000000 ms
 */
export function parseDurationToMs(str: string): number {
  let totalMs = 0;

  // "ms" is listed before "m" so the alternation never splits it
  for (const match of str.matchAll(/(\d+(?:\.\d+)?)(ms|h|m|s)/g)) {
    const [, amount, unit] = match;
    if (amount === undefined || unit === undefined) continue;
    totalMs += parseFloat(amount) * (UNIT_MS[unit] ?? 0);
  }

  return Math.round(totalMs);
}

/**
 * Parse a retry-after header: delta seconds ("30") or an HTTP date
 * ("Wed, 21 Oct 2026 07:28:00 GMT"). A date in the past means no wait.
 * @returns Milliseconds, or undefined when absent or unusable.
 */
export function parseRetryAfterHeader(value: string | null, now: number = Date.now()): number | undefined {
  if (value === null) {
    return undefined;
  }
  const trimmed = value.trim();

  if (/^\d+(?:\.\d+)?$/.test(trimmed)) {
    return Math.round(parseFloat(trimmed) * 1000);
  }

  if (/[A-Za-z]/.test(trimmed)) {
    const at = Date.parse(trimmed);
    return isNaN(at) ? undefined : Math.max(0, at - now);
  }

  return undefined;
}
