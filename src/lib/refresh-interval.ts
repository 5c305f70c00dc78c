/**
 * Auto-refresh interval parsing for the briefing page.
 */

export const MIN_REFRESH_SECONDS = 1;

export type RefreshIntervalResult =
  | { ok: true; ms: number }
  | { ok: false; error: string };

/**
 * Parse a whole number of seconds into milliseconds.
 */
export function parseRefreshInterval(input: string): RefreshIntervalResult {
  const trimmed = input.trim();

  if (!/^\d+$/.test(trimmed) || Number(trimmed) < MIN_REFRESH_SECONDS) {
    return {
      ok: false,
      error: `Invalid refresh interval. Please enter a number ≥ ${MIN_REFRESH_SECONDS}.`,
    };
  }

  return { ok: true, ms: Number(trimmed) * 1000 };
}
