/**
 * UTC timestamp formatting for the briefing display.
 */

/**
 * Format a date as "YYYY-MM-DD HH:MM:SS UTC".
 */
export function formatUtcTimestamp(date: Date): string {
  const iso = date.toISOString();
  return `${iso.slice(0, 10)} ${iso.slice(11, 19)} UTC`;
}

/**
 * Same as formatUtcTimestamp, from an ISO-8601 string.
 * Unparseable input is returned unchanged.
 */
export function formatIsoAsUtc(iso: string): string {
  const date = new Date(iso);
  return Number.isNaN(date.getTime()) ? iso : formatUtcTimestamp(date);
}
