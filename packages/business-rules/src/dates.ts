const MS_PER_DAY = 24 * 60 * 60 * 1000;

/** Calendar date (UTC) of an instant, as YYYY-MM-DD. */
export function toIsoDate(instant: Date): string {
  return instant.toISOString().slice(0, 10);
}

/**
 * Calendar date part of a timestamp string such as `2024-03-01T08:15:00`
 * or `2024-03-01 08:15:00`. Returns null for missing or malformed input.
 */
export function datePart(timestamp: string | null): string | null {
  if (!timestamp) return null;
  const date = timestamp.slice(0, 10);
  return /^\d{4}-\d{2}-\d{2}$/.test(date) ? date : null;
}

/** Whole days from `from` to `to` (both YYYY-MM-DD). */
export function daysBetween(from: string, to: string): number {
  return Math.round((Date.parse(`${to}T00:00:00Z`) - Date.parse(`${from}T00:00:00Z`)) / MS_PER_DAY);
}
