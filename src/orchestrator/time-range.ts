/**
 * Time Range Utilities
 *
 * Pure functions computing the collection windows and run dates.
 * All instants are ISO 8601, all dates are UTC.
 */

const DAY_MS = 24 * 60 * 60 * 1000;

/** Commit and star window. */
export const ACTIVITY_WINDOW_DAYS = 14;

/** Contributor window. */
export const CONTRIBUTOR_WINDOW_DAYS = 30;

export interface TimeRange {
  from: string;
  to: string;
}

/**
 * The `days`-long window ending at `now`.
 * Used by: collect
 */
export function trailingWindow(days: number, now: Date = new Date()): TimeRange {
  const from = new Date(now.getTime() - days * DAY_MS);
  return {
    from: from.toISOString(),
    to: now.toISOString(),
  };
}

/** True when `instant` falls inside `range` (both ends inclusive). */
export function isWithin(instant: string, range: TimeRange): boolean {
  const t = Date.parse(instant);
  return t >= Date.parse(range.from) && t <= Date.parse(range.to);
}

/**
 * UTC calendar date of `now` as YYYY-MM-DD.
 * Used by: score, when no --date is given
 */
export function runDateOf(now: Date = new Date()): string {
  return now.toISOString().slice(0, 10);
}
