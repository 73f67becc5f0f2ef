const DAY_MS = 24 * 60 * 60 * 1000;

export const DEFAULT_WINDOW_DAYS = 1;

/** The dashboard retains 31 days of API request history. */
export const MAX_WINDOW_DAYS = 31;

export interface TimeWindow {
  days: number;
  start: Date;
  end: Date;
}

export function resolveTimeWindow(days: number, now: Date = new Date()): TimeWindow {
  if (!isValidDayCount(days)) {
    throw new RangeError(
      `Time window must be a whole number of days between 1 and ${MAX_WINDOW_DAYS}, got ${days}`,
    );
  }
  const end = new Date(now.getTime());
  const start = new Date(end.getTime() - days * DAY_MS);
  return { days, start, end };
}

export function isValidDayCount(days: number): boolean {
  return Number.isInteger(days) && days >= 1 && days <= MAX_WINDOW_DAYS;
}

/**
 * Parse an operator-supplied day count. Blank input means the default window;
 * anything that is not a whole number in range yields null.
 */
export function parseDays(input: string): number | null {
  const trimmed = input.trim();
  if (trimmed === "") return DEFAULT_WINDOW_DAYS;
  if (!/^\d+$/.test(trimmed)) return null;
  const days = Number(trimmed);
  return isValidDayCount(days) ? days : null;
}
