/**
 * specwise - Clock
 *
 * Time source for specifications that compare against "now", plus the
 * calendar arithmetic they share.
 */

/**
 * Returns the current instant.
 */
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

/**
 * Clock frozen at `instant`.
 */
export function fixedClock(instant: Date): Clock {
  const time = instant.getTime();
  return () => new Date(time);
}

export const MS_PER_HOUR = 60 * 60 * 1000;
export const MS_PER_DAY = 24 * MS_PER_HOUR;

/**
 * Whole days from `from` to `to`, truncated toward zero.
 */
export function wholeDaysBetween(from: Date, to: Date): number {
  return Math.trunc((to.getTime() - from.getTime()) / MS_PER_DAY);
}

/**
 * Fractional hours from `from` to `to`.
 */
export function hoursBetween(from: Date, to: Date): number {
  return (to.getTime() - from.getTime()) / MS_PER_HOUR;
}

/**
 * True when both instants fall on the same UTC calendar day.
 */
export function isSameUtcDay(a: Date, b: Date): boolean {
  return (
    a.getUTCFullYear() === b.getUTCFullYear() &&
    a.getUTCMonth() === b.getUTCMonth() &&
    a.getUTCDate() === b.getUTCDate()
  );
}

export function addDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * MS_PER_DAY);
}

export function addHours(date: Date, hours: number): Date {
  return new Date(date.getTime() + hours * MS_PER_HOUR);
}
