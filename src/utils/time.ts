/**
 * UTC calendar helpers for budget periods.
 */

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

/** 'YYYY-MM' */
export function monthKey(date: Date): string {
  return date.toISOString().slice(0, 7);
}

/** 'YYYY-MM-DD' */
export function dayKey(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function daysInMonth(date: Date): number {
  return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth() + 1, 0)).getUTCDate();
}

/** Days left in the month, counting the given day. */
export function remainingDaysIncludingToday(date: Date): number {
  return daysInMonth(date) - date.getUTCDate() + 1;
}

export function startOfMonth(date: Date): Date {
  return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), 1));
}

export function addDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * 24 * 60 * 60 * 1000);
}
