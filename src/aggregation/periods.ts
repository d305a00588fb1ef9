import { InvalidArgumentError, type PeriodKey } from '../store/types.js';

/** Calendar month in UTC: first second of the month through the last second. */
export const monthlyPeriod = (year: number, month: number): PeriodKey => {
  if (!Number.isInteger(year) || year < 1970 || year > 9999) {
    throw new InvalidArgumentError(`Invalid year: ${year}`);
  }
  if (!Number.isInteger(month) || month < 1 || month > 12) {
    throw new InvalidArgumentError(`Invalid month: ${month} (expected 1-12)`);
  }
  const periodStart = new Date(Date.UTC(year, month - 1, 1));
  const periodEnd = new Date(Date.UTC(year, month, 1) - 1000);
  return { periodStart, periodEnd, periodType: 'monthly' };
};

/** Exclusive end of the history window: the first instant after the period's last second. */
export const periodWindowEnd = (period: PeriodKey): Date => new Date(period.periodEnd.getTime() + 1000);

/** The calendar month before the one containing `now`. */
export const previousMonth = (now: Date): { year: number; month: number } => {
  const month = now.getUTCMonth();
  return month === 0 ? { year: now.getUTCFullYear() - 1, month: 12 } : { year: now.getUTCFullYear(), month };
};

export const daysAgo = (now: Date, days: number): Date => new Date(now.getTime() - days * 86_400_000);
