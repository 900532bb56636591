/**
 * Trailing window: decides which orders are eligible for the sales report.
 *
 * All day boundaries are UTC midnights. The window has a lower bound only:
 * orders dated after `now` remain eligible.
 */

import type { WindowPolicy } from './types.js';

export const MS_PER_DAY = 24 * 60 * 60 * 1000;

export function startOfUtcDay(date: Date): Date {
  return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()));
}

/**
 * Earliest instant an order may carry and still fall inside the window.
 *
 * `calendar_day` truncates `now - windowDays` to its date; `current_date`
 * subtracts whole days from today's date. Both land on a UTC midnight.
 */
export function resolveWindowStart(now: Date, windowDays: number, policy: WindowPolicy): Date {
  switch (policy) {
    case 'calendar_day':
      return startOfUtcDay(new Date(now.getTime() - windowDays * MS_PER_DAY));
    case 'current_date':
      return new Date(startOfUtcDay(now).getTime() - windowDays * MS_PER_DAY);
  }
}

export function isWithinWindow(
  orderDate: Date,
  now: Date,
  windowDays: number,
  policy: WindowPolicy,
): boolean {
  return createWindowFilter(now, windowDays, policy)(orderDate);
}

/** Predicate bound to a single window start. */
export function createWindowFilter(
  now: Date,
  windowDays: number,
  policy: WindowPolicy,
): (orderDate: Date) => boolean {
  const start = resolveWindowStart(now, windowDays, policy).getTime();
  if (policy === 'calendar_day') {
    return (orderDate) => startOfUtcDay(orderDate).getTime() >= start;
  }
  return (orderDate) => orderDate.getTime() >= start;
}
