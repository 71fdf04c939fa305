/**
 * Billing period arithmetic.
 *
 * Calendar months in UTC. The anchor day is the day of month the
 * subscription started on; shorter months clamp to their last day and
 * the next period returns to the anchor (31 Jan → 28 Feb → 31 Mar).
 */

import type { BillingFrequency } from "@quire/types";

const MONTHS: Readonly<Record<BillingFrequency, number>> = {
  monthly: 1,
  quarterly: 3,
  annual: 12,
};

export const DAY_MS = 24 * 60 * 60 * 1000;

function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month + 1, 0)).getUTCDate();
}

/**
 * Add whole months, clamping to the month's length.
 */
export function addMonths(from: Date, months: number, anchorDay: number = from.getUTCDate()): Date {
  const targetMonth = from.getUTCMonth() + months;
  const year = from.getUTCFullYear() + Math.floor(targetMonth / 12);
  const month = ((targetMonth % 12) + 12) % 12;
  const day = Math.min(anchorDay, daysInMonth(year, month));

  return new Date(
    Date.UTC(
      year,
      month,
      day,
      from.getUTCHours(),
      from.getUTCMinutes(),
      from.getUTCSeconds(),
      from.getUTCMilliseconds(),
    ),
  );
}

/** End (exclusive) of the period starting at `start`. */
export function periodEnd(start: Date, frequency: BillingFrequency, anchorDay?: number): Date {
  return addMonths(start, MONTHS[frequency], anchorDay);
}

export function addDays(from: Date, days: number): Date {
  return new Date(from.getTime() + days * DAY_MS);
}
