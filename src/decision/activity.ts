import { InvalidDateError } from "./errors.js";

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const MS_PER_DAY = 86_400_000;

/**
 * Parse a strict YYYY-MM-DD string into a UTC midnight Date.
 * Rejects impossible calendar dates such as 2025-02-30.
 */
export function parseActivityDate(value: string): Date {
  const match = ISO_DATE.exec(value);
  if (!match) {
    throw new InvalidDateError(value);
  }

  const [, year, month, day] = match;
  const date = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)));
  if (
    date.getUTCFullYear() !== Number(year) ||
    date.getUTCMonth() !== Number(month) - 1 ||
    date.getUTCDate() !== Number(day)
  ) {
    throw new InvalidDateError(value);
  }
  return date;
}

/**
 * Whole days between the last activity date and today's UTC date.
 * Negative when the activity date lies in the future.
 */
export function daysSinceLastActive(lastActive: string, today: Date = new Date()): number {
  const last = parseActivityDate(lastActive);
  const todayUtc = Date.UTC(today.getUTCFullYear(), today.getUTCMonth(), today.getUTCDate());
  return Math.round((todayUtc - last.getTime()) / MS_PER_DAY);
}
