/**
 * calendar-date helpers. dates travel as ISO `YYYY-MM-DD` strings so they
 * compare lexicographically and serialize without a timezone.
 */

import { addDays, format, getDay, isValid, parseISO, subDays } from "date-fns";

export type IsoDate = string;

export const WEEKDAYS = [
  "sunday",
  "monday",
  "tuesday",
  "wednesday",
  "thursday",
  "friday",
  "saturday",
] as const;

export type Weekday = (typeof WEEKDAYS)[number];

export interface WeekWindow {
  start: IsoDate;
  end: IsoDate;
}

const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
const ISO_DATE_FORMAT = "yyyy-MM-dd";

export function isIsoDate(value: string): boolean {
  if (!ISO_DATE_PATTERN.test(value)) return false;
  const parsed = parseISO(value);
  // parseISO rolls some out-of-range days over; the round-trip catches them
  return isValid(parsed) && format(parsed, ISO_DATE_FORMAT) === value;
}

export function toIsoDate(date: Date): IsoDate {
  return format(date, ISO_DATE_FORMAT);
}

export function shiftDate(date: IsoDate, days: number): IsoDate {
  return toIsoDate(addDays(parseISO(date), days));
}

/**
 * the seven-day window containing `today` that begins on the most recent
 * `weekStart` (today itself when it is that weekday).
 */
export function weekWindow(today: IsoDate, weekStart: Weekday): WeekWindow {
  const day = parseISO(today);
  const offset = (getDay(day) - WEEKDAYS.indexOf(weekStart) + 7) % 7;
  const start = subDays(day, offset);
  return {
    start: toIsoDate(start),
    end: toIsoDate(addDays(start, 6)),
  };
}
