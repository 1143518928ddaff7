import { isIsoDate, toIsoDate, type IsoDate } from "../dates.js";

/** `--today` override for reproducible runs; the local calendar date otherwise. */
export function resolveToday(value: string | undefined): IsoDate {
  if (value === undefined) return toIsoDate(new Date());
  if (!isIsoDate(value)) {
    throw new Error(`invalid --today date (expected YYYY-MM-DD): ${value}`);
  }
  return value;
}
