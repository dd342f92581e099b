import dayjs from "dayjs";
import customParseFormat from "dayjs/plugin/customParseFormat";
import isoWeek from "dayjs/plugin/isoWeek";
import utc from "dayjs/plugin/utc";

dayjs.extend(customParseFormat);
dayjs.extend(isoWeek);
dayjs.extend(utc);

export const DATE_FORMAT = "YYYY-MM-DD";

/** Strict calendar-date check: "2024-02-30" is rejected. */
export function isValidDate(value: string): boolean {
  return dayjs(value, DATE_FORMAT, true).isValid();
}

/**
 * DATE columns arrive as strings from pg (see configs/database) but as Date
 * objects from some drivers; both become "YYYY-MM-DD".
 */
export function toDateOnly(value: string | Date): string {
  if (value instanceof Date) {
    return dayjs.utc(value).format(DATE_FORMAT);
  }
  return value.slice(0, 10);
}

export function toNullableDateOnly(value: string | Date | null): string | null {
  return value === null ? null : toDateOnly(value);
}

/** Monday of the ISO week containing `date`. */
export function isoWeekStart(date: string): string {
  return dayjs(date, DATE_FORMAT, true).startOf("isoWeek").format(DATE_FORMAT);
}
