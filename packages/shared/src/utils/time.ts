/**
 * Journal timestamp helpers.
 * Trade records store wall-clock stamps as `YYYY-MM-DD HH:MM:SS` in the
 * configured journal time zone.
 */

import { formatInTimeZone } from "date-fns-tz";

export const JOURNAL_TIME_FORMAT = "yyyy-MM-dd HH:mm:ss";

export function formatJournalTime(date: Date | number, timeZone: string = "UTC"): string {
  return formatInTimeZone(date, timeZone, JOURNAL_TIME_FORMAT);
}

/**
 * Compact date used in journal file names.
 *
 * @example
 * journalDateStamp(new Date("2024-03-05T12:00:00Z")); // "20240305"
 */
export function journalDateStamp(date: Date | number, timeZone: string = "UTC"): string {
  return formatInTimeZone(date, timeZone, "yyyyMMdd");
}
