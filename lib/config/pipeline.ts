/**
 * Review and reconciliation settings.
 */

import { IANAZone } from "luxon";
import { readPositiveInt } from "./ai";

export const DEFAULT_INSTANT_WINDOW_MINUTES = 15;
export const DEFAULT_SLEEP_WINDOW_MINUTES = 60;
export const DEFAULT_HISTORY_LOOKBACK_DAYS = 14;

/**
 * IANA zone used to read report clock times ("19:00") and to render times in
 * duplicate reasons. Falls back to UTC for unknown zones.
 */
export function getReportTimeZone(): string {
  const zone = process.env.CARE_REPORT_TIMEZONE;
  if (zone && IANAZone.isValidZone(zone)) return zone;
  return "UTC";
}

export function getInstantWindowMinutes(): number {
  return readPositiveInt(
    process.env.DUPLICATE_INSTANT_WINDOW_MINUTES,
    DEFAULT_INSTANT_WINDOW_MINUTES
  );
}

export function getSleepDefaultWindowMinutes(): number {
  return readPositiveInt(
    process.env.DUPLICATE_SLEEP_DEFAULT_MINUTES,
    DEFAULT_SLEEP_WINDOW_MINUTES
  );
}

export function getHistoryLookbackDays(): number {
  return readPositiveInt(process.env.HISTORY_LOOKBACK_DAYS, DEFAULT_HISTORY_LOOKBACK_DAYS);
}

export function getPendingReportsDir(): string {
  return process.env.PENDING_REPORTS_DIR || ".pending-reports";
}
