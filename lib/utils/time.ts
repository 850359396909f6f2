import { formatInTimeZone } from "date-fns-tz";

export function localTimeZone(): string {
  return Intl.DateTimeFormat().resolvedOptions().timeZone;
}

/**
 * Local date-time with second precision, e.g. "2026-10-19 14:03:27"
 */
export function formatLocalTimestamp(date: Date, timeZone: string): string {
  return formatInTimeZone(date, timeZone, "yyyy-MM-dd HH:mm:ss");
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
