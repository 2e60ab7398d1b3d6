import { addDays, format, subDays } from "date-fns";

export const sleep = (ms: number) =>
  new Promise<void>((resolve) => setTimeout(resolve, ms));

/** Calendar date (local time) as YYYY-MM-DD. */
export function toDateString(date: Date): string {
  return format(date, "yyyy-MM-dd");
}

export function todayString(now: Date): string {
  return toDateString(now);
}

export function dateStringInDays(now: Date, days: number): string {
  return toDateString(addDays(now, days));
}

export function daysAgo(now: Date, days: number): Date {
  return subDays(now, days);
}

export function longDate(date: Date): string {
  return format(date, "MMMM dd, yyyy");
}

export function noteStamp(date: Date): string {
  return format(date, "yyyy-MM-dd HH:mm");
}
