import { FollowupReminder } from "../types";
import { dateStringInDays } from "../utils/time";

const CRLF = "\r\n";
const PRODUCT_ID = "-//Outreach Tracker//Follow-ups//EN";

export function createFollowupReminder(
  contactName: string,
  company: string,
  daysUntil: number,
  now: Date
): FollowupReminder {
  return {
    contactName,
    company,
    daysUntil,
    dueDate: dateStringInDays(now, daysUntil),
    createdAt: now,
  };
}

/** RFC 5545 TEXT escaping. */
export function escapeText(value: string): string {
  return value
    .replace(/\\/g, "\\\\")
    .replace(/;/g, "\\;")
    .replace(/,/g, "\\,")
    .replace(/\r?\n/g, "\\n");
}

function compactDate(date: string): string {
  return date.replace(/-/g, "");
}

function nextDay(date: string): string {
  const next = new Date(`${date}T00:00:00Z`);
  next.setUTCDate(next.getUTCDate() + 1);
  return next.toISOString().slice(0, 10);
}

function utcStamp(date: Date): string {
  return date
    .toISOString()
    .replace(/[-:]/g, "")
    .replace(/\.\d{3}/, "");
}

function slug(value: string): string {
  return value
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");
}

export function summaryFor(reminder: FollowupReminder): string {
  return reminder.company
    ? `Follow up: ${reminder.contactName} (${reminder.company})`
    : `Follow up: ${reminder.contactName}`;
}

/** One all-day VEVENT block, CRLF terminated. */
export function toIcsEvent(reminder: FollowupReminder): string {
  const lines = [
    "BEGIN:VEVENT",
    `UID:followup-${reminder.dueDate}-${slug(`${reminder.contactName} ${reminder.company}`)}@outreach-tracker`,
    `DTSTAMP:${utcStamp(reminder.createdAt)}`,
    `DTSTART;VALUE=DATE:${compactDate(reminder.dueDate)}`,
    `DTEND;VALUE=DATE:${compactDate(nextDay(reminder.dueDate))}`,
    `SUMMARY:${escapeText(summaryFor(reminder))}`,
    `DESCRIPTION:${escapeText(
      `No reply yet. Scheduled ${reminder.daysUntil} day(s) after the last email.`
    )}`,
    "END:VEVENT",
  ];
  return lines.join(CRLF) + CRLF;
}

/** Concatenates any number of reminders into one importable calendar. */
export function buildCalendar(reminders: FollowupReminder[]): string {
  const header = [
    "BEGIN:VCALENDAR",
    "VERSION:2.0",
    `PRODID:${PRODUCT_ID}`,
    "CALSCALE:GREGORIAN",
  ].join(CRLF);

  return (
    header + CRLF + reminders.map(toIcsEvent).join("") + "END:VCALENDAR" + CRLF
  );
}
