/**
 * iCalendar (RFC 5545) rendering for calendar events.
 *
 * Times are wall-clock values. With a timezone they carry a TZID parameter;
 * without one they are written as floating times.
 */

import type { CalendarEvent } from "./types";

export interface RenderOptions {
  /** X-WR-CALNAME header */
  calendarName: string;
  /** IANA zone id, or null for floating times */
  timezone: string | null;
  /** DTSTAMP for every event; fixed by the caller so output is reproducible */
  stamp: Date;
  prodId?: string;
}

export const DEFAULT_PRODID = "-//Proctor Schedule//Exam Calendars//EN";

const WALL_CLOCK_PATTERN = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2})$/;
const MAX_LINE_OCTETS = 75;

/**
 * Escapes special characters for iCal text fields.
 * Backslash, semicolon and comma are escaped; newlines become literal \n.
 */
export function escapeText(text: string): string {
  return text
    .replace(/\\/g, "\\\\")
    .replace(/;/g, "\\;")
    .replace(/,/g, "\\,")
    .replace(/\r\n|\r|\n/g, "\\n");
}

/**
 * Folds lines longer than 75 octets of UTF-8. Continuation lines start with
 * a space; a character is never split across two lines.
 */
export function foldLine(line: string): string {
  if (Buffer.byteLength(line, "utf-8") <= MAX_LINE_OCTETS) return line;

  const parts: string[] = [];
  let current = "";
  let size = 0;
  let limit = MAX_LINE_OCTETS;
  for (const char of line) {
    const octets = Buffer.byteLength(char, "utf-8");
    if (size + octets > limit) {
      parts.push(current);
      current = "";
      size = 0;
      limit = MAX_LINE_OCTETS - 1; // room for the leading space
    }
    current += char;
    size += octets;
  }
  parts.push(current);
  return parts.join("\r\n ");
}

/** "2026-04-14T09:30" → "20260414T093000" */
export function formatWallClock(value: string): string {
  const match = WALL_CLOCK_PATTERN.exec(value);
  if (!match) {
    throw new Error(`Invalid date-time "${value}". Expected YYYY-MM-DDTHH:MM`);
  }
  const [, year, month, day, hour, minute] = match;
  return `${year}${month}${day}T${hour}${minute}00`;
}

/** UTC form required by DTSTAMP */
export function formatUtcStamp(date: Date): string {
  return date.toISOString().replace(/[-:]/g, "").replace(/\.\d{3}/, "");
}

export function renderCalendar(events: CalendarEvent[], options: RenderOptions): string {
  const tzParam = options.timezone ? `;TZID=${options.timezone}` : "";
  const dtstamp = formatUtcStamp(options.stamp);

  const lines: string[] = [
    "BEGIN:VCALENDAR",
    "VERSION:2.0",
    `PRODID:${options.prodId ?? DEFAULT_PRODID}`,
    "CALSCALE:GREGORIAN",
    "METHOD:PUBLISH",
    foldLine(`X-WR-CALNAME:${escapeText(options.calendarName)}`),
  ];

  if (options.timezone) {
    lines.push(`X-WR-TIMEZONE:${options.timezone}`);
  }

  for (const event of events) {
    lines.push("BEGIN:VEVENT");
    lines.push(foldLine(`UID:${event.uid}`));
    lines.push(`DTSTAMP:${dtstamp}`);
    lines.push(`DTSTART${tzParam}:${formatWallClock(event.start)}`);
    lines.push(`DTEND${tzParam}:${formatWallClock(event.end)}`);
    lines.push(foldLine(`SUMMARY:${escapeText(event.title)}`));
    if (event.location) {
      lines.push(foldLine(`LOCATION:${escapeText(event.location)}`));
    }
    lines.push(foldLine(`DESCRIPTION:${escapeText(event.description)}`));
    lines.push("STATUS:CONFIRMED");
    lines.push("END:VEVENT");
  }

  lines.push("END:VCALENDAR");

  return lines.join("\r\n") + "\r\n";
}
