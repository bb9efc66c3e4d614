/**
 * Proctor Schedule - File Namer/Writer
 * Names output files after the month of the first exam and writes one
 * aggregate calendar plus one calendar per proctor.
 *
 * Files are written one by one with no rollback. When a write fails, the
 * WriteError lists the files that already exist from this run.
 */

import fs from "fs";
import path from "path";
import { format, parseISO } from "date-fns";
import { EmptyScheduleError, WriteError } from "./errors";
import { renderCalendar } from "./ics";
import type { Logger } from "./logger";
import { silentLogger } from "./logger";
import type { CalendarEvent, ScheduleCalendars } from "./types";

export interface WriteOptions {
  scheduleDir: string;
  proctorDir: string;
  timezone: string | null;
  stamp: Date;
}

export const CALENDAR_EXTENSION = "ics";
export const AGGREGATE_DESCRIPTOR = "schedule";

// Path separators, characters Windows rejects, control characters
const UNSAFE_FILENAME_CHARS = /[\\/:*?"<>|\u0000-\u001f]/g;

/**
 * `<year>-<month>` of the earliest event start.
 * @throws EmptyScheduleError when there are no events
 */
export function schedulePrefix(master: CalendarEvent[]): string {
  if (master.length === 0) {
    throw new EmptyScheduleError();
  }
  const earliest = master.reduce((min, event) => (event.start < min ? event.start : min), master[0].start);
  return format(parseISO(earliest), "yyyy-MM");
}

export function scheduleFileName(prefix: string): string {
  return `${prefix}-${AGGREGATE_DESCRIPTOR}.${CALENDAR_EXTENSION}`;
}

/**
 * `<prefix>-<proctor>.ics`, or `<prefix>-<proctor>-<n>.ics` for the n-th
 * proctor whose name lands on an already taken file.
 */
export function proctorFileName(prefix: string, proctor: string, occurrence = 1): string {
  const safe = proctor.replace(UNSAFE_FILENAME_CHARS, "_");
  const suffix = occurrence > 1 ? `-${occurrence}` : "";
  return `${prefix}-${safe}${suffix}.${CALENDAR_EXTENSION}`;
}

/**
 * Target path for every proctor, in name order. Paths are compared
 * case-insensitively and never reuse the aggregate file, so two proctors
 * never share a file even on case-insensitive filesystems.
 */
export function planProctorFiles(
  prefix: string,
  proctors: string[],
  proctorDir: string,
  aggregatePath: string
): Array<[proctor: string, filePath: string]> {
  const taken = new Set([foldPath(aggregatePath)]);
  return [...proctors].sort(compareText).map((proctor) => {
    let occurrence = 1;
    let filePath = path.join(proctorDir, proctorFileName(prefix, proctor));
    while (taken.has(foldPath(filePath))) {
      occurrence += 1;
      filePath = path.join(proctorDir, proctorFileName(prefix, proctor, occurrence));
    }
    taken.add(foldPath(filePath));
    return [proctor, filePath];
  });
}

/**
 * Write the aggregate calendar, then each proctor's calendar in name order.
 * Returns the written paths in that order.
 */
export function writeCalendars(
  calendars: ScheduleCalendars,
  options: WriteOptions,
  logger: Logger = silentLogger
): string[] {
  const prefix = schedulePrefix(calendars.master);
  const written: string[] = [];

  const writeOne = (filePath: string, events: CalendarEvent[], calendarName: string) => {
    const content = renderCalendar(events, {
      calendarName,
      timezone: options.timezone,
      stamp: options.stamp,
    });
    try {
      fs.mkdirSync(path.dirname(filePath), { recursive: true });
      fs.writeFileSync(filePath, content, "utf-8");
    } catch (err) {
      throw new WriteError(filePath, [...written], err);
    }
    written.push(filePath);
    logger.info("WRITER", `Wrote ${filePath} (${events.length} events)`);
  };

  const aggregatePath = path.join(options.scheduleDir, scheduleFileName(prefix));
  const plan = planProctorFiles(prefix, [...calendars.byProctor.keys()], options.proctorDir, aggregatePath);
  for (const [proctor, filePath] of plan) {
    if (path.basename(filePath) !== proctorFileName(prefix, proctor)) {
      logger.warn("WRITER", `File name for "${proctor}" is already taken, writing ${path.basename(filePath)}`);
    }
  }

  writeOne(aggregatePath, calendars.master, `Proctoring ${prefix}`);

  for (const [proctor, filePath] of plan) {
    writeOne(filePath, calendars.byProctor.get(proctor) ?? [], `Proctoring ${prefix}: ${proctor}`);
  }

  return written;
}

function foldPath(filePath: string): string {
  return path.resolve(filePath).toLowerCase();
}

function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
