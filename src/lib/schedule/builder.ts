/**
 * Proctor Schedule - Calendar Builder
 * Projects exam assignments into calendar events: one master calendar and
 * one calendar per proctor.
 *
 * Ordering: start ascending, then proctor, then exam name (code-unit order,
 * so output does not depend on the machine's locale).
 * Identical rows are kept: two rows, two events.
 */

import { createHash } from "crypto";
import { addMinutes, parseISO } from "date-fns";
import type { BuildingDirectory } from "./buildings";
import { describeBuilding } from "./buildings";
import type { CalendarEvent, ExamAssignment, ScheduleCalendars } from "./types";

export interface BuildOptions {
  /** Minutes before the exam start that the proctor's event begins */
  startOffsetMinutes?: number;
  buildings?: BuildingDirectory;
}

export const EVENT_TITLE_PREFIX = "Proctoring";
const UID_DOMAIN = "proctor-schedule";

export function buildCalendars(
  assignments: ExamAssignment[],
  options: BuildOptions = {}
): ScheduleCalendars {
  const offset = options.startOffsetMinutes ?? 0;
  const buildings: BuildingDirectory = options.buildings ?? new Map();
  const sittings = groupSittings(assignments);

  const drafts = assignments.map((a) => {
    const start = offset > 0
      ? shiftWallClock(a.date, a.start_time, -offset)
      : `${a.date}T${a.start_time}`;
    return {
      title: `${EVENT_TITLE_PREFIX}: ${a.exam_name}`,
      start,
      end: `${a.date}T${a.end_time}`,
      location: a.location,
      description: buildDescription(a, sittings.get(sittingKey(a)) ?? [a.proctor], buildings),
      proctor: a.proctor,
      exam_name: a.exam_name,
    };
  });

  drafts.sort(compareEvents);

  const seen = new Map<string, number>();
  const master: CalendarEvent[] = drafts.map((draft) => {
    const fingerprint = eventFingerprint(draft);
    const occurrence = (seen.get(fingerprint) ?? 0) + 1;
    seen.set(fingerprint, occurrence);
    return { uid: `${fingerprint.slice(0, 20)}-${occurrence}@${UID_DOMAIN}`, ...draft };
  });

  const byProctor = new Map<string, CalendarEvent[]>();
  for (const event of master) {
    const events = byProctor.get(event.proctor);
    if (events) events.push(event);
    else byProctor.set(event.proctor, [event]);
  }

  return { master, byProctor };
}

export function compareEvents(
  a: Pick<CalendarEvent, "start" | "proctor" | "exam_name">,
  b: Pick<CalendarEvent, "start" | "proctor" | "exam_name">
): number {
  return compareText(a.start, b.start)
    || compareText(a.proctor, b.proctor)
    || compareText(a.exam_name, b.exam_name);
}

/**
 * Exam line, then everyone proctoring the same sitting, then the building.
 */
function buildDescription(
  assignment: ExamAssignment,
  proctors: string[],
  buildings: BuildingDirectory
): string {
  let headline = assignment.exam_name;
  if (assignment.instructor) headline += ` for ${assignment.instructor}`;
  if (assignment.enrolled !== null) headline += `, ${assignment.enrolled} students`;

  const lines = [headline, `Proctors: ${proctors.join(", ")}`];

  const building = describeBuilding(assignment.location, buildings);
  if (building) lines.push(`Building: ${building}`);

  return lines.join("\n");
}

/** Proctors per sitting (same exam, date, times and room), unique and sorted */
function groupSittings(assignments: ExamAssignment[]): Map<string, string[]> {
  const sittings = new Map<string, Set<string>>();
  for (const a of assignments) {
    const key = sittingKey(a);
    const proctors = sittings.get(key) ?? new Set<string>();
    proctors.add(a.proctor);
    sittings.set(key, proctors);
  }

  const result = new Map<string, string[]>();
  for (const [key, proctors] of sittings) {
    result.set(key, [...proctors].sort(compareText));
  }
  return result;
}

function sittingKey(a: ExamAssignment): string {
  return JSON.stringify([a.exam_name, a.date, a.start_time, a.end_time, a.location]);
}

function eventFingerprint(event: Omit<CalendarEvent, "uid">): string {
  return createHash("sha1")
    .update(JSON.stringify([event.start, event.end, event.proctor, event.exam_name, event.location]))
    .digest("hex");
}

/**
 * Move a wall-clock time by some minutes. Works in UTC so no DST rule of the
 * host machine applies.
 */
function shiftWallClock(date: string, time: string, minutes: number): string {
  return addMinutes(parseISO(`${date}T${time}:00Z`), minutes).toISOString().slice(0, 16);
}

function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
