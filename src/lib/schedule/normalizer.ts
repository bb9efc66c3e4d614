/**
 * Proctor Schedule - Record Normalizer
 * Turns a RawRow into a validated ExamAssignment.
 *
 * RULES:
 * - Date, start time, end time: must be real date/time cells (free text is rejected, never coerced)
 * - Start time strictly before end time
 * - Exam name and proctor: required, trimmed
 * - Location, instructor, students enrolled: optional
 *
 * Fail-fast: the first bad row aborts the run, so a calendar never silently
 * drops an exam.
 */

import type { ColumnSchema } from "./config";
import {
  DateParseError,
  EmptyFieldError,
  InvalidTimeRangeError,
} from "./errors";
import type { Logger } from "./logger";
import { silentLogger } from "./logger";
import type { ExamAssignment, RawCell, RawRow } from "./types";

const MINUTES_PER_DAY = 24 * 60;

/**
 * Normalize every row, stopping at the first invalid one.
 */
export function normalizeRows(
  rows: RawRow[],
  columns: ColumnSchema,
  logger: Logger = silentLogger
): ExamAssignment[] {
  const assignments = rows.map((raw) => normalizeRow(raw, columns));
  logger.info("NORMALIZER", `Normalized ${assignments.length} exam assignments`);
  return assignments;
}

/**
 * Main normalization entry point for a single row
 */
export function normalizeRow(raw: RawRow, columns: ColumnSchema): ExamAssignment {
  const cell = (name: string): RawCell => raw.values[name] ?? null;

  // Step 1: Date and times must be structured values
  const date = toCalendarDate(cell(columns.date), raw.row, columns.date);
  const start_time = toTimeOfDay(cell(columns.start_time), raw.row, columns.start_time);
  const end_time = toTimeOfDay(cell(columns.end_time), raw.row, columns.end_time);

  // Step 2: Logical consistency ("HH:MM" compares lexically)
  if (start_time >= end_time) {
    throw new InvalidTimeRangeError(raw.row, start_time, end_time);
  }

  // Step 3: Required text fields
  const exam_name = requireText(cell(columns.exam), raw.row, columns.exam);
  const proctor = requireText(cell(columns.proctor), raw.row, columns.proctor);

  return {
    row: raw.row,
    exam_name,
    date,
    start_time,
    end_time,
    proctor,
    location: optionalText(cell(columns.location)),
    instructor: optionalText(cell(columns.instructor)),
    enrolled: toCount(cell(columns.enrolled)),
  };
}

/**
 * Spreadsheet dates arrive as UTC midnight of the calendar day.
 */
function toCalendarDate(value: RawCell, row: number, column: string): string {
  if (!isValidDate(value)) {
    throw new DateParseError(row, column, value);
  }
  const pad = (n: number) => String(n).padStart(2, "0");
  return `${value.getUTCFullYear()}-${pad(value.getUTCMonth() + 1)}-${pad(value.getUTCDate())}`;
}

/**
 * Time-only cells carry the 1899-12-30 epoch date; only the clock part is kept,
 * rounded to the minute.
 */
function toTimeOfDay(value: RawCell, row: number, column: string): string {
  if (!isValidDate(value)) {
    throw new DateParseError(row, column, value);
  }
  const seconds =
    value.getUTCHours() * 3600 +
    value.getUTCMinutes() * 60 +
    value.getUTCSeconds() +
    value.getUTCMilliseconds() / 1000;
  const minutes = Math.min(Math.round(seconds / 60), MINUTES_PER_DAY - 1);
  const pad = (n: number) => String(n).padStart(2, "0");
  return `${pad(Math.floor(minutes / 60))}:${pad(minutes % 60)}`;
}

function isValidDate(value: RawCell): value is Date {
  return value instanceof Date && !Number.isNaN(value.getTime());
}

function requireText(value: RawCell, row: number, column: string): string {
  const text = optionalText(value);
  if (text === null) {
    throw new EmptyFieldError(row, column);
  }
  return text;
}

function optionalText(value: RawCell): string | null {
  if (value === null) return null;
  const text = value instanceof Date ? value.toISOString() : String(value).trim();
  return text.length > 0 ? text : null;
}

function toCount(value: RawCell): number | null {
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value === "string" && /^\s*\d+\s*$/.test(value)) return Number(value);
  return null;
}
