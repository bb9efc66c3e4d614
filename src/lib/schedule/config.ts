/**
 * Proctor Schedule - Configuration
 * Column schema and directory layout, passed explicitly into the pipeline.
 *
 * Defaults mirror the university's exported proctoring sheets: two title rows,
 * then a header row with the columns below.
 */

import path from "path";
import { ConfigError } from "./errors";

export interface ColumnSchema {
  exam: string;
  date: string;
  start_time: string;
  end_time: string;
  proctor: string;
  location: string;   // optional in the sheet
  instructor: string; // optional in the sheet
  enrolled: string;   // optional in the sheet
}

export interface ScheduleConfig {
  columns: ColumnSchema;
  headerRow: number;          // 1-based
  sheet: string | null;       // null = first worksheet
  rawDir: string;
  scheduleDir: string;        // aggregate calendar
  proctorDir: string;         // per-proctor calendars
  logsDir: string | null;     // null = console only
  buildingsFile: string | null;
  timezone: string | null;    // null = floating local times
  startOffsetMinutes: number;
}

export const DEFAULT_COLUMNS: ColumnSchema = {
  exam: "Exam",
  date: "Date",
  start_time: "Start time",
  end_time: "End time",
  proctor: "Proctor",
  location: "Location",
  instructor: "Instructor",
  enrolled: "Students enrolled",
};

export const COLUMN_FIELDS: ReadonlyArray<keyof ColumnSchema> = [
  "exam",
  "date",
  "start_time",
  "end_time",
  "proctor",
  "location",
  "instructor",
  "enrolled",
];

/** Columns the sheet must have; the rest are read when present */
export const REQUIRED_COLUMNS = ["exam", "date", "start_time", "end_time", "proctor"] as const;

export const DEFAULT_TIMEZONE = "America/Toronto";

const COLUMN_ENV: Record<keyof ColumnSchema, string> = {
  exam: "PROCTOR_COL_EXAM",
  date: "PROCTOR_COL_DATE",
  start_time: "PROCTOR_COL_START_TIME",
  end_time: "PROCTOR_COL_END_TIME",
  proctor: "PROCTOR_COL_PROCTOR",
  location: "PROCTOR_COL_LOCATION",
  instructor: "PROCTOR_COL_INSTRUCTOR",
  enrolled: "PROCTOR_COL_ENROLLED",
};

type Env = Record<string, string | undefined>;

/**
 * Build a ScheduleConfig from environment variables.
 * Relative directories resolve against `cwd`.
 */
export function loadConfig(env: Env = process.env, cwd: string = process.cwd()): ScheduleConfig {
  const dir = (name: string, fallback: string) => path.resolve(cwd, env[name] || fallback);

  const columns = { ...DEFAULT_COLUMNS };
  for (const key of COLUMN_FIELDS) {
    const override = env[COLUMN_ENV[key]]?.trim();
    if (override) columns[key] = override;
  }

  const headerRow = parseInteger(env, "PROCTOR_HEADER_ROW", 3);
  if (headerRow < 1) {
    throw new ConfigError(`PROCTOR_HEADER_ROW must be 1 or greater (got ${headerRow})`);
  }

  const startOffsetMinutes = parseInteger(env, "PROCTOR_START_OFFSET", 0);
  if (startOffsetMinutes < 0) {
    throw new ConfigError(`PROCTOR_START_OFFSET must not be negative (got ${startOffsetMinutes})`);
  }

  // An explicitly empty PROCTOR_TIMEZONE switches to floating times
  const timezone = env.PROCTOR_TIMEZONE === undefined
    ? DEFAULT_TIMEZONE
    : env.PROCTOR_TIMEZONE.trim() || null;

  return {
    columns,
    headerRow,
    sheet: env.PROCTOR_SHEET?.trim() || null,
    rawDir: dir("PROCTOR_RAW_DIR", "data/raw"),
    scheduleDir: dir("PROCTOR_SCHEDULE_DIR", "data/interim"),
    proctorDir: dir("PROCTOR_PROCTOR_DIR", "data/processed"),
    logsDir: dir("PROCTOR_LOGS_DIR", "logs"),
    buildingsFile: dir("PROCTOR_BUILDINGS_FILE", "data/interim/building-abbreviations.json"),
    timezone,
    startOffsetMinutes,
  };
}

function parseInteger(env: Env, name: string, fallback: number): number {
  const raw = env[name]?.trim();
  if (!raw) return fallback;
  if (!/^-?\d+$/.test(raw)) {
    throw new ConfigError(`${name} must be a whole number (got "${raw}")`);
  }
  return Number(raw);
}
