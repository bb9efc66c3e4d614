/**
 * Proctor Schedule - Core Types
 * Shared interfaces for raw sheet rows, normalized assignments and calendar events
 */

/** Cell value after flattening rich text, hyperlinks and formulas */
export type RawCell = string | number | boolean | Date | null;

/** Row as read from the sheet (reader output / normalizer input) */
export interface RawRow {
  row: number; // 1-based worksheet row, for diagnostics
  values: Record<string, RawCell>;
}

/** Validated assignment of one proctor to one exam sitting (normalizer output) */
export interface ExamAssignment {
  row: number;
  exam_name: string;
  date: string;       // YYYY-MM-DD
  start_time: string; // HH:MM (24h)
  end_time: string;   // HH:MM (24h)
  proctor: string;
  location: string | null;
  instructor: string | null;
  enrolled: number | null;
}

/** Exportable event, one per ExamAssignment (builder output / serializer input) */
export interface CalendarEvent {
  uid: string;
  title: string;
  start: string; // YYYY-MM-DDTHH:MM, wall-clock
  end: string;
  location: string | null;
  description: string;
  proctor: string;
  exam_name: string;
}

export interface ScheduleCalendars {
  master: CalendarEvent[];
  byProctor: Map<string, CalendarEvent[]>;
}

/** Entry of the building directory (abbreviation → full name + address) */
export interface Building {
  abbreviation: string;
  name: string;
  address: string;
}

/** Result of a full pipeline run */
export interface PipelineResult {
  prefix: string;        // YYYY-MM
  files: string[];       // Written paths, aggregate first
  eventCount: number;
  proctorCount: number;
}
