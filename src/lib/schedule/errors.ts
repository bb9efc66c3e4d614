/**
 * Error taxonomy for a schedule run.
 * Every failure is terminal: the CLI reports it and exits non-zero.
 */

export class ScheduleError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class MissingColumnError extends ScheduleError {
  constructor(public readonly columns: string[]) {
    super(
      columns.length === 1
        ? `Column "${columns[0]}" does not exist in the schedule`
        : `Columns ${columns.map((c) => `"${c}"`).join(", ")} do not exist in the schedule`
    );
  }
}

export class DateParseError extends ScheduleError {
  constructor(
    public readonly row: number,
    public readonly column: string,
    public readonly value: unknown
  ) {
    super(`Row ${row}: could not parse date in column "${column}" (got ${describeValue(value)})`);
  }
}

export class InvalidTimeRangeError extends ScheduleError {
  constructor(
    public readonly row: number,
    public readonly start: string,
    public readonly end: string
  ) {
    super(`Row ${row}: start time ${start} is not before end time ${end}`);
  }
}

export class EmptyFieldError extends ScheduleError {
  constructor(public readonly row: number, public readonly column: string) {
    super(`Row ${row}: column "${column}" is empty`);
  }
}

export class EmptyScheduleError extends ScheduleError {
  constructor() {
    super("The schedule has no exams, so no file name prefix can be derived");
  }
}

/**
 * Files are written one at a time without rollback: `written` lists the
 * files that were already on disk when the failure happened.
 */
export class WriteError extends ScheduleError {
  constructor(
    public readonly path: string,
    public readonly written: string[],
    cause: unknown
  ) {
    super(`Could not write ${path}: ${describeCause(cause)}`, { cause });
  }
}

export class SpreadsheetReadError extends ScheduleError {
  constructor(public readonly path: string, reason: string, cause?: unknown) {
    super(`Could not read spreadsheet ${path}: ${reason}`, { cause });
  }
}

export class NoScheduleFilesError extends ScheduleError {
  constructor(public readonly dir: string) {
    super(`No .xlsx schedules found in ${dir}`);
  }
}

export class InputClosedError extends ScheduleError {
  constructor(options?: { cause?: unknown }) {
    super("Input closed before a schedule file was chosen", options);
  }
}

export class ConfigError extends ScheduleError {}

function describeValue(value: unknown): string {
  if (value === null || value === undefined) return "an empty cell";
  if (typeof value === "string") return `text "${value}"`;
  if (value instanceof Date) return value.toISOString();
  return `${typeof value} ${String(value)}`;
}

export function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
