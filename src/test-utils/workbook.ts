/**
 * Test helpers: build proctoring workbooks on disk with exceljs.
 */

import fs from "fs";
import os from "os";
import path from "path";
import * as ExcelJS from "exceljs";
import { DEFAULT_COLUMNS } from "../lib/schedule/config";
import type { ScheduleConfig } from "../lib/schedule/config";

export const HEADERS = [
  DEFAULT_COLUMNS.exam,
  DEFAULT_COLUMNS.date,
  DEFAULT_COLUMNS.start_time,
  DEFAULT_COLUMNS.end_time,
  DEFAULT_COLUMNS.proctor,
  DEFAULT_COLUMNS.location,
];

/** Calendar day as the spreadsheet stores it (UTC midnight) */
export function day(year: number, month: number, date: number): Date {
  return new Date(Date.UTC(year, month - 1, date));
}

/** Time-only cell value (Excel's 1899-12-30 epoch) */
export function clock(hours: number, minutes: number): Date {
  return new Date(Date.UTC(1899, 11, 30, hours, minutes));
}

export function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), "proctor-schedule-"));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

/**
 * Write a workbook with two title rows, a header row on row 3, then `rows`.
 * Date values get a date or time number format so they read back as dates.
 */
export async function writeWorkbook(
  filePath: string,
  rows: ExcelJS.CellValue[][],
  headers: string[] = HEADERS
): Promise<void> {
  const workbook = new ExcelJS.Workbook();
  const sheet = workbook.addWorksheet("Schedule");

  sheet.getRow(1).getCell(1).value = "Final examination proctoring";
  sheet.getRow(2).getCell(1).value = "Draft schedule";
  headers.forEach((header, i) => {
    sheet.getRow(3).getCell(i + 1).value = header;
  });

  rows.forEach((values, r) => {
    const row = sheet.getRow(4 + r);
    values.forEach((value, c) => {
      const cell = row.getCell(c + 1);
      cell.value = value;
      if (value instanceof Date) {
        cell.numFmt = value.getUTCFullYear() === 1899 ? "hh:mm" : "yyyy-mm-dd";
      }
    });
  });

  await workbook.xlsx.writeFile(filePath);
}

/** Config rooted in a temp directory, floating times, no log file */
export function testConfig(root: string, overrides: Partial<ScheduleConfig> = {}): ScheduleConfig {
  return {
    columns: { ...DEFAULT_COLUMNS },
    headerRow: 3,
    sheet: null,
    rawDir: path.join(root, "raw"),
    scheduleDir: path.join(root, "interim"),
    proctorDir: path.join(root, "processed"),
    logsDir: null,
    buildingsFile: null,
    timezone: null,
    startOffsetMinutes: 0,
    ...overrides,
  };
}

/** Every file below `dir`, relative, sorted */
export function listFiles(dir: string): string[] {
  if (!fs.existsSync(dir)) return [];
  const found: string[] = [];
  const walk = (current: string) => {
    for (const entry of fs.readdirSync(current, { withFileTypes: true })) {
      const full = path.join(current, entry.name);
      if (entry.isDirectory()) walk(full);
      else found.push(path.relative(dir, full));
    }
  };
  walk(dir);
  return found.sort();
}
