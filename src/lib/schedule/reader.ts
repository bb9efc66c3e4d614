/**
 * Proctor Schedule - Row Parser
 * Reads the proctoring workbook into RawRow records and checks the column set.
 * Cell types are left alone; the normalizer decides what is a valid date.
 */

import * as ExcelJS from "exceljs";
import path from "path";
import type { ColumnSchema, ScheduleConfig } from "./config";
import { COLUMN_FIELDS, REQUIRED_COLUMNS } from "./config";
import { MissingColumnError, SpreadsheetReadError, describeCause } from "./errors";
import type { RawCell, RawRow } from "./types";
import type { Logger } from "./logger";
import { silentLogger } from "./logger";

export type ReaderOptions = Pick<ScheduleConfig, "columns" | "headerRow" | "sheet">;

/** Where each row key comes from on the worksheet */
export interface ColumnLayout {
  /** Worksheet column → row key, for every column that is not a proctor column */
  keys: Map<number, string>;
  /** Columns whose header starts with the proctor column name, left to right */
  proctorColumns: number[];
}

/**
 * Read every non-empty row below the header row.
 * Schema columns are keyed by their configured name, any other column by its
 * header text.
 *
 * A sheet may list several proctors per exam ("Proctor 1", "Proctor 2", ...).
 * Each named proctor gives its own RawRow, all with the same worksheet row
 * number. A row with no proctor at all is kept once so the normalizer can
 * reject it.
 */
export async function readScheduleRows(
  filePath: string,
  options: ReaderOptions,
  logger: Logger = silentLogger
): Promise<RawRow[]> {
  const workbook = new ExcelJS.Workbook();
  try {
    await workbook.xlsx.readFile(filePath);
  } catch (err) {
    throw new SpreadsheetReadError(filePath, describeCause(err), err);
  }

  const sheet = options.sheet
    ? workbook.getWorksheet(options.sheet)
    : workbook.worksheets[0];
  if (!sheet) {
    throw new SpreadsheetReadError(
      filePath,
      options.sheet ? `no worksheet named "${options.sheet}"` : "the workbook has no worksheets"
    );
  }

  const headers = new Map<number, string>();
  sheet.getRow(options.headerRow).eachCell((cell, colNumber) => {
    const text = cell.text.trim();
    if (text) headers.set(colNumber, text);
  });

  const layout = resolveColumns(headers, options.columns);
  const proctorKey = options.columns.proctor;

  const rows: RawRow[] = [];
  sheet.eachRow((row, rowNumber) => {
    if (rowNumber <= options.headerRow) return;

    const values: Record<string, RawCell> = {};
    for (const [colNumber, key] of layout.keys) {
      values[key] = flattenCell(row.getCell(colNumber).value);
    }
    const proctors = layout.proctorColumns
      .map((colNumber) => flattenCell(row.getCell(colNumber).value))
      .filter((cell) => !isBlank(cell));

    if (proctors.length === 0) {
      if (Object.values(values).every(isBlank)) return;
      rows.push({ row: rowNumber, values: { ...values, [proctorKey]: null } });
      return;
    }

    for (const proctor of proctors) {
      rows.push({ row: rowNumber, values: { ...values, [proctorKey]: proctor } });
    }
  });

  logger.info("READER", `Read ${rows.length} rows from ${path.basename(filePath)} (sheet "${sheet.name}")`);
  return rows;
}

/**
 * Map worksheet columns to row keys. Headers match case-insensitively.
 * The first column with a schema header gets the schema key; a repeated
 * header is kept as `<header> (column N)`.
 * @throws MissingColumnError naming every required column that is absent
 */
export function resolveColumns(
  headers: Map<number, string>,
  columns: ColumnSchema
): ColumnLayout {
  const proctorLabel = columns.proctor.trim().toLowerCase();
  const proctorColumns = [...headers]
    .filter(([, text]) => text.toLowerCase().startsWith(proctorLabel))
    .map(([colNumber]) => colNumber)
    .sort((a, b) => a - b);

  const byLabel = new Map<string, number>();
  for (const [colNumber, text] of headers) {
    const label = text.toLowerCase();
    if (!byLabel.has(label) && !proctorColumns.includes(colNumber)) byLabel.set(label, colNumber);
  }

  const keys = new Map<number, string>();
  const missing: string[] = [];

  for (const field of COLUMN_FIELDS) {
    const name = columns[field];
    if (field === "proctor") {
      if (proctorColumns.length === 0) missing.push(name);
      continue;
    }
    const colNumber = byLabel.get(name.trim().toLowerCase());
    if (colNumber === undefined) {
      if (isRequired(field)) missing.push(name);
      continue;
    }
    keys.set(colNumber, name);
  }

  if (missing.length > 0) {
    throw new MissingColumnError(missing);
  }

  // Unknown columns ride along under their own header
  const used = new Set([...keys.values()].map((key) => key.toLowerCase()));
  for (const [colNumber, text] of headers) {
    if (keys.has(colNumber) || proctorColumns.includes(colNumber)) continue;
    const key = used.has(text.toLowerCase()) ? `${text} (column ${colNumber})` : text;
    used.add(key.toLowerCase());
    keys.set(colNumber, key);
  }

  return { keys, proctorColumns };
}

/**
 * Collapse exceljs cell values into plain values.
 * Rich text and hyperlinks become text, formulas their cached result,
 * error cells null.
 */
export function flattenCell(value: ExcelJS.CellValue): RawCell {
  if (value === null || value === undefined) return null;
  if (
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean" ||
    value instanceof Date
  ) {
    return value;
  }
  if ("richText" in value) {
    return value.richText.map((part) => part.text).join("");
  }
  if ("hyperlink" in value) {
    return value.text;
  }
  if ("error" in value) {
    return null;
  }

  const result = value.result;
  if (result instanceof Date) return result;
  if (typeof result === "string" || typeof result === "number" || typeof result === "boolean") {
    return result;
  }
  return null;
}

function isRequired(field: keyof ColumnSchema): boolean {
  return REQUIRED_COLUMNS.some((required) => required === field);
}

function isBlank(cell: RawCell): boolean {
  return cell === null || (typeof cell === "string" && cell.trim() === "");
}
