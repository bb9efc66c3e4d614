/**
 * Proctor Schedule - Pipeline
 * read → normalize → build → write, in one straight line.
 * Nothing is written until every row has been normalized.
 */

import fs from "fs";
import path from "path";
import { loadBuildingDirectory } from "./buildings";
import { buildCalendars } from "./builder";
import type { ScheduleConfig } from "./config";
import { SpreadsheetReadError, describeCause } from "./errors";
import type { Logger } from "./logger";
import { silentLogger } from "./logger";
import { normalizeRows } from "./normalizer";
import { readScheduleRows } from "./reader";
import type { PipelineResult } from "./types";
import { schedulePrefix, writeCalendars } from "./writer";

export async function runPipeline(
  inputPath: string,
  config: ScheduleConfig,
  logger: Logger = silentLogger
): Promise<PipelineResult> {
  const rows = await readScheduleRows(inputPath, config, logger);
  const assignments = normalizeRows(rows, config.columns, logger);

  const calendars = buildCalendars(assignments, {
    startOffsetMinutes: config.startOffsetMinutes,
    buildings: loadBuildingDirectory(config.buildingsFile, logger),
  });
  const prefix = schedulePrefix(calendars.master);

  const files = writeCalendars(
    calendars,
    {
      scheduleDir: config.scheduleDir,
      proctorDir: config.proctorDir,
      timezone: config.timezone,
      stamp: inputModifiedAt(inputPath),
    },
    logger
  );

  logger.success("PIPELINE", `Created ICS calendars for ${prefix} from ${path.basename(inputPath)}`);

  return {
    prefix,
    files,
    eventCount: calendars.master.length,
    proctorCount: calendars.byProctor.size,
  };
}

/** DTSTAMP source: same input file, same stamp, same bytes out */
function inputModifiedAt(inputPath: string): Date {
  try {
    return fs.statSync(inputPath).mtime;
  } catch (err) {
    throw new SpreadsheetReadError(inputPath, describeCause(err), err);
  }
}
