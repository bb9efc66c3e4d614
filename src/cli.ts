#!/usr/bin/env node

/**
 * Proctor Schedule CLI
 * Converts an exam proctoring workbook into iCalendar files.
 *
 * Run: npm run build && node dist/cli.js --schedule 2026-04-finals.xlsx
 */

import fs from "fs";
import path from "path";
import dotenv from "dotenv";
import { Command, CommanderError, InvalidArgumentError } from "commander";
import { terminalFileSelector, listScheduleFiles } from "./handlers/file-prompt";
import type { FileSelector } from "./handlers/file-prompt";
import { WriteError, createLogger, describeCause, loadConfig, runPipeline } from "./lib/schedule";
import type { Logger, ScheduleConfig } from "./lib/schedule";

export interface CliDeps {
  config?: ScheduleConfig;
  selectFile?: FileSelector;
  logger?: Logger;
}

type CliOptions = {
  schedule?: string;
  startOffset?: number;
};

/**
 * Parse arguments, run the pipeline, and return the process exit code.
 */
export async function run(argv: string[], deps: CliDeps = {}): Promise<number> {
  const program = new Command()
    .name("proctor-schedule")
    .description("Create ICS calendars from an exam proctoring schedule")
    .option("-s, --schedule <file>", "schedule to convert (a bare name is looked up in the raw data directory)")
    .option("--start-offset <minutes>", "minutes before the exam start that each event begins", parseMinutes)
    .exitOverride();

  try {
    program.parse(argv, { from: "user" });
  } catch (err) {
    if (err instanceof CommanderError) return err.exitCode;
    throw err;
  }
  const options = program.opts<CliOptions>();

  let logger: Logger = deps.logger ?? createLogger(null);
  try {
    const loaded = deps.config ?? loadConfig();
    const config: ScheduleConfig = options.startOffset === undefined
      ? loaded
      : { ...loaded, startOffsetMinutes: options.startOffset };
    if (!deps.logger) logger = createLogger(config.logsDir);

    const inputPath = await resolveInput(options.schedule, config, deps.selectFile ?? terminalFileSelector);
    logger.info("CLI", `Converting ${inputPath}`);

    const result = await runPipeline(inputPath, config, logger);
    logger.success(
      "CLI",
      `${result.files.length} calendars written (${result.eventCount} events, ${result.proctorCount} proctors)`
    );
    return 0;
  } catch (err) {
    logger.error("CLI", `Error: ${describeCause(err)}`);
    if (err instanceof WriteError && err.written.length > 0) {
      logger.warn("CLI", `Files written before the failure were kept: ${err.written.join(", ")}`);
    }
    return 1;
  }
}

async function resolveInput(
  schedule: string | undefined,
  config: ScheduleConfig,
  selectFile: FileSelector
): Promise<string> {
  if (schedule) {
    return fs.existsSync(schedule) ? path.resolve(schedule) : path.join(config.rawDir, schedule);
  }
  const files = listScheduleFiles(config.rawDir);
  return path.join(config.rawDir, await selectFile(files));
}

function parseMinutes(value: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new InvalidArgumentError("Expected a whole number of minutes.");
  }
  return Number(value);
}

if (require.main === module) {
  dotenv.config();
  run(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((err) => {
      console.error(err);
      process.exitCode = 1;
    });
}
