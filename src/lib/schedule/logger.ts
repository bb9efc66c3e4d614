/**
 * Tagged console logger with an optional append-only log file.
 * Lines look like `[READER] Read 12 rows from may.xlsx`.
 */

import fs from "fs";
import path from "path";
import chalk from "chalk";
import { format } from "date-fns";

type Level = "INFO" | "WARN" | "ERROR" | "SUCCESS";

export interface Logger {
  info(tag: string, message: string): void;
  warn(tag: string, message: string): void;
  error(tag: string, message: string): void;
  success(tag: string, message: string): void;
}

export const LOG_FILE_NAME = "proctor-schedule.log";

export function createLogger(logsDir: string | null): Logger {
  const logFile = logsDir ? path.join(logsDir, LOG_FILE_NAME) : null;

  const write = (level: Level, tag: string, message: string) => {
    const line = `[${tag}] ${message}`;
    if (level === "ERROR") console.error(chalk.red(line));
    else if (level === "WARN") console.warn(chalk.yellow(line));
    else if (level === "SUCCESS") console.log(chalk.green(line));
    else console.log(line);

    if (!logFile) return;
    const timestamp = format(new Date(), "yyyy-MM-dd HH:mm:ss.SSS");
    try {
      fs.mkdirSync(path.dirname(logFile), { recursive: true });
      fs.appendFileSync(logFile, `${timestamp} | ${level.padEnd(7)} | ${line}\n`, "utf-8");
    } catch (err) {
      // The run goes on without the file
      console.error(`[LOGGER] Could not write to ${logFile}:`, err);
    }
  };

  return {
    info: (tag, message) => write("INFO", tag, message),
    warn: (tag, message) => write("WARN", tag, message),
    error: (tag, message) => write("ERROR", tag, message),
    success: (tag, message) => write("SUCCESS", tag, message),
  };
}

/** Logger for tests and library callers that want no output */
export const silentLogger: Logger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  success: () => undefined,
};
