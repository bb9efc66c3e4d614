/**
 * Input file selection for the CLI.
 * Lists the .xlsx schedules in the raw data directory and asks for a number.
 */

import fs from "fs";
import { createInterface } from "readline/promises";
import type { Interface } from "readline/promises";
import { InputClosedError, NoScheduleFilesError } from "../lib/schedule/errors";

/** Picks one file name out of the candidates */
export type FileSelector = (files: string[]) => Promise<string>;

export type Ask = (question: string) => Promise<string>;

/**
 * Schedule workbooks in `dir`, sorted by name.
 * Excel's "~$" lock files are skipped.
 */
export function listScheduleFiles(dir: string): string[] {
  const files = fs.existsSync(dir)
    ? fs.readdirSync(dir).filter((name) => name.toLowerCase().endsWith(".xlsx") && !name.startsWith("~$"))
    : [];
  if (files.length === 0) {
    throw new NoScheduleFilesError(dir);
  }
  return files.sort();
}

/**
 * Print a numbered menu and ask until a valid number comes back.
 */
export async function promptForFile(
  files: string[],
  ask: Ask,
  print: (line: string) => void = console.log
): Promise<string> {
  print("Select a file to convert to ICS:");
  files.forEach((file, i) => print(`${i + 1}. ${file}`));

  while (true) {
    const answer = (await ask("Enter the number of the file: ")).trim();
    if (!/^\d+$/.test(answer)) {
      print("Please enter a valid number.");
      continue;
    }
    const choice = Number(answer);
    if (choice >= 1 && choice <= files.length) {
      return files[choice - 1];
    }
    print("Invalid number. Try again.");
  }
}

/**
 * Ask through a readline interface. Once the input ends (Ctrl-D, a closed
 * pipe) every pending and later question rejects with InputClosedError.
 */
export function closableQuestion(rl: Interface): Ask {
  const controller = new AbortController();
  rl.once("close", () => controller.abort());

  return async (question) => {
    if (controller.signal.aborted) throw new InputClosedError();
    try {
      return await rl.question(question, { signal: controller.signal });
    } catch (err) {
      if (controller.signal.aborted) throw new InputClosedError({ cause: err });
      throw err;
    }
  };
}

/**
 * FileSelector bound to the terminal
 */
export const terminalFileSelector: FileSelector = async (files) => {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    return await promptForFile(files, closableQuestion(rl));
  } finally {
    rl.close();
  }
};
