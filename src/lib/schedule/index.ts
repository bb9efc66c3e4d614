/**
 * Proctor schedule module barrel exports
 * Includes: Row Parser, Record Normalizer, Calendar Builder, iCalendar rendering, File Writer, Pipeline
 */

export * from "./types";
export * from "./errors";
export * from "./config";
export * from "./logger";
export * from "./reader";
export * from "./normalizer";
export * from "./buildings";
export * from "./builder";
export * from "./ics";
export * from "./writer";
export * from "./pipeline";
