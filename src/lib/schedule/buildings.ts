/**
 * Building directory: expands the building code at the front of a room
 * ("SH-2355" → "Science Hall: 100 College Rd").
 * Loaded from a JSON array of { abbreviation, name, address }.
 */

import fs from "fs";
import { ConfigError, describeCause } from "./errors";
import type { Logger } from "./logger";
import { silentLogger } from "./logger";
import type { Building } from "./types";

export type BuildingDirectory = Map<string, Building>;

export function loadBuildingDirectory(
  file: string | null,
  logger: Logger = silentLogger
): BuildingDirectory {
  const directory: BuildingDirectory = new Map();
  if (!file) return directory;

  if (!fs.existsSync(file)) {
    logger.info("BUILDINGS", `No building directory at ${file}, descriptions will not name buildings`);
    return directory;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(file, "utf-8"));
  } catch (err) {
    throw new ConfigError(`Building directory ${file} is not valid JSON: ${describeCause(err)}`, { cause: err });
  }

  if (!Array.isArray(parsed)) {
    throw new ConfigError(`Building directory ${file} must contain a JSON array`);
  }

  parsed.forEach((entry: unknown, index) => {
    const building = toBuilding(entry);
    if (!building) {
      throw new ConfigError(
        `Building directory ${file}: entry ${index} needs string "abbreviation", "name" and "address" fields`
      );
    }
    directory.set(building.abbreviation, building);
  });

  logger.info("BUILDINGS", `Loaded ${directory.size} buildings`);
  return directory;
}

/**
 * Full name and address of the building a location is in, or null when the
 * building code is unknown.
 */
export function describeBuilding(
  location: string | null,
  directory: BuildingDirectory
): string | null {
  if (!location) return null;
  const code = location.split("-")[0].trim();
  const building = directory.get(code);
  if (!building) return null;
  return building.address ? `${building.name}: ${building.address}` : building.name;
}

function toBuilding(entry: unknown): Building | null {
  if (typeof entry !== "object" || entry === null) return null;
  const abbreviation = "abbreviation" in entry ? entry.abbreviation : undefined;
  const name = "name" in entry ? entry.name : undefined;
  const address = "address" in entry ? entry.address : undefined;
  if (typeof abbreviation !== "string" || typeof name !== "string" || typeof address !== "string") {
    return null;
  }
  return { abbreviation: abbreviation.trim(), name: name.trim(), address: address.trim() };
}
