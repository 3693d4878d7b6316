/**
 * IP to container mapping shared with the proxy.
 *
 * The proxy attributes captured traffic to agents by source IP, reading
 * containers.json next to its database.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { createLogger, describeError } from "./logger.js";
import { isConfigObject } from "./config.js";

const logger = createLogger("mapping");

export interface ContainerMappingEntry {
  container_id: string;
  container_name: string;
  agent: string;
  started_at: string;
}

export type ContainerMapping = Record<string, ContainerMappingEntry>;

function isMappingEntry(value: unknown): value is ContainerMappingEntry {
  return (
    isConfigObject(value) &&
    typeof value["container_id"] === "string" &&
    typeof value["container_name"] === "string" &&
    typeof value["agent"] === "string" &&
    typeof value["started_at"] === "string"
  );
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}

/**
 * Read the mapping file. Missing, unreadable or corrupt files read as empty;
 * malformed entries are dropped.
 */
export function readContainerMapping(mappingPath: string): ContainerMapping {
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(mappingPath, "utf-8"));
  } catch (error) {
    if (!(error instanceof SyntaxError) && !isErrnoException(error)) {
      throw error;
    }
    return {};
  }

  const mapping: ContainerMapping = {};
  if (isConfigObject(parsed)) {
    for (const [ip, entry] of Object.entries(parsed)) {
      if (isMappingEntry(entry)) {
        mapping[ip] = entry;
      }
    }
  }
  return mapping;
}

/**
 * Merge one entry into the mapping file, replacing any entry for the same IP.
 * Writes a temp file and renames it over the existing file.
 *
 * @returns false if the file could not be written
 */
export function updateContainerMapping(
  mappingPath: string,
  ip: string,
  entry: Omit<ContainerMappingEntry, "started_at">,
  now: () => Date = () => new Date()
): boolean {
  const mapping = readContainerMapping(mappingPath);
  mapping[ip] = { ...entry, started_at: now().toISOString() };

  const tempPath = `${mappingPath}.tmp.${process.pid}`;
  try {
    fs.mkdirSync(path.dirname(mappingPath), { recursive: true });
    fs.writeFileSync(tempPath, JSON.stringify(mapping, null, 2) + "\n", "utf-8");
    fs.renameSync(tempPath, mappingPath);
  } catch (error) {
    if (!isErrnoException(error)) {
      throw error;
    }
    logger.warn(`Failed to write ${mappingPath}: ${describeError(error)}`);
    if (fs.existsSync(tempPath)) {
      fs.rmSync(tempPath);
    }
    return false;
  }
  return true;
}
