import { z } from "zod/v4";
import type { VersionRecord } from "@modkeeper/core";
import { createLogger } from "@modkeeper/logger";
import { readJsonFile, writeJsonFile } from "./json-file.js";

const log = createLogger("storage:version");

const storedVersionSchema = z.looseObject({
  program_version: z.string().optional(),
  game_version: z.string().optional(),
  /** Written by releases before program_version existed */
  version: z.string().optional(),
});

type StoredVersion = z.infer<typeof storedVersionSchema>;

function readStored(filePath: string): StoredVersion | null {
  const read = readJsonFile(filePath);
  if (read.status === "not-found") return null;
  if (read.status === "invalid") {
    log.warn(`Version file ${filePath} is not valid JSON: ${read.error}`);
    return null;
  }
  const parsed = storedVersionSchema.safeParse(read.value);
  if (!parsed.success) {
    log.warn(`Version file ${filePath} has an unexpected shape`);
    return null;
  }
  return parsed.data;
}

/** Read version.json. Returns null when the file does not exist or cannot be parsed. */
export function readVersionRecord(filePath: string): VersionRecord | null {
  const stored = readStored(filePath);
  if (!stored) return null;
  const record: VersionRecord = {};
  const programVersion = stored.program_version ?? stored.version;
  if (programVersion) record.programVersion = programVersion;
  if (stored.game_version) record.gameVersion = stored.game_version;
  return record;
}

/**
 * Merge `patch` into version.json. Fields not named in the patch, including
 * unknown keys, are left as they are.
 */
export function writeVersionRecord(filePath: string, patch: VersionRecord): VersionRecord {
  const stored: StoredVersion = { ...(readStored(filePath) ?? {}) };
  if (patch.programVersion !== undefined) {
    stored.program_version = patch.programVersion;
    delete stored.version;
  }
  if (patch.gameVersion !== undefined) stored.game_version = patch.gameVersion;
  writeJsonFile(filePath, stored);
  log.info(`Version record updated: ${JSON.stringify(patch)}`);
  return readVersionRecord(filePath) ?? {};
}
