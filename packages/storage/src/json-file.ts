import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";

export type JsonReadResult =
  | { status: "ok"; value: unknown }
  | { status: "not-found" }
  | { status: "invalid"; error: string };

/** Read and parse a JSON file; a missing file is a normal outcome, not an error. */
export function readJsonFile(filePath: string): JsonReadResult {
  if (!existsSync(filePath)) return { status: "not-found" };
  const text = readFileSync(filePath, "utf-8");
  try {
    return { status: "ok", value: JSON.parse(text) as unknown };
  } catch (err) {
    return { status: "invalid", error: err instanceof Error ? err.message : String(err) };
  }
}

export function writeJsonFile(filePath: string, value: unknown): void {
  mkdirSync(dirname(filePath), { recursive: true });
  writeFileSync(filePath, JSON.stringify(value, null, 2) + "\n", "utf-8");
}
