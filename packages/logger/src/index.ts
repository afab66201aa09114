import { Logger } from "tslog";
import { appendFileSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";

/** Log file name kept next to the application, alongside its cfg directory. */
export const LOG_FILE_NAME = "mod_debug.log";

const fileSinks = new Set<string>();

/**
 * Also append every record to a plain-text log file.
 * Lines look like `2026-01-02T03:04:05.000Z - INFO - installer: message`.
 */
export function enableFileLog(filePath: string): void {
  mkdirSync(dirname(filePath), { recursive: true });
  fileSinks.add(filePath);
}

export function disableFileLog(filePath: string): void {
  fileSinks.delete(filePath);
}

export function formatLogLine(logObj: Record<string, unknown>): string {
  const meta = logObj._meta;
  const parts: string[] = [];
  for (const [key, value] of Object.entries(logObj)) {
    if (key === "_meta") continue;
    parts.push(typeof value === "string" ? value : JSON.stringify(value));
  }
  const hasMeta = typeof meta === "object" && meta !== null;
  const date = hasMeta && "date" in meta ? meta.date : undefined;
  const level = hasMeta && "logLevelName" in meta ? meta.logLevelName : undefined;
  const name = hasMeta && "name" in meta ? meta.name : undefined;
  const stamp = date instanceof Date ? date.toISOString() : new Date().toISOString();
  return `${stamp} - ${typeof level === "string" ? level : "LOG"} - ${typeof name === "string" ? name : "root"}: ${parts.join(" ")}`;
}

function writeToSinks(logObj: Record<string, unknown>): void {
  if (fileSinks.size === 0) return;
  const line = formatLogLine(logObj) + "\n";
  for (const sink of fileSinks) {
    try {
      appendFileSync(sink, line);
    } catch (err) {
      fileSinks.delete(sink);
      console.error(`Log file ${sink} is not writable, detaching it:`, err);
    }
  }
}

export function createLogger(name: string): Logger<unknown> {
  const logger = new Logger<unknown>({
    name,
    type: "pretty",
    minLevel: process.env.NODE_ENV === "production" ? 3 : 0,
  });
  logger.attachTransport(writeToSinks);
  return logger;
}
