import { PartialUpdateError, formatError } from "@modkeeper/core";
import { createLogger } from "@modkeeper/logger";
import type { CliContext } from "../context.js";

const log = createLogger("cli");

/** Print a one-line failure (and recovery advice where there is any) and mark the run failed. */
export function reportError(ctx: CliContext, err: unknown): void {
  log.error(`Command failed: ${formatError(err)}`);
  ctx.printError(`Error: ${formatError(err)}`);
  if (err instanceof PartialUpdateError) {
    ctx.printError(
      err.restored
        ? "Your data folders were restored, but program files are incomplete. Download the release manually and extract it over this folder."
        : `Your data could not be restored automatically. Copy it back from ${err.backupPath ?? "your own backups"} before running again.`,
    );
  }
  ctx.exitCode = 1;
}

/** Wrap a command action so errors end up as short messages instead of stack traces. */
export function guarded<A extends unknown[]>(
  ctx: CliContext,
  fn: (...args: A) => Promise<void> | void,
): (...args: A) => Promise<void> {
  return async (...args: A) => {
    try {
      await fn(...args);
    } catch (err) {
      reportError(ctx, err);
    }
  };
}

/** Parse a 1-based position typed by the user into an array index. */
export function parsePosition(value: string): number {
  const position = Number(value);
  if (!Number.isInteger(position) || position < 1) {
    throw new Error(`Expected a positive number, got "${value}"`);
  }
  return position - 1;
}
