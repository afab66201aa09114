#!/usr/bin/env node
/**
 * modkeeper CLI
 *
 * Manages mod profiles, installs mod archives into the game's user folder,
 * installs game builds and updates the tool itself while keeping user data.
 *
 * @example
 * ```bash
 * modkeeper profile list
 * modkeeper mods add https://github.com/owner/repo --type tileset
 * modkeeper mods update
 * modkeeper update check
 * ```
 */

import { enableFileLog } from "@modkeeper/logger";
import { createContext } from "./context.js";
import { createProgram } from "./program.js";

/**
 * Main entry point
 */
async function main(): Promise<void> {
  const ctx = createContext(process.env.MODKEEPER_HOME ?? process.cwd());
  enableFileLog(ctx.paths.logFile);
  await createProgram(ctx).parseAsync(process.argv);
  process.exitCode = ctx.exitCode;
}

main().catch((err: unknown) => {
  console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
  process.exitCode = 1;
});
