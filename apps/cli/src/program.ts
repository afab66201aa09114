import { Command } from "commander";
import type { CliContext } from "./context.js";
import {
  createGameCommand,
  createModsCommand,
  createProfileCommand,
  createUpdateCommand,
} from "./commands/index.js";

/**
 * Create and configure the main CLI program
 */
export function createProgram(ctx: CliContext): Command {
  const program = new Command();

  program
    .name("modkeeper")
    .description("Install game mods from archive URLs and keep this tool up to date")
    .version(ctx.currentVersion(), "-V, --version", "Output the version number")
    .configureOutput({
      writeOut: (str) => ctx.print(str.trimEnd()),
      writeErr: (str) => ctx.printError(str.trimEnd()),
    })
    .addHelpText(
      "after",
      `
Examples:
  $ modkeeper profile create Heavy          Create a profile
  $ modkeeper mods add https://github.com/owner/repo
  $ modkeeper mods update                   Install every mod of the current profile
  $ modkeeper update apply                  Update this tool, keeping cfg/ and mods/
  $ modkeeper game install                  Install the newest game build
  $ modkeeper game launch                   Start the installed game
`,
    );

  program.addCommand(createProfileCommand(ctx));
  program.addCommand(createModsCommand(ctx));
  program.addCommand(createUpdateCommand(ctx));
  program.addCommand(createGameCommand(ctx));

  return program;
}
