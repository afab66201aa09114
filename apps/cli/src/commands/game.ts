import { resolve } from "node:path";
import { Command } from "commander";
import { readVersionRecord } from "@modkeeper/storage";
import { installGameBuild, launchGame, listGameBuilds } from "@modkeeper/updater";
import type { CliContext } from "../context.js";
import { guarded, parsePosition } from "./run.js";

interface GameOptions {
  experimental?: boolean;
}

function gameDirOf(ctx: CliContext): string {
  return ctx.config.load().gameInstallDir ?? ctx.paths.defaultInstallDir;
}

export function createGameCommand(ctx: CliContext): Command {
  const game = new Command("game").description("Install and start game builds");

  game
    .command("list")
    .description("List recent tiles builds for this platform")
    .option("-e, --experimental", "Show the experimental channel")
    .action(
      guarded(ctx, async (options: GameOptions) => {
        const builds = await listGameBuilds({ experimental: options.experimental ?? false });
        if (builds.length === 0) {
          ctx.print("No releases found");
          return;
        }
        const installed = readVersionRecord(ctx.paths.versionFile)?.gameVersion;
        builds.forEach((build, i) => {
          const marker = build.name === installed ? " (installed)" : "";
          ctx.print(`${i + 1}. ${build.name}${marker}`);
        });
      }),
    );

  game
    .command("install [position]")
    .description("Download a build (default: the newest) into the game directory")
    .option("-e, --experimental", "Pick from the experimental channel")
    .option("-d, --dir <dir>", "Game directory (saved to config)")
    .action(
      guarded(ctx, async (position: string | undefined, options: GameOptions & { dir?: string }) => {
        const builds = await listGameBuilds({ experimental: options.experimental ?? false });
        const index = position === undefined ? 0 : parsePosition(position);
        const build = builds.at(index);
        if (!build) {
          throw new Error(`No build #${index + 1}; ${builds.length} available`);
        }

        let gameDir = gameDirOf(ctx);
        if (options.dir) {
          gameDir = resolve(ctx.paths.root, options.dir);
          ctx.config.save({ gameInstallDir: gameDir });
        }

        ctx.print(`Downloading ${build.assetName}...`);
        const result = await installGameBuild(build, gameDir, ctx.paths.versionFile);
        ctx.print(`Installed ${build.name} to ${result.destination} (${result.filesWritten} files)`);
      }),
    );

  game
    .command("launch")
    .description("Start the installed tiles build")
    .action(
      guarded(ctx, async () => {
        const launched = await launchGame(gameDirOf(ctx));
        ctx.print(`Started ${launched.executable}`);
      }),
    );

  return game;
}
