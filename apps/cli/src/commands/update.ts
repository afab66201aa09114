import { Command } from "commander";
import { checkForUpdate, computePreservationSet } from "@modkeeper/updater";
import type { ReplaceState } from "@modkeeper/updater";
import type { CliContext } from "../context.js";
import { guarded } from "./run.js";

function describeState(state: ReplaceState): string | null {
  switch (state.status) {
    case "downloading":
      return state.percent === null ? null : `Downloading... ${state.percent}%`;
    case "backing-up":
      return "Backing up your data...";
    case "purging":
      return "Removing old files...";
    case "installing":
      return "Installing new files...";
    case "restoring":
      return "Restoring your data...";
    default:
      return null;
  }
}

export function createUpdateCommand(ctx: CliContext): Command {
  const update = new Command("update").description("Check for and apply updates to this tool");

  update
    .command("check")
    .description("Ask the configured releases URL for a newer version")
    .action(
      guarded(ctx, async () => {
        const result = await checkForUpdate(ctx.config.load().updateUrl, ctx.currentVersion());
        switch (result.status) {
          case "not-configured":
            ctx.print("No update URL configured. Set one with `update set-url <url>`.");
            return;
          case "error":
            ctx.printError(`Update check failed: ${result.error}`);
            ctx.exitCode = 1;
            return;
          case "ok":
            if (!result.updateAvailable) {
              ctx.print(`Already up to date (${result.currentVersion})`);
              return;
            }
            ctx.print(`Update available: ${result.currentVersion} -> ${result.latestVersion}`);
            if (result.release.releaseNotes) ctx.print(result.release.releaseNotes);
        }
      }),
    );

  update
    .command("apply")
    .description("Download the latest release and replace program files, keeping user data")
    .option("-f, --force", "Reinstall even when no newer version is reported")
    .action(
      guarded(ctx, async (options: { force?: boolean }) => {
        const config = ctx.config.load();
        const result = await checkForUpdate(config.updateUrl, ctx.currentVersion());
        if (result.status === "not-configured") {
          ctx.print("No update URL configured. Set one with `update set-url <url>`.");
          return;
        }
        if (result.status === "error") {
          ctx.printError(`Update check failed: ${result.error}`);
          ctx.exitCode = 1;
          return;
        }
        if (!result.updateAvailable && !options.force) {
          ctx.print(`Already up to date (${result.currentVersion})`);
          return;
        }
        const downloadUrl = result.release.downloadUrl;
        if (!downloadUrl) {
          ctx.printError(`Release ${result.latestVersion} has no downloadable archive`);
          ctx.exitCode = 1;
          return;
        }

        const profileRoots = ctx.profiles.list().map((p) => p.installRoot);
        const preserved = computePreservationSet(ctx.paths.root, config, profileRoots);
        ctx.print(`Updating to ${result.latestVersion}; keeping ${[...preserved].join(", ")}`);
        const replaced = await ctx.orchestrator.replace(downloadUrl, preserved, ctx.paths.root, {
          targetVersion: result.latestVersion,
          onProgress: (state) => {
            const line = describeState(state);
            if (line) ctx.print(line);
          },
        });
        ctx.print(`Updated to ${replaced.version ?? result.latestVersion}. Restart the tool to use the new version.`);
      }),
    );

  update
    .command("set-url <url>")
    .description("Set the releases API URL used for update checks")
    .action(
      guarded(ctx, (url: string) => {
        ctx.config.save({ updateUrl: url.trim() });
        ctx.print(`Update URL set to ${url.trim()}`);
      }),
    );

  return update;
}
