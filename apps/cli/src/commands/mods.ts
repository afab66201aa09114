import { existsSync, readdirSync } from "node:fs";
import { join } from "node:path";
import { Command, Option } from "commander";
import { CONTENT_TYPE_DIRS, contentTypeSchema, modDisplayName } from "@modkeeper/core";
import type { Mod } from "@modkeeper/core";
import type { CliContext } from "../context.js";
import { guarded, parsePosition } from "./run.js";

interface AddOptions {
  subdir?: string;
  installDir?: string;
  keepStructure?: boolean;
  type: string;
}

function describeMod(mod: Mod): string {
  const details: string[] = [mod.contentType ?? "mod"];
  if (mod.contentSubpath) details.push(`from ${mod.contentSubpath}`);
  if (mod.installSubpath) details.push(`into ${mod.installSubpath}`);
  if (mod.preserveOriginalLayout) details.push("keep structure");
  return `${modDisplayName(mod)} [${details.join(", ")}]`;
}

function modAt(ctx: CliContext, position: string): { index: number; mod: Mod } {
  const index = parsePosition(position);
  const mods = ctx.profiles.current.mods;
  if (index >= mods.length) {
    throw new Error(`No mod #${index + 1} in profile "${ctx.profiles.currentProfileName}" (it has ${mods.length})`);
  }
  return { index, mod: mods[index] };
}

export function createModsCommand(ctx: CliContext): Command {
  const mods = new Command("mods").description("Manage the mods of the current profile");

  mods
    .command("list")
    .description("List mods in the current profile")
    .action(
      guarded(ctx, () => {
        const profile = ctx.profiles.current;
        if (profile.mods.length === 0) {
          ctx.print(`Profile "${profile.name}" has no mods`);
          return;
        }
        profile.mods.forEach((mod, i) => ctx.print(`${i + 1}. ${describeMod(mod)}`));
      }),
    );

  mods
    .command("add <url>")
    .description("Add a mod archive URL to the current profile")
    .option("-s, --subdir <path>", "Folder inside the archive to install")
    .option("-i, --install-dir <path>", "Folder under the install root to install into")
    .option("-k, --keep-structure", "Copy the archive as-is instead of looking for modinfo.json")
    .addOption(
      new Option("-t, --type <type>", "Content type").choices(contentTypeSchema.options).default("mod"),
    )
    .action(
      guarded(ctx, (url: string, options: AddOptions) => {
        const mod: Mod = {
          sourceUrl: url,
          preserveOriginalLayout: options.keepStructure ?? false,
          contentType: contentTypeSchema.parse(options.type),
        };
        if (options.subdir) mod.contentSubpath = options.subdir;
        if (options.installDir) mod.installSubpath = options.installDir;
        ctx.profiles.addMod(mod);
        ctx.print(`Added ${describeMod(mod)}`);
      }),
    );

  mods
    .command("remove <position>")
    .description("Remove a mod by its position in `mods list`")
    .action(
      guarded(ctx, (position: string) => {
        const { index } = modAt(ctx, position);
        const removed = ctx.profiles.removeMod(index);
        ctx.print(`Removed ${modDisplayName(removed)}`);
      }),
    );

  mods
    .command("update [position]")
    .description("Download and install every mod, or only the one at a position")
    .action(
      guarded(ctx, async (position: string | undefined) => {
        const profile = ctx.profiles.current;
        const batch = position === undefined ? profile.mods : [modAt(ctx, position).mod];
        if (batch.length === 0) {
          ctx.print(`Profile "${profile.name}" has no mods to install`);
          return;
        }

        const summary = await ctx.installer.installAll(batch, profile.installRoot, (progress) => {
          const prefix = `[${progress.index + 1}/${progress.total}]`;
          if (progress.status === "installing") ctx.print(`${prefix} Installing ${progress.name}...`);
          else if (progress.status === "failed") ctx.print(`${prefix} Failed: ${progress.failure.message}`);
        });

        ctx.print(`Installed ${summary.succeeded.length} of ${batch.length} mods into ${profile.installRoot}`);
        if (summary.failed.length > 0) {
          for (const failure of summary.failed) ctx.printError(`  ${failure.name}: ${failure.message}`);
          ctx.exitCode = 1;
        }
      }),
    );

  mods
    .command("installed")
    .description("List folders present in the install root's content folders")
    .action(
      guarded(ctx, () => {
        const root = ctx.profiles.current.installRoot;
        for (const folder of Object.values(CONTENT_TYPE_DIRS)) {
          const dir = join(root, folder);
          if (!existsSync(dir)) continue;
          const entries = readdirSync(dir, { withFileTypes: true })
            .filter((entry) => entry.isDirectory())
            .map((entry) => entry.name)
            .sort();
          ctx.print(`${folder}/: ${entries.join(", ") || "(empty)"}`);
        }
      }),
    );

  return mods;
}
