import { resolve } from "node:path";
import { Command } from "commander";
import type { CliContext } from "../context.js";
import { guarded } from "./run.js";

export function createProfileCommand(ctx: CliContext): Command {
  const profile = new Command("profile").description("Manage mod profiles");

  profile
    .command("list")
    .description("List profiles; the current one is marked with *")
    .action(
      guarded(ctx, () => {
        const current = ctx.profiles.currentProfileName;
        for (const p of ctx.profiles.list()) {
          const marker = p.name === current ? "*" : " ";
          ctx.print(`${marker} ${p.name} (${p.mods.length} mods) -> ${p.installRoot}`);
        }
      }),
    );

  profile
    .command("create <name>")
    .description("Create an empty profile")
    .option("-d, --install-dir <dir>", "Install root for this profile")
    .action(
      guarded(ctx, (name: string, options: { installDir?: string }) => {
        const installRoot = options.installDir ? resolve(ctx.paths.root, options.installDir) : undefined;
        const created = ctx.profiles.create(name, installRoot);
        ctx.print(`Created profile "${created.name}"`);
      }),
    );

  profile
    .command("switch <name>")
    .description("Make a profile current")
    .action(
      guarded(ctx, (name: string) => {
        ctx.profiles.switchTo(name);
        ctx.print(`Switched to profile "${name}"`);
      }),
    );

  profile
    .command("rename <oldName> <newName>")
    .description("Rename a profile")
    .action(
      guarded(ctx, (oldName: string, newName: string) => {
        ctx.profiles.rename(oldName, newName);
        ctx.print(`Renamed profile "${oldName}" to "${newName.trim()}"`);
      }),
    );

  profile
    .command("delete <name>")
    .description("Delete a profile (the last one cannot be deleted)")
    .action(
      guarded(ctx, (name: string) => {
        ctx.profiles.delete(name);
        ctx.print(`Deleted profile "${name}"`);
      }),
    );

  profile
    .command("set-dir <dir>")
    .description("Set the install root of the current profile")
    .action(
      guarded(ctx, (dir: string) => {
        const installRoot = resolve(ctx.paths.root, dir);
        ctx.profiles.setInstallRoot(ctx.profiles.currentProfileName, installRoot);
        ctx.print(`Install root of "${ctx.profiles.currentProfileName}" set to ${installRoot}`);
      }),
    );

  profile
    .command("export <name> <file>")
    .description("Write a profile to a JSON file")
    .action(
      guarded(ctx, (name: string, file: string) => {
        ctx.profiles.exportProfile(name, resolve(file));
        ctx.print(`Exported "${name}" to ${resolve(file)}`);
      }),
    );

  profile
    .command("import <file>")
    .description("Add profiles from an exported JSON file")
    .option("--overwrite", "Replace profiles with the same name")
    .action(
      guarded(ctx, (file: string, options: { overwrite?: boolean }) => {
        const result = ctx.profiles.importProfiles(resolve(file), options.overwrite ?? false);
        ctx.print(`Imported: ${result.imported.join(", ") || "none"}`);
        if (result.skipped.length > 0) {
          ctx.print(`Skipped existing: ${result.skipped.join(", ")} (use --overwrite to replace)`);
        }
      }),
    );

  return profile;
}
