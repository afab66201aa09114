import { existsSync } from "node:fs";
import { isAbsolute, relative, resolve, sep } from "node:path";
import { CONFIG_DIR_NAME } from "@modkeeper/core";
import type { AppConfig } from "@modkeeper/core";
import { LOG_FILE_NAME, createLogger } from "@modkeeper/logger";

const log = createLogger("updater:preservation");

/** Top-level names that always survive a self-update. */
export const BASE_PRESERVED_PATHS: readonly string[] = [CONFIG_DIR_NAME, "mods", LOG_FILE_NAME];

/**
 * Names under `installationRoot` to keep across a full-tree replace: the
 * base set plus the top-level folder of every configured directory (and of
 * every `extraPaths` entry, such as profile install roots) that lies inside
 * the root and exists.
 */
export function computePreservationSet(
  installationRoot: string,
  config: Pick<AppConfig, "installRoot" | "backupDir" | "gameInstallDir">,
  extraPaths: readonly string[] = [],
): ReadonlySet<string> {
  const root = resolve(installationRoot);
  const preserved = new Set(BASE_PRESERVED_PATHS);

  for (const configured of [config.gameInstallDir, config.backupDir, config.installRoot, ...extraPaths]) {
    if (!configured) continue;
    const absolute = resolve(root, configured);
    const rel = relative(root, absolute);
    if (!rel || rel === ".." || rel.startsWith(`..${sep}`) || isAbsolute(rel)) continue;
    if (!existsSync(absolute)) continue;

    const topLevel = rel.split(sep)[0];
    if (!preserved.has(topLevel)) {
      preserved.add(topLevel);
      log.info(`Will preserve directory from config: ${topLevel}`);
    }
  }

  return preserved;
}
