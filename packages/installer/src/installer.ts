import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { basename, isAbsolute, join, resolve } from "node:path";
import {
  CONTENT_TYPE_DIRS,
  DownloadError,
  ModkeeperError,
  formatError,
  modDisplayName,
  normalizeSourceUrl,
} from "@modkeeper/core";
import type { Mod } from "@modkeeper/core";
import { createLogger } from "@modkeeper/logger";
import { detectArchiveFormat, openArchive, writeMembers } from "./archive.js";
import { downloadToFile } from "./download.js";
import { relativeMembers, resolveArchiveRoot } from "./root-resolver.js";
import type {
  BatchInstallSummary,
  BatchProgress,
  InstallFailure,
  InstallReport,
  InstallerOptions,
} from "./types.js";

const log = createLogger("installer");

/**
 * Directory a mod's files are written below: the content-type folder when
 * no install subpath is set, otherwise the subpath under the install root
 * (absolute subpaths are used as-is).
 */
export function resolveDestinationBase(mod: Mod, installRoot: string): string {
  const subpath = mod.installSubpath?.trim();
  if (!subpath || subpath === ".") {
    return resolve(installRoot, CONTENT_TYPE_DIRS[mod.contentType ?? "mod"]);
  }
  if (isAbsolute(subpath)) return subpath;
  return resolve(installRoot, subpath);
}

/** Local file name for a download, keeping the extension that selects the reader. */
export function archiveFileName(url: string): string {
  return detectArchiveFormat(packageFileName(url)) === "tar.gz" ? "package.tar.gz" : "package.zip";
}

function packageFileName(url: string): string {
  try {
    return basename(new URL(url).pathname);
  } catch {
    return basename(url);
  }
}

/**
 * Folder name used when modinfo.json sits at the top of an archive: the
 * repository name for repository snapshots, else the file name without
 * its extension.
 */
export function fallbackFolderName(url: string): string {
  const display = modDisplayName({ sourceUrl: url });
  if (display !== url) return display.split("/")[1];
  const stem = packageFileName(url).replace(/\.(zip|tar\.gz|tgz)$/i, "");
  return stem || "mod";
}

/** Downloads mod archives and writes their content roots below an install root. */
export class ArchiveInstaller {
  constructor(private readonly options: InstallerOptions = {}) {}

  /**
   * Install one mod. Re-running overwrites files member by member; files
   * left by an earlier, differently-shaped archive stay in place.
   *
   * @throws DownloadError, ArchiveError, ContentNotFoundError or WriteError
   */
  async install(mod: Mod, installRoot: string): Promise<InstallReport> {
    const url = normalizeSourceUrl(mod.sourceUrl);
    if (!url) throw new DownloadError(url, "No URL provided for mod");
    const destBase = resolveDestinationBase(mod, installRoot);
    const scratch = await mkdtemp(join(this.options.scratchRoot ?? tmpdir(), "modkeeper-install-"));

    try {
      const archivePath = join(scratch, archiveFileName(url));
      await downloadToFile(url, archivePath, {
        onProgress: this.options.onDownloadProgress,
        timeoutMs: this.options.downloadTimeoutMs,
      });

      const reader = await openArchive(archivePath, { scratchDir: scratch });
      log.debug(`Archive contents: ${reader.members.join(", ")}`);

      const resolved = resolveArchiveRoot(reader.members, {
        contentSubpath: mod.contentSubpath,
        autoDetect: !mod.preserveOriginalLayout,
        fallbackFolderName: fallbackFolderName(url),
      });
      if (resolved.wrapperPrefix) {
        log.info(`Detected single top-level directory in archive: ${resolved.wrapperPrefix}`);
      }

      const destinations: string[] = [];
      let filesWritten = 0;
      for (const root of resolved.roots) {
        const dest = root.folderName ? join(destBase, root.folderName) : destBase;
        filesWritten += await writeMembers(reader, relativeMembers(reader.members, root.prefix), dest);
        destinations.push(dest);
        log.info(`Extracted '${root.prefix || "/"}' to '${dest}'`);
      }

      return { mod, destinations, filesWritten };
    } finally {
      await rm(scratch, { recursive: true, force: true });
    }
  }

  /**
   * Install mods one after another. A failing mod is recorded and the loop
   * moves on to the next one.
   */
  async installAll(
    mods: readonly Mod[],
    installRoot: string,
    onProgress?: (progress: BatchProgress) => void,
  ): Promise<BatchInstallSummary> {
    const summary: BatchInstallSummary = { succeeded: [], failed: [] };
    const total = mods.length;

    for (const [index, mod] of mods.entries()) {
      const name = modDisplayName(mod);
      onProgress?.({ status: "installing", index, total, name });
      try {
        const report = await this.install(mod, installRoot);
        summary.succeeded.push(report);
        onProgress?.({ status: "installed", index, total, name, report });
      } catch (err) {
        const failure: InstallFailure = { name, message: formatError(err) };
        if (err instanceof ModkeeperError) failure.code = err.code;
        log.error(`Failed to install ${name}: ${failure.message}`);
        summary.failed.push(failure);
        onProgress?.({ status: "failed", index, total, name, failure });
      }
    }

    log.info(`Installed ${summary.succeeded.length} of ${total} mods`);
    return summary;
  }
}
