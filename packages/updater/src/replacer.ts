import { EventEmitter } from "node:events";
import type { Stats } from "node:fs";
import { copyFile, mkdir, mkdtemp, readdir, rm, stat } from "node:fs/promises";
import { tmpdir } from "node:os";
import { dirname, isAbsolute, join, relative, resolve, sep } from "node:path";
import {
  ArchiveError,
  PartialUpdateError,
  ReplaceInProgressError,
  UpdateAbortedError,
  WriteError,
  formatError,
  resolveAppPaths,
} from "@modkeeper/core";
import type { VersionRecord } from "@modkeeper/core";
import { archiveFileName, detectWrapperPrefix, downloadToFile, openArchive } from "@modkeeper/installer";
import { createLogger } from "@modkeeper/logger";
import { readVersionRecord, writeVersionRecord } from "@modkeeper/storage";
import type { ReplaceEvents, ReplaceOptions, ReplaceResult, ReplaceState, ReplaceStep } from "./types.js";

const log = createLogger("updater:replace");

function isInside(child: string, parent: string): boolean {
  const rel = relative(parent, child);
  return rel === "" || (rel !== ".." && !rel.startsWith(`..${sep}`) && !isAbsolute(rel));
}

function isPlainName(name: string): boolean {
  return name !== "" && name !== "." && name !== ".." && !name.includes("/") && !name.includes("\\");
}

/**
 * Folder inside an unpacked payload that holds the installation tree: the
 * wrapper folder when every member sits below one, else the top level.
 */
export function detectPayloadPrefix(members: readonly string[]): string {
  const prefix = detectWrapperPrefix(members);
  return prefix && members.every((m) => m.startsWith(prefix)) ? prefix : "";
}

/**
 * Copy a file or directory tree. Symlinks are followed; links that cannot
 * be resolved are skipped.
 */
export async function copyTree(src: string, dest: string): Promise<void> {
  let info: Stats;
  try {
    info = await stat(src);
  } catch (err) {
    log.warn(`Skipping unreadable entry ${src}: ${formatError(err)}`);
    return;
  }

  if (info.isDirectory()) {
    await mkdir(dest, { recursive: true });
    for (const entry of await readdir(src)) {
      await copyTree(join(src, entry), join(dest, entry));
    }
    return;
  }

  await mkdir(dirname(dest), { recursive: true });
  await copyFile(src, dest);
}

interface RunContext {
  root: string;
  options: ReplaceOptions;
  step: ReplaceStep;
  purged: boolean;
  backupDir: string | null;
  preserved: string[];
}

export interface OrchestratorOptions {
  /** Default parent for scratch workspaces */
  scratchRoot?: string;
  downloadTimeoutMs?: number;
}

/**
 * Replaces an installation tree with a downloaded release while keeping a
 * set of top-level names (user data) intact.
 *
 * One run at a time; a second call while busy is refused.
 */
export class PreserveReplaceOrchestrator extends EventEmitter<ReplaceEvents> {
  private busy = false;
  private state: ReplaceState = { status: "idle" };

  constructor(private readonly settings: OrchestratorOptions = {}) {
    super();
  }

  getState(): ReplaceState {
    return this.state;
  }

  isBusy(): boolean {
    return this.busy;
  }

  async replace(
    downloadUrl: string,
    preservationSet: ReadonlySet<string>,
    installationRoot: string,
    options: ReplaceOptions = {},
  ): Promise<ReplaceResult> {
    const root = resolve(installationRoot);
    if (this.busy) throw new ReplaceInProgressError(root);
    this.busy = true;

    const ctx: RunContext = { root, options, step: "downloading", purged: false, backupDir: null, preserved: [] };
    let scratch: string | null = null;
    let keepScratch = false;

    try {
      scratch = await mkdtemp(join(options.scratchRoot ?? this.settings.scratchRoot ?? tmpdir(), "modkeeper-update-"));
      const result = await this.run(ctx, scratch, downloadUrl, preservationSet);
      this.notify(() => {
        this.enter(ctx, { status: "done", version: result.version });
        this.emit("completed", result);
      });
      return result;
    } catch (err) {
      const failure = ctx.purged ? await this.recover(ctx, err) : new UpdateAbortedError(ctx.step, err);
      if (failure instanceof PartialUpdateError && !failure.restored) keepScratch = true;
      log.error(`Update of ${root} failed while ${ctx.step}: ${formatError(err)}`);
      this.notify(() => {
        this.enter(ctx, { status: "failed", step: ctx.step, message: failure.message });
        this.emit("failed", failure);
      });
      throw failure;
    } finally {
      this.busy = false;
      if (scratch && !keepScratch) {
        await rm(scratch, { recursive: true, force: true });
      }
    }
  }

  private async run(
    ctx: RunContext,
    scratch: string,
    downloadUrl: string,
    preservationSet: ReadonlySet<string>,
  ): Promise<ReplaceResult> {
    const { root, options } = ctx;
    const versionFile = resolveAppPaths(root).versionFile;

    // downloading
    this.enter(ctx, { status: "downloading", percent: null, downloadedBytes: 0, totalBytes: null });
    if (isInside(scratch, root)) {
      throw new Error(`Scratch directory ${scratch} lies inside the installation root`);
    }
    const archivePath = join(scratch, archiveFileName(downloadUrl));
    await downloadToFile(downloadUrl, archivePath, {
      timeoutMs: this.settings.downloadTimeoutMs,
      onProgress: (p) =>
        this.enter(ctx, {
          status: "downloading",
          percent: p.percent,
          downloadedBytes: p.downloaded,
          totalBytes: p.total,
        }),
    });

    // extracting
    this.enter(ctx, { status: "extracting" });
    const reader = await openArchive(archivePath, { scratchDir: scratch });
    if (reader.members.length === 0) {
      throw new ArchiveError(archivePath, "Update archive is empty");
    }
    const extractDir = join(scratch, "extracted");
    await reader.extractAll(extractDir);
    const payloadRoot = join(extractDir, detectPayloadPrefix(reader.members));

    // backing-up
    this.enter(ctx, { status: "backing-up" });
    const backupDir = join(scratch, "backup");
    await mkdir(backupDir, { recursive: true });
    ctx.backupDir = backupDir;
    for (const name of preservationSet) {
      if (!isPlainName(name)) {
        log.warn(`Ignoring preserved entry that is not a top-level name: ${name}`);
        continue;
      }
      const src = join(root, name);
      const exists = await stat(src).then(
        () => true,
        () => false,
      );
      if (!exists) continue;
      await copyTree(src, join(backupDir, name));
      ctx.preserved.push(name);
    }
    log.info(`Backed up: ${ctx.preserved.join(", ") || "(nothing)"}`);
    const previous = readVersionRecord(versionFile);

    // purging
    ctx.step = "purging";
    ctx.purged = true;
    this.enter(ctx, { status: "purging" });
    await mkdir(root, { recursive: true });
    const leftovers: string[] = [];
    for (const entry of await readdir(root)) {
      try {
        await rm(join(root, entry), { recursive: true, force: true });
      } catch (err) {
        leftovers.push(`${entry} (${formatError(err)})`);
      }
    }
    if (leftovers.length > 0) {
      throw new WriteError(root, new Error(`could not remove ${leftovers.join(", ")}`));
    }

    // installing
    this.enter(ctx, { status: "installing" });
    for (const entry of await readdir(payloadRoot)) {
      if (preservationSet.has(entry)) continue;
      await copyTree(join(payloadRoot, entry), join(root, entry));
    }

    // restoring
    this.enter(ctx, { status: "restoring" });
    await this.restoreBackup(ctx);

    // verifying
    this.enter(ctx, { status: "verifying" });
    const installed = readVersionRecord(versionFile);
    let version = installed?.programVersion ?? null;
    const patch: VersionRecord = {};
    if (options.targetVersion && version !== options.targetVersion) {
      log.warn(`Installed release reports version ${version ?? "(none)"}, expected ${options.targetVersion}`);
      patch.programVersion = options.targetVersion;
      version = options.targetVersion;
    }
    if (previous?.gameVersion && installed?.gameVersion !== previous.gameVersion) {
      patch.gameVersion = previous.gameVersion;
    }
    if (Object.keys(patch).length > 0) writeVersionRecord(versionFile, patch);

    log.info(`Successfully updated ${root} to version ${version ?? "(unknown)"}`);
    return { installationRoot: root, preserved: [...ctx.preserved], version };
  }

  private async restoreBackup(ctx: RunContext): Promise<void> {
    const { backupDir } = ctx;
    if (!backupDir) return;
    const failures: string[] = [];
    for (const name of ctx.preserved) {
      const dest = join(ctx.root, name);
      try {
        await rm(dest, { recursive: true, force: true });
        await copyTree(join(backupDir, name), dest);
      } catch (err) {
        log.error(`Could not restore ${name}: ${formatError(err)}`);
        failures.push(`${name} (${formatError(err)})`);
      }
    }
    if (failures.length > 0) {
      throw new WriteError(ctx.root, new Error(`could not restore ${failures.join(", ")}`));
    }
  }

  /** Put preserved entries back after a failure past the purge. */
  private async recover(ctx: RunContext, cause: unknown): Promise<PartialUpdateError> {
    try {
      await this.restoreBackup(ctx);
      log.info(`Restored preserved data in ${ctx.root}`);
      return new PartialUpdateError(ctx.step, cause, { restored: true });
    } catch (restoreErr) {
      log.error(`Restore of preserved data failed: ${formatError(restoreErr)}`);
      return new PartialUpdateError(ctx.step, cause, {
        restored: false,
        backupPath: ctx.backupDir ?? undefined,
      });
    }
  }

  private enter(ctx: RunContext, state: ReplaceState): void {
    if (state.status !== "done" && state.status !== "idle" && state.status !== "failed") {
      ctx.step = state.status;
    }
    this.state = state;
    this.emit("state", state);
    ctx.options.onProgress?.(state);
  }

  /** Listeners run after the outcome is settled; their errors are logged only. */
  private notify(fn: () => void): void {
    try {
      fn();
    } catch (listenerErr) {
      log.warn(`Progress listener threw: ${formatError(listenerErr)}`);
    }
  }
}
