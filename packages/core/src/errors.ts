/**
 * Typed error classes shared by the installer, updater and stores.
 *
 * Every error carries a stable `code` so front ends can pick remediation
 * advice without matching on message text.
 */

export type ErrorCode =
  | "DOWNLOAD_FAILED"
  | "ARCHIVE_INVALID"
  | "CONTENT_NOT_FOUND"
  | "WRITE_FAILED"
  | "VERSION_UNRESOLVABLE"
  | "UPDATE_ABORTED"
  | "PARTIAL_UPDATE_RESTORE_ATTEMPTED"
  | "REPLACE_IN_PROGRESS"
  | "PROFILE_ERROR";

export class ModkeeperError extends Error {
  public readonly code: ErrorCode;

  constructor(message: string, code: ErrorCode, options?: ErrorOptions) {
    super(message, options);
    this.name = "ModkeeperError";
    this.code = code;
    Error.captureStackTrace?.(this, this.constructor);
  }
}

/** Network failure, timeout or non-ok HTTP status. */
export class DownloadError extends ModkeeperError {
  public readonly url: string;
  public readonly statusCode?: number;

  constructor(url: string, message: string, opts?: { statusCode?: number; cause?: unknown }) {
    super(message, "DOWNLOAD_FAILED", { cause: opts?.cause });
    this.name = "DownloadError";
    this.url = url;
    this.statusCode = opts?.statusCode;
  }
}

/** Payload is not a readable zip or gzip tar, or a member path is unsafe. */
export class ArchiveError extends ModkeeperError {
  public readonly archivePath: string;

  constructor(archivePath: string, message: string, options?: ErrorOptions) {
    super(message, "ARCHIVE_INVALID", options);
    this.name = "ArchiveError";
    this.archivePath = archivePath;
  }
}

/** The requested subpath or a modinfo.json root was not found in the archive. */
export class ContentNotFoundError extends ModkeeperError {
  public readonly requested?: string;

  constructor(message: string, requested?: string) {
    super(message, "CONTENT_NOT_FOUND");
    this.name = "ContentNotFoundError";
    this.requested = requested;
  }
}

/** Filesystem write failure (permissions, disk full, locked file). */
export class WriteError extends ModkeeperError {
  public readonly path: string;

  constructor(path: string, cause: unknown) {
    super(`Failed to write ${path}: ${formatError(cause)}`, "WRITE_FAILED", { cause });
    this.name = "WriteError";
    this.path = path;
  }
}

export class VersionUnresolvableError extends ModkeeperError {
  constructor(message: string) {
    super(message, "VERSION_UNRESOLVABLE");
    this.name = "VersionUnresolvableError";
  }
}

/** Self-update failed before anything under the installation root was removed. */
export class UpdateAbortedError extends ModkeeperError {
  public readonly step: string;

  constructor(step: string, cause: unknown) {
    super(
      `Update failed while ${step}; the installation was not changed: ${formatError(cause)}`,
      "UPDATE_ABORTED",
      { cause },
    );
    this.name = "UpdateAbortedError";
    this.step = step;
  }
}

/**
 * Self-update failed after the installation root was purged. A restore of the
 * preserved paths was attempted; `restored` tells whether it completed.
 */
export class PartialUpdateError extends ModkeeperError {
  public readonly step: string;
  public readonly restored: boolean;
  public readonly backupPath?: string;

  constructor(step: string, cause: unknown, opts: { restored: boolean; backupPath?: string }) {
    super(
      `Partial update while ${step}; restore of preserved data ${opts.restored ? "completed" : "failed"}: ${formatError(cause)}`,
      "PARTIAL_UPDATE_RESTORE_ATTEMPTED",
      { cause },
    );
    this.name = "PartialUpdateError";
    this.step = step;
    this.restored = opts.restored;
    this.backupPath = opts.backupPath;
  }
}

export class ReplaceInProgressError extends ModkeeperError {
  constructor(root: string) {
    super(`A replace operation is already running for ${root}`, "REPLACE_IN_PROGRESS");
    this.name = "ReplaceInProgressError";
  }
}

export class ProfileError extends ModkeeperError {
  constructor(message: string) {
    super(message, "PROFILE_ERROR");
    this.name = "ProfileError";
  }
}

/** Short, single-line message for end users. */
export function formatError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
