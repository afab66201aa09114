import type { ErrorCode, Mod } from "@modkeeper/core";

export interface DownloadProgress {
  downloaded: number;
  /** From Content-Length; null when the server does not send one */
  total: number | null;
  percent: number | null;
}

export interface DownloadOptions {
  onProgress?: (progress: DownloadProgress) => void;
  signal?: AbortSignal;
  /** How long to wait for response headers */
  timeoutMs?: number;
}

export interface DownloadResult {
  filePath: string;
  bytes: number;
}

export type ArchiveFormat = "zip" | "tar.gz";

/** Read access to a downloaded archive, independent of its format. */
export interface ArchiveReader {
  readonly filePath: string;
  readonly format: ArchiveFormat;
  /** Member names with "/" separators; directory members end with "/" */
  readonly members: readonly string[];
  readMember(member: string): Promise<Buffer>;
  /** Unpack every member below `destDir`. */
  extractAll(destDir: string): Promise<void>;
}

export interface InstallReport {
  mod: Mod;
  /** Directories files were written into, one per content root */
  destinations: string[];
  filesWritten: number;
}

export interface InstallFailure {
  name: string;
  message: string;
  code?: ErrorCode;
}

export interface BatchInstallSummary {
  succeeded: InstallReport[];
  failed: InstallFailure[];
}

export type BatchProgress =
  | { status: "installing"; index: number; total: number; name: string }
  | { status: "installed"; index: number; total: number; name: string; report: InstallReport }
  | { status: "failed"; index: number; total: number; name: string; failure: InstallFailure };

export interface InstallerOptions {
  /** Parent directory for per-install scratch directories; defaults to the OS temp dir */
  scratchRoot?: string;
  onDownloadProgress?: (progress: DownloadProgress) => void;
  downloadTimeoutMs?: number;
}
