import type { ErrorCode, ReleaseMetadata } from "@modkeeper/core";
import type { DownloadProgress } from "@modkeeper/installer";

export type UpdateCheckResult =
  | { status: "not-configured"; currentVersion: string }
  | {
      status: "ok";
      currentVersion: string;
      updateAvailable: boolean;
      latestVersion: string;
      release: ReleaseMetadata;
    }
  | { status: "error"; currentVersion: string; code: ErrorCode; error: string };

/** Steps of a preserve-and-replace run, in order. */
export type ReplaceStep =
  | "downloading"
  | "extracting"
  | "backing-up"
  | "purging"
  | "installing"
  | "restoring"
  | "verifying";

/** State of the preserve-and-replace process */
export type ReplaceState =
  | { status: "idle" }
  | { status: "downloading"; percent: number | null; downloadedBytes: number; totalBytes: number | null }
  | { status: Exclude<ReplaceStep, "downloading"> }
  | { status: "done"; version: string | null }
  | { status: "failed"; step: ReplaceStep; message: string };

export interface ReplaceOptions {
  /** Version the payload is expected to carry; stamped into the version record */
  targetVersion?: string;
  onProgress?: (state: ReplaceState) => void;
  /** Parent directory for the scratch workspace; must lie outside the installation root */
  scratchRoot?: string;
}

export interface ReplaceResult {
  installationRoot: string;
  preserved: string[];
  version: string | null;
}

export interface ReplaceEvents {
  state: [ReplaceState];
  completed: [ReplaceResult];
  failed: [Error];
}

export interface GameBuild {
  /** Release title; saved as the installed game version */
  name: string;
  tagName: string;
  notes: string;
  assetName: string;
  downloadUrl: string;
  isExperimental: boolean;
}

export type GamePlatform = "windows" | "linux";

export interface ListGameBuildsOptions {
  /** Release list endpoint for stable builds */
  releasesUrl?: string;
  /** Single-release endpoint for the experimental channel */
  experimentalUrl?: string;
  platform?: GamePlatform;
  experimental?: boolean;
  limit?: number;
}

export interface LaunchGameOptions {
  platform?: GamePlatform;
}

export interface LaunchedGame {
  executable: string;
  pid: number | undefined;
}

export interface InstallGameBuildOptions {
  onProgress?: (progress: DownloadProgress) => void;
  scratchRoot?: string;
}
