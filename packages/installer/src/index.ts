export type {
  DownloadProgress,
  DownloadOptions,
  DownloadResult,
  ArchiveFormat,
  ArchiveReader,
  InstallReport,
  InstallFailure,
  BatchInstallSummary,
  BatchProgress,
  InstallerOptions,
} from "./types.js";

export { downloadToFile, DEFAULT_RESPONSE_TIMEOUT_MS } from "./download.js";
export { detectArchiveFormat, openArchive, safeTargetPath, writeMembers } from "./archive.js";
export type { OpenArchiveOptions } from "./archive.js";
export {
  MOD_MARKER_FILE,
  detectWrapperPrefix,
  relativeMembers,
  findMarkerRoots,
  resolveArchiveRoot,
} from "./root-resolver.js";
export type { ResolveOptions, ContentRoot, ResolvedArchiveRoot, MemberMapping } from "./root-resolver.js";
export { ArchiveInstaller, resolveDestinationBase, archiveFileName, fallbackFolderName } from "./installer.js";
