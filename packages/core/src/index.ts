export type {
  ContentType,
  Mod,
  Profile,
  AppConfig,
  StoredConfig,
  ReleaseMetadata,
  VersionRecord,
} from "./types/index.js";
export { CONTENT_TYPE_DIRS, contentTypeSchema, modSchema, storedConfigSchema } from "./types/index.js";

export type { AppPaths } from "./paths.js";
export { resolveAppPaths, DEFAULT_INSTALL_DIR, CONFIG_DIR_NAME } from "./paths.js";

export { normalizeSourceUrl, modDisplayName } from "./source-url.js";

export type { ErrorCode } from "./errors.js";
export {
  ModkeeperError,
  DownloadError,
  ArchiveError,
  ContentNotFoundError,
  WriteError,
  VersionUnresolvableError,
  UpdateAbortedError,
  PartialUpdateError,
  ReplaceInProgressError,
  ProfileError,
  formatError,
} from "./errors.js";
