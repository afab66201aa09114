export type { ContentType, Mod } from "./mod.js";
export { CONTENT_TYPE_DIRS, contentTypeSchema, modSchema } from "./mod.js";
export type { Profile } from "./profile.js";
export type { AppConfig, StoredConfig } from "./config.js";
export { storedConfigSchema } from "./config.js";
export type { ReleaseMetadata } from "./release.js";
export type { VersionRecord } from "./version-record.js";
