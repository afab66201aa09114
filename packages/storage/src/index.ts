export { ConfigStore } from "./config-store.js";
export {
  ProfileStore,
  DEFAULT_PROFILE_NAME,
  classifyStoredProfile,
  migrateStoredMod,
  toStoredMod,
} from "./profile-store.js";
export type { ProfileStoreOptions, ImportResult, StoredProfileVariant } from "./profile-store.js";
export { readVersionRecord, writeVersionRecord } from "./version-store.js";
export { toStoredPath, resolveStoredPath } from "./stored-path.js";
export { readJsonFile, writeJsonFile } from "./json-file.js";
export type { JsonReadResult } from "./json-file.js";
