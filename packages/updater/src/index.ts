export type {
  UpdateCheckResult,
  ReplaceStep,
  ReplaceState,
  ReplaceOptions,
  ReplaceResult,
  ReplaceEvents,
  GameBuild,
  GamePlatform,
  ListGameBuildsOptions,
  InstallGameBuildOptions,
  LaunchGameOptions,
  LaunchedGame,
} from "./types.js";
export { parseVersion, compareVersions, isNewerVersion } from "./version.js";
export {
  PLACEHOLDER_TAGS,
  RELEASE_REQUEST_TIMEOUT_MS,
  releaseSchema,
  fetchRelease,
  resolveReleaseVersion,
  pickDownloadUrl,
  toReleaseMetadata,
  checkForUpdate,
} from "./checker.js";
export type { Release } from "./checker.js";
export { BASE_PRESERVED_PATHS, computePreservationSet } from "./preservation.js";
export { PreserveReplaceOrchestrator, copyTree, detectPayloadPrefix } from "./replacer.js";
export type { OrchestratorOptions } from "./replacer.js";
export {
  DEFAULT_GAME_RELEASES_URL,
  DEFAULT_GAME_EXPERIMENTAL_URL,
  MAX_GAME_BUILDS,
  NESTED_BUILD_FOLDER,
  GAME_EXECUTABLES,
  currentGamePlatform,
  gameBuildMappings,
  findGameExecutable,
  launchGame,
  selectGameBuilds,
  listGameBuilds,
  installGameBuild,
} from "./game-builds.js";
