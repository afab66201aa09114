import { spawn } from "node:child_process";
import { chmod, mkdtemp, readdir, rm, stat } from "node:fs/promises";
import { tmpdir } from "node:os";
import { basename, dirname, join } from "node:path";
import { ContentNotFoundError, DownloadError, formatError } from "@modkeeper/core";
import {
  detectWrapperPrefix,
  downloadToFile,
  openArchive,
  relativeMembers,
  writeMembers,
} from "@modkeeper/installer";
import type { MemberMapping } from "@modkeeper/installer";
import { createLogger } from "@modkeeper/logger";
import { writeVersionRecord } from "@modkeeper/storage";
import { parseRelease, parseReleaseList, requestJson } from "./checker.js";
import type { Release } from "./checker.js";
import type {
  GameBuild,
  GamePlatform,
  InstallGameBuildOptions,
  LaunchGameOptions,
  LaunchedGame,
  ListGameBuildsOptions,
} from "./types.js";

const log = createLogger("updater:game");

export const DEFAULT_GAME_RELEASES_URL = "https://api.github.com/repos/cataclysmbnteam/Cataclysm-BN/releases";
export const DEFAULT_GAME_EXPERIMENTAL_URL =
  "https://api.github.com/repos/cataclysmbnteam/Cataclysm-BN/releases/tags/experimental";
export const MAX_GAME_BUILDS = 10;
/** Extra folder some builds nest directly under their wrapper. */
export const NESTED_BUILD_FOLDER = "cataclysmbn-unstable";

export const GAME_EXECUTABLES: Record<GamePlatform, string> = {
  windows: "cataclysm-bn-tiles.exe",
  linux: "cataclysm-bn-tiles",
};

export function currentGamePlatform(): GamePlatform {
  return process.platform === "win32" ? "windows" : "linux";
}

/**
 * One build per release: the first tiles asset for the platform whose
 * experimental marker matches the requested channel.
 */
export function selectGameBuilds(
  releases: readonly Release[],
  platform: GamePlatform,
  experimental: boolean,
  limit = MAX_GAME_BUILDS,
): GameBuild[] {
  const ext = platform === "windows" ? ".zip" : ".tar.gz";
  const builds: GameBuild[] = [];

  for (const release of releases) {
    const asset = release.assets.find((a) => {
      const name = a.name.toLowerCase();
      if (!name.endsWith(ext) || !name.includes(platform) || !name.includes("tiles")) return false;
      return name.includes("experimental") === experimental;
    });
    if (!asset) continue;
    builds.push({
      name: release.name ?? release.tag_name,
      tagName: release.tag_name,
      notes: release.body || "No changelog available.",
      assetName: asset.name,
      downloadUrl: asset.browser_download_url,
      isExperimental: experimental,
    });
    if (builds.length >= limit) break;
  }
  return builds;
}

/** @throws DownloadError, VersionUnresolvableError */
export async function listGameBuilds(options: ListGameBuildsOptions = {}): Promise<GameBuild[]> {
  const experimental = options.experimental ?? false;
  const url = experimental
    ? (options.experimentalUrl ?? DEFAULT_GAME_EXPERIMENTAL_URL)
    : (options.releasesUrl ?? DEFAULT_GAME_RELEASES_URL);

  const response = await requestJson(url);
  if (!response.ok) {
    throw new DownloadError(url, `Failed to fetch releases: HTTP ${response.status} ${response.statusText}`, {
      statusCode: response.status,
    });
  }
  const body: unknown = await response.json();
  const releases = experimental ? [parseRelease(body, url)] : parseReleaseList(body, url);

  const builds = selectGameBuilds(
    releases,
    options.platform ?? currentGamePlatform(),
    experimental,
    options.limit ?? MAX_GAME_BUILDS,
  );
  log.info(`Found ${builds.length} game builds at ${url}`);
  return builds;
}

/** Archive members of a build relative to the game directory. */
export function gameBuildMappings(members: readonly string[]): MemberMapping[] {
  const nested = `${NESTED_BUILD_FOLDER}/`;
  return relativeMembers(members, detectWrapperPrefix(members)).flatMap((mapping) => {
    if (!mapping.relativePath.startsWith(nested)) return [mapping];
    const relativePath = mapping.relativePath.slice(nested.length);
    return relativePath ? [{ ...mapping, relativePath }] : [];
  });
}

/**
 * Download a build and unpack it into the game directory without its
 * wrapper folder (or the nested `cataclysmbn-unstable` folder), then record it as the installed game version.
 */
export async function installGameBuild(
  build: GameBuild,
  gameInstallDir: string,
  versionFile: string,
  options: InstallGameBuildOptions = {},
): Promise<{ destination: string; filesWritten: number }> {
  const scratch = await mkdtemp(join(options.scratchRoot ?? tmpdir(), "modkeeper-game-"));
  try {
    const archivePath = join(scratch, basename(build.assetName) || "build.zip");
    await downloadToFile(build.downloadUrl, archivePath, { onProgress: options.onProgress });

    const reader = await openArchive(archivePath, { scratchDir: scratch });
    const mappings = gameBuildMappings(reader.members);
    if (mappings.length === 0) {
      throw new ContentNotFoundError(`${build.assetName} contains no files`);
    }
    const filesWritten = await writeMembers(reader, mappings, gameInstallDir);

    writeVersionRecord(versionFile, { gameVersion: build.name });
    log.info(`Installed ${build.assetName} to ${gameInstallDir}`);
    return { destination: gameInstallDir, filesWritten };
  } finally {
    await rm(scratch, { recursive: true, force: true });
  }
}

/** The tiles executable in `gameDir`, else the first one found below it. */
export async function findGameExecutable(
  gameDir: string,
  platform: GamePlatform = currentGamePlatform(),
): Promise<string | null> {
  const exeName = GAME_EXECUTABLES[platform];
  const direct = join(gameDir, exeName);
  const isFile = await stat(direct).then(
    (info) => info.isFile(),
    () => false,
  );
  if (isFile) return direct;

  let dirs = [gameDir];
  while (dirs.length > 0) {
    const next: string[] = [];
    for (const dir of dirs) {
      const entries = await readdir(dir, { withFileTypes: true }).catch((err: unknown) => {
        log.debug(`Skipping unreadable directory ${dir}: ${formatError(err)}`);
        return [];
      });
      for (const entry of entries) {
        if (entry.isFile() && entry.name === exeName) return join(dir, entry.name);
        if (entry.isDirectory()) next.push(join(dir, entry.name));
      }
    }
    dirs = next;
  }
  return null;
}

/**
 * Start the installed game from its own folder. The process is detached so
 * it outlives this one.
 *
 * @throws ContentNotFoundError when no executable is installed.
 */
export async function launchGame(gameDir: string, options: LaunchGameOptions = {}): Promise<LaunchedGame> {
  const platform = options.platform ?? currentGamePlatform();
  const executable = await findGameExecutable(gameDir, platform);
  if (!executable) {
    throw new ContentNotFoundError(`'${GAME_EXECUTABLES[platform]}' not found in ${gameDir}`);
  }
  if (platform !== "windows") await chmod(executable, 0o755);

  log.info(`Launching ${executable}`);
  const child = spawn(executable, [], { cwd: dirname(executable), detached: true, stdio: "ignore" });
  await new Promise<void>((resolve, reject) => {
    child.once("spawn", () => resolve());
    child.once("error", reject);
  });
  child.unref();
  return { executable, pid: child.pid };
}
