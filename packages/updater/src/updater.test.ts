import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { existsSync, readFileSync } from "node:fs";
import { mkdir, mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import AdmZip from "adm-zip";
import { parseVersion, compareVersions, isNewerVersion } from "./version.js";
import { checkForUpdate, releaseSchema, resolveReleaseVersion } from "./checker.js";
import { BASE_PRESERVED_PATHS, computePreservationSet } from "./preservation.js";
import {
  findGameExecutable,
  gameBuildMappings,
  installGameBuild,
  launchGame,
  listGameBuilds,
  selectGameBuilds,
} from "./game-builds.js";

interface Route {
  status?: number;
  body?: unknown;
  bytes?: Buffer;
}

/** Stub fetch with fixed responses by URL; unknown URLs answer 404. */
function stubRoutes(routes: Record<string, Route>) {
  const fetchMock = vi.fn(async (input: string | URL | Request) => {
    const url = typeof input === "string" ? input : input instanceof URL ? input.href : input.url;
    const route = routes[url];
    if (!route) return new Response(null, { status: 404, statusText: "Not Found" });
    const status = route.status ?? 200;
    const statusText = status === 200 ? "OK" : status === 404 ? "Not Found" : "Error";
    if (route.bytes) return new Response(new Uint8Array(route.bytes), { status, statusText });
    return new Response(JSON.stringify(route.body ?? null), {
      status,
      statusText,
      headers: { "content-type": "application/json" },
    });
  });
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

afterEach(() => {
  vi.unstubAllGlobals();
  vi.restoreAllMocks();
});

// ---------------------------------------------------------------------------
// parseVersion
// ---------------------------------------------------------------------------
describe("parseVersion", () => {
  it("parses dotted numbers of any length", () => {
    expect(parseVersion("1.2.3")).toEqual([1, 2, 3]);
    expect(parseVersion("0.7")).toEqual([0, 7]);
    expect(parseVersion("10")).toEqual([10]);
  });

  it("returns null for non-numeric input", () => {
    expect(parseVersion("1.2.x")).toBeNull();
    expect(parseVersion("")).toBeNull();
    expect(parseVersion("1.2.3-beta")).toBeNull();
    expect(parseVersion("update_test")).toBeNull();
  });
});

// ---------------------------------------------------------------------------
// compareVersions
// ---------------------------------------------------------------------------
describe("compareVersions", () => {
  it("pads the shorter version with zeros", () => {
    expect(compareVersions("1.0", "1.0.0")).toBe(0);
    expect(compareVersions("1.0.1", "1.0")).toBe(1);
  });

  it("compares segments numerically", () => {
    expect(compareVersions("1.10.0", "1.9.0")).toBe(1);
    expect(compareVersions("0.9", "1.0")).toBe(-1);
  });

  it("throws on non-numeric input", () => {
    expect(() => compareVersions("abc", "1.0")).toThrow('Invalid version string: "abc"');
  });
});

// ---------------------------------------------------------------------------
// isNewerVersion
// ---------------------------------------------------------------------------
describe("isNewerVersion", () => {
  it("returns false for equal versions", () => {
    expect(isNewerVersion("1.2.3", "1.2.3")).toBe(false);
  });

  it("compares numerically rather than lexically", () => {
    expect(isNewerVersion("1.9.0", "1.10.0")).toBe(true);
    expect(isNewerVersion("2.0.0", "1.9.9")).toBe(false);
  });

  it("treats 1.0 and 1.0.0 as equal", () => {
    expect(isNewerVersion("1.0", "1.0.0")).toBe(false);
    expect(isNewerVersion("1.0.0", "1.0")).toBe(false);
  });

  it("reports any difference as newer when a side is not numeric", () => {
    expect(isNewerVersion("update_test", "1.0.2")).toBe(true);
    expect(isNewerVersion("1.0.2", "nightly-42")).toBe(true);
    expect(isNewerVersion("nightly-42", "nightly-42")).toBe(false);
  });

  it("never reports an empty candidate as newer", () => {
    expect(isNewerVersion("1.0.0", "")).toBe(false);
  });
});

// ---------------------------------------------------------------------------
// resolveReleaseVersion
// ---------------------------------------------------------------------------
describe("resolveReleaseVersion", () => {
  it("strips a leading v from the tag", () => {
    expect(resolveReleaseVersion("v1.4.0", "Whatever")).toBe("1.4.0");
  });

  it("reads placeholder tags from the title", () => {
    expect(resolveReleaseVersion("latest", "Mod manager 1.5.2")).toBe("1.5.2");
    expect(resolveReleaseVersion("Nightly", "Nightly build 0.7.3-2026")).toBe("0.7.3");
  });

  it("throws when neither tag nor title carries a version", () => {
    expect(() => resolveReleaseVersion("experimental", "Bleeding edge")).toThrow(
      'Cannot determine a version from tag "experimental" or title "Bleeding edge"',
    );
  });
});

// ---------------------------------------------------------------------------
// checkForUpdate
// ---------------------------------------------------------------------------
describe("checkForUpdate", () => {
  const latestUrl = "https://api.example.com/repos/owner/tool/releases/latest";
  const listUrl = "https://api.example.com/repos/owner/tool/releases";

  const release = {
    tag_name: "v1.2.0",
    name: "Release 1.2.0",
    body: "Bug fixes.",
    prerelease: false,
    assets: [
      { name: "source.tar.gz", browser_download_url: "https://example.com/dl/source.tar.gz" },
      { name: "modkeeper-1.2.0.zip", browser_download_url: "https://example.com/dl/modkeeper-1.2.0.zip" },
    ],
    zipball_url: "https://api.example.com/repos/owner/tool/zipball/v1.2.0",
  };

  it("reports not-configured for an empty URL without fetching", async () => {
    const fetchMock = stubRoutes({});
    expect(await checkForUpdate("  ", "1.0.0")).toEqual({ status: "not-configured", currentVersion: "1.0.0" });
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("detects an available update and prefers the zip asset", async () => {
    const fetchMock = stubRoutes({ [latestUrl]: { body: release } });

    const result = await checkForUpdate(latestUrl, "1.1.0");

    expect(result).toEqual({
      status: "ok",
      currentVersion: "1.1.0",
      updateAvailable: true,
      latestVersion: "1.2.0",
      release: {
        tagVersion: "1.2.0",
        title: "Release 1.2.0",
        releaseNotes: "Bug fixes.",
        downloadUrl: "https://example.com/dl/modkeeper-1.2.0.zip",
        isExperimental: false,
      },
    });
    expect(fetchMock).toHaveBeenCalledWith(latestUrl, {
      headers: { Accept: "application/vnd.github+json" },
      signal: expect.any(AbortSignal),
    });
  });

  it("reports no update for the same version", async () => {
    stubRoutes({ [latestUrl]: { body: release } });
    const result = await checkForUpdate(latestUrl, "1.2.0");
    expect(result).toMatchObject({ status: "ok", updateAvailable: false, latestVersion: "1.2.0" });
  });

  it("falls back to the source snapshot, then to null", async () => {
    stubRoutes({ [latestUrl]: { body: { ...release, assets: [] } } });
    const withSnapshot = await checkForUpdate(latestUrl, "1.0.0");
    expect(withSnapshot.status === "ok" && withSnapshot.release.downloadUrl).toBe(
      "https://api.example.com/repos/owner/tool/zipball/v1.2.0",
    );

    stubRoutes({ [latestUrl]: { body: { ...release, assets: [], zipball_url: null } } });
    const without = await checkForUpdate(latestUrl, "1.0.0");
    expect(without.status === "ok" && without.release.downloadUrl).toBeNull();
  });

  it("falls back to the release list when latest answers 404", async () => {
    const fetchMock = stubRoutes({
      [latestUrl]: { status: 404 },
      [listUrl]: { body: [{ ...release, tag_name: "v1.3.0", prerelease: true }, release] },
    });

    const result = await checkForUpdate(latestUrl, "1.2.0");

    expect(result).toMatchObject({ status: "ok", updateAvailable: true, latestVersion: "1.3.0" });
    expect(result.status === "ok" && result.release.isExperimental).toBe(true);
    expect(fetchMock.mock.calls.map((call) => call[0])).toEqual([latestUrl, listUrl]);
  });

  it("reports an empty release list as unresolvable", async () => {
    stubRoutes({ [latestUrl]: { status: 404 }, [listUrl]: { body: [] } });

    expect(await checkForUpdate(latestUrl, "1.0.0")).toEqual({
      status: "error",
      currentVersion: "1.0.0",
      code: "VERSION_UNRESOLVABLE",
      error: `No releases published at ${listUrl}`,
    });
  });

  it("does not fall back for a tag URL", async () => {
    const tagUrl = "https://api.example.com/repos/owner/tool/releases/tags/v9.9.9";
    const fetchMock = stubRoutes({});

    const result = await checkForUpdate(tagUrl, "1.0.0");

    expect(result).toEqual({
      status: "error",
      currentVersion: "1.0.0",
      code: "DOWNLOAD_FAILED",
      error: "Failed to fetch release: HTTP 404 Not Found",
    });
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it("takes the version from the title for a placeholder tag", async () => {
    stubRoutes({ [latestUrl]: { body: { ...release, tag_name: "experimental", name: "Experimental 1.4.1" } } });

    const result = await checkForUpdate(latestUrl, "1.2.0");

    expect(result).toMatchObject({ status: "ok", latestVersion: "1.4.1", updateAvailable: true });
    expect(result.status === "ok" && result.release.isExperimental).toBe(true);
  });

  it("returns an error result on network failure (never throws)", async () => {
    vi.stubGlobal("fetch", vi.fn().mockRejectedValue(new Error("Connection refused")));

    expect(await checkForUpdate(latestUrl, "1.0.0")).toEqual({
      status: "error",
      currentVersion: "1.0.0",
      code: "DOWNLOAD_FAILED",
      error: `Failed to reach ${latestUrl}: Connection refused`,
    });
  });

  it("returns an error result for malformed release data", async () => {
    stubRoutes({ [latestUrl]: { body: { tag_name: 42 } } });
    const result = await checkForUpdate(latestUrl, "1.0.0");
    expect(result).toMatchObject({ status: "error", code: "VERSION_UNRESOLVABLE" });
  });
});

// ---------------------------------------------------------------------------
// computePreservationSet
// ---------------------------------------------------------------------------
describe("computePreservationSet", () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), "modkeeper-preserve-test-"));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("contains the base set", () => {
    expect([...computePreservationSet(root, { installRoot: join(root, "userdata") })]).toEqual([
      ...BASE_PRESERVED_PATHS,
    ]);
    expect(BASE_PRESERVED_PATHS).toEqual(["cfg", "mods", "mod_debug.log"]);
  });

  it("adds top-level folders of configured paths that exist inside the root", async () => {
    await mkdir(join(root, "game", "bn"), { recursive: true });
    await mkdir(join(root, "userdata"));

    const preserved = computePreservationSet(root, {
      installRoot: join(root, "userdata"),
      backupDir: join(tmpdir(), "somewhere-else", "backups"),
      gameInstallDir: join(root, "game", "bn"),
    });

    expect([...preserved]).toEqual(["cfg", "mods", "mod_debug.log", "game", "userdata"]);
  });

  it("adds extra paths such as profile install roots", async () => {
    await mkdir(join(root, "heavy_userdata", "save"), { recursive: true });

    const preserved = computePreservationSet(root, { installRoot: join(root, "userdata") }, [
      join(root, "heavy_userdata"),
      join(root, "mods", "nested"),
    ]);

    expect([...preserved]).toEqual(["cfg", "mods", "mod_debug.log", "heavy_userdata"]);
  });

  it("skips configured paths that do not exist", () => {
    const preserved = computePreservationSet(root, {
      installRoot: join(root, "userdata"),
      backupDir: join(root, "backups"),
    });
    expect(preserved.has("userdata")).toBe(false);
    expect(preserved.has("backups")).toBe(false);
  });
});

// ---------------------------------------------------------------------------
// game builds
// ---------------------------------------------------------------------------
describe("selectGameBuilds", () => {
  const asset = (name: string) => ({ name, browser_download_url: `https://example.com/dl/${name}` });
  const releases = [
    releaseSchema.parse({
      tag_name: "cbn-0.7.3",
      name: "0.7.3",
      body: "Changes",
      assets: [
        asset("cbn-linux-curses-x64-0.7.3.tar.gz"),
        asset("cbn-linux-tiles-x64-0.7.3.tar.gz"),
        asset("cbn-windows-tiles-x64-0.7.3.zip"),
      ],
    }),
    releaseSchema.parse({
      tag_name: "experimental",
      name: "Experimental 2026-01-02",
      assets: [asset("cbn-experimental-linux-tiles-x64.tar.gz")],
    }),
    releaseSchema.parse({ tag_name: "docs", name: "Docs only", assets: [asset("manual.pdf")] }),
  ];

  it("picks the tiles asset for the platform", () => {
    expect(selectGameBuilds(releases, "linux", false)).toEqual([
      {
        name: "0.7.3",
        tagName: "cbn-0.7.3",
        notes: "Changes",
        assetName: "cbn-linux-tiles-x64-0.7.3.tar.gz",
        downloadUrl: "https://example.com/dl/cbn-linux-tiles-x64-0.7.3.tar.gz",
        isExperimental: false,
      },
    ]);
    expect(selectGameBuilds(releases, "windows", false).map((b) => b.assetName)).toEqual([
      "cbn-windows-tiles-x64-0.7.3.zip",
    ]);
  });

  it("honours the experimental toggle", () => {
    const builds = selectGameBuilds(releases, "linux", true);
    expect(builds.map((b) => b.name)).toEqual(["Experimental 2026-01-02"]);
    expect(builds[0].notes).toBe("No changelog available.");
  });

  it("keeps at most the limit", () => {
    const many = Array.from({ length: 12 }, (_, i) =>
      releaseSchema.parse({ tag_name: `t${i}`, name: `0.7.${i}`, assets: [asset(`cbn-linux-tiles-${i}.tar.gz`)] }),
    );
    expect(selectGameBuilds(many, "linux", false)).toHaveLength(10);
    expect(selectGameBuilds(many, "linux", false, 3).map((b) => b.name)).toEqual(["0.7.0", "0.7.1", "0.7.2"]);
  });
});

describe("listGameBuilds / installGameBuild", () => {
  let workDir: string;

  beforeEach(async () => {
    workDir = await mkdtemp(join(tmpdir(), "modkeeper-game-test-"));
  });

  afterEach(async () => {
    await rm(workDir, { recursive: true, force: true });
  });

  it("reads the single experimental release", async () => {
    const experimentalUrl = "https://api.example.com/releases/tags/experimental";
    stubRoutes({
      [experimentalUrl]: {
        body: {
          tag_name: "experimental",
          name: "Experimental 2026-02-03",
          assets: [
            {
              name: "cbn-experimental-windows-tiles-x64.zip",
              browser_download_url: "https://example.com/dl/exp.zip",
            },
          ],
        },
      },
    });

    const builds = await listGameBuilds({ experimental: true, experimentalUrl, platform: "windows" });

    expect(builds.map((b) => b.downloadUrl)).toEqual(["https://example.com/dl/exp.zip"]);
  });

  it("throws on a failing release list", async () => {
    stubRoutes({});
    await expect(
      listGameBuilds({ releasesUrl: "https://api.example.com/releases", platform: "linux" }),
    ).rejects.toMatchObject({ code: "DOWNLOAD_FAILED", statusCode: 404 });
  });

  it("unpacks a build without its wrapper and records the game version", async () => {
    const zip = new AdmZip();
    zip.addFile("cbn-0.7.3/cataclysm-tiles.exe", Buffer.from("binary"));
    zip.addFile("cbn-0.7.3/data/json/items.json", Buffer.from("[]"));
    stubRoutes({ "https://example.com/dl/cbn-windows-tiles-0.7.3.zip": { bytes: zip.toBuffer() } });
    const versionFile = join(workDir, "version.json");
    await writeFile(versionFile, JSON.stringify({ program_version: "1.1.0" }));
    const gameDir = join(workDir, "game");

    const result = await installGameBuild(
      {
        name: "0.7.3",
        tagName: "cbn-0.7.3",
        notes: "",
        assetName: "cbn-windows-tiles-0.7.3.zip",
        downloadUrl: "https://example.com/dl/cbn-windows-tiles-0.7.3.zip",
        isExperimental: false,
      },
      gameDir,
      versionFile,
      { scratchRoot: workDir },
    );

    expect(result).toEqual({ destination: gameDir, filesWritten: 2 });
    expect(await readFile(join(gameDir, "cataclysm-tiles.exe"), "utf-8")).toBe("binary");
    expect(await readFile(join(gameDir, "data", "json", "items.json"), "utf-8")).toBe("[]");
    expect(JSON.parse(await readFile(versionFile, "utf-8"))).toEqual({
      program_version: "1.1.0",
      game_version: "0.7.3",
    });
  });
});

describe("gameBuildMappings", () => {
  it("strips the wrapper and a nested cataclysmbn-unstable folder", () => {
    const mappings = gameBuildMappings([
      "cbn/",
      "cbn/cataclysmbn-unstable/",
      "cbn/cataclysmbn-unstable/cataclysm-bn-tiles",
      "cbn/cataclysmbn-unstable/data/items.json",
    ]);
    expect(mappings.map((m) => m.relativePath)).toEqual(["cataclysm-bn-tiles", "data/items.json"]);
  });

  it("leaves builds without the nested folder as they are", () => {
    const mappings = gameBuildMappings(["cbn/cataclysm-bn-tiles", "cbn/data/items.json"]);
    expect(mappings.map((m) => m.relativePath)).toEqual(["cataclysm-bn-tiles", "data/items.json"]);
  });
});

describe("findGameExecutable / launchGame", () => {
  let gameDir: string;

  beforeEach(async () => {
    gameDir = await mkdtemp(join(tmpdir(), "modkeeper-launch-test-"));
  });

  afterEach(async () => {
    await rm(gameDir, { recursive: true, force: true });
  });

  it("prefers the executable at the top of the game directory", async () => {
    await mkdir(join(gameDir, "bin"));
    await writeFile(join(gameDir, "cataclysm-bn-tiles.exe"), "");
    await writeFile(join(gameDir, "bin", "cataclysm-bn-tiles.exe"), "");

    expect(await findGameExecutable(gameDir, "windows")).toBe(join(gameDir, "cataclysm-bn-tiles.exe"));
  });

  it("searches subfolders for the executable", async () => {
    await mkdir(join(gameDir, "build", "bin"), { recursive: true });
    await writeFile(join(gameDir, "build", "bin", "cataclysm-bn-tiles"), "");

    expect(await findGameExecutable(gameDir, "linux")).toBe(join(gameDir, "build", "bin", "cataclysm-bn-tiles"));
    expect(await findGameExecutable(gameDir, "windows")).toBeNull();
  });

  it("reports a missing executable", async () => {
    await expect(launchGame(gameDir, { platform: "linux" })).rejects.toMatchObject({
      code: "CONTENT_NOT_FOUND",
      message: `'cataclysm-bn-tiles' not found in ${gameDir}`,
    });
  });

  it.skipIf(process.platform === "win32")("makes the executable runnable and starts it in its own folder", async () => {
    const binDir = join(gameDir, "bin");
    await mkdir(binDir);
    await writeFile(join(binDir, "cataclysm-bn-tiles"), "#!/bin/sh\necho started > launched.txt\n", { mode: 0o644 });

    const launched = await launchGame(gameDir, { platform: "linux" });

    expect(launched.executable).toBe(join(binDir, "cataclysm-bn-tiles"));
    const marker = join(binDir, "launched.txt");
    await vi.waitFor(() => expect(existsSync(marker) ? readFileSync(marker, "utf-8") : "").toBe("started\n"));
  });
});
