import { z } from "zod/v4";
import {
  DownloadError,
  ModkeeperError,
  VersionUnresolvableError,
  formatError,
} from "@modkeeper/core";
import type { ReleaseMetadata } from "@modkeeper/core";
import { createLogger } from "@modkeeper/logger";
import type { UpdateCheckResult } from "./types.js";
import { isNewerVersion } from "./version.js";

const log = createLogger("updater");

export const RELEASE_REQUEST_TIMEOUT_MS = 10_000;

/** Tags that name a channel rather than a version. */
export const PLACEHOLDER_TAGS: ReadonlySet<string> = new Set(["latest", "experimental", "nightly", "unstable", ""]);

const releaseAssetSchema = z.object({
  name: z.string(),
  browser_download_url: z.string(),
});

export const releaseSchema = z.object({
  tag_name: z.string().default(""),
  name: z.string().nullish(),
  body: z.string().nullish(),
  prerelease: z.boolean().default(false),
  assets: z.array(releaseAssetSchema).default([]),
  zipball_url: z.string().nullish(),
});

export type Release = z.infer<typeof releaseSchema>;

/** GET a releases API URL. Network failures surface as DownloadError. */
export async function requestJson(url: string): Promise<Response> {
  try {
    return await fetch(url, {
      headers: { Accept: "application/vnd.github+json" },
      signal: AbortSignal.timeout(RELEASE_REQUEST_TIMEOUT_MS),
    });
  } catch (err) {
    throw new DownloadError(url, `Failed to reach ${url}: ${formatError(err)}`, { cause: err });
  }
}

function httpError(url: string, response: Response): DownloadError {
  return new DownloadError(url, `Failed to fetch release: HTTP ${response.status} ${response.statusText}`, {
    statusCode: response.status,
  });
}

export function parseRelease(value: unknown, url: string): Release {
  const parsed = releaseSchema.safeParse(value);
  if (!parsed.success) {
    throw new VersionUnresolvableError(`Release data from ${url} has an unexpected shape`);
  }
  return parsed.data;
}

/** Parse a release list response, newest first. */
export function parseReleaseList(value: unknown, url: string): Release[] {
  const parsed = z.array(releaseSchema).safeParse(value);
  if (!parsed.success) {
    throw new VersionUnresolvableError(`Release list from ${url} has an unexpected shape`);
  }
  return parsed.data;
}

/**
 * Fetch the release an update URL points at. A URL that is not tag-specific
 * and answers 404 (a repository without a published "latest" release) falls
 * back to the release list, taking its first entry.
 *
 * @throws DownloadError, VersionUnresolvableError
 */
export async function fetchRelease(updateUrl: string): Promise<Release> {
  log.debug(`Fetching release from ${updateUrl}`);
  const response = await requestJson(updateUrl);

  if (response.status === 404 && !updateUrl.includes("/tags/")) {
    const listUrl = updateUrl.replace("/releases/latest", "/releases");
    log.info(`No latest release at ${updateUrl}, trying ${listUrl}`);
    const listResponse = await requestJson(listUrl);
    if (!listResponse.ok) throw httpError(listUrl, listResponse);
    const releases = parseReleaseList(await listResponse.json(), listUrl);
    if (releases.length === 0) {
      throw new VersionUnresolvableError(`No releases published at ${listUrl}`);
    }
    return releases[0];
  }

  if (!response.ok) throw httpError(updateUrl, response);
  return parseRelease(await response.json(), updateUrl);
}

/**
 * Version token for a release: the tag without a leading "v", or for
 * placeholder tags the first dotted number in the title.
 *
 * @throws VersionUnresolvableError when neither yields a version.
 */
export function resolveReleaseVersion(tagName: string, title: string): string {
  const tag = tagName.trim().replace(/^v/, "");
  if (!PLACEHOLDER_TAGS.has(tag.toLowerCase())) return tag;

  const fromTitle = /\d+(?:\.\d+)+/.exec(title);
  if (fromTitle) return fromTitle[0];
  throw new VersionUnresolvableError(`Cannot determine a version from tag "${tagName}" or title "${title}"`);
}

/** Prefer an explicit .zip asset, then the source snapshot. */
export function pickDownloadUrl(release: Release): string | null {
  const zipAsset = release.assets.find((asset) => asset.name.toLowerCase().endsWith(".zip"));
  return zipAsset?.browser_download_url ?? release.zipball_url ?? null;
}

export function toReleaseMetadata(release: Release): ReleaseMetadata {
  const title = release.name ?? release.tag_name;
  const tag = release.tag_name.toLowerCase();
  return {
    tagVersion: resolveReleaseVersion(release.tag_name, title),
    title,
    releaseNotes: release.body ?? "",
    downloadUrl: pickDownloadUrl(release),
    isExperimental: release.prerelease || tag === "experimental" || tag === "nightly" || tag === "unstable",
  };
}

/**
 * Check the configured releases URL for a newer program version.
 * Never throws; failures are captured in the result.
 */
export async function checkForUpdate(updateUrl: string, currentVersion: string): Promise<UpdateCheckResult> {
  if (!updateUrl.trim()) {
    log.warn("No update URL configured");
    return { status: "not-configured", currentVersion };
  }

  try {
    const release = toReleaseMetadata(await fetchRelease(updateUrl.trim()));
    const updateAvailable = isNewerVersion(currentVersion, release.tagVersion);

    log.info(
      updateAvailable
        ? `Update available: ${currentVersion} -> ${release.tagVersion}`
        : `Already up to date (${currentVersion})`,
    );

    return {
      status: "ok",
      currentVersion,
      updateAvailable,
      latestVersion: release.tagVersion,
      release,
    };
  } catch (err) {
    const message = formatError(err);
    log.error(`Update check failed: ${message}`);
    return {
      status: "error",
      currentVersion,
      code: err instanceof ModkeeperError ? err.code : "DOWNLOAD_FAILED",
      error: message,
    };
  }
}
