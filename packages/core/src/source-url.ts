import type { Mod } from "./types/index.js";

const GITHUB_PREFIX = "https://github.com/";
const GITHUB_ARCHIVE_RE =
  /^https?:\/\/github\.com\/([^/]+)\/([^/]+)\/archive\/(?:refs\/(?:heads|tags)\/)?([^/]+)\.(?:zip|tar\.gz)$/;

/**
 * Turn a bare repository URL into the URL of its default-branch zip snapshot.
 * Anything that already points at an archive is returned unchanged.
 */
export function normalizeSourceUrl(url: string): string {
  const trimmed = url.trim().replace(/\/+$/, "");
  if (
    trimmed.startsWith(GITHUB_PREFIX) &&
    !trimmed.endsWith(".zip") &&
    !trimmed.endsWith(".tar.gz") &&
    !trimmed.includes("/archive/") &&
    !trimmed.includes("/releases/")
  ) {
    return `${trimmed}/archive/refs/heads/master.zip`;
  }
  return trimmed;
}

/** "owner/repo" for repository snapshot URLs, otherwise the URL itself. */
export function modDisplayName(mod: Pick<Mod, "sourceUrl">): string {
  const match = GITHUB_ARCHIVE_RE.exec(mod.sourceUrl);
  if (match) return `${match[1]}/${match[2]}`;
  return mod.sourceUrl;
}
