import { ContentNotFoundError } from "@modkeeper/core";

/** Marker file identifying the root of a mod package. */
export const MOD_MARKER_FILE = "modinfo.json";

export interface ResolveOptions {
  /** Path inside the archive (below any wrapper folder) to treat as the package root */
  contentSubpath?: string;
  /** Look for modinfo.json roots when no subpath is given */
  autoDetect?: boolean;
  /** Folder name for a modinfo.json that sits at the very top of the archive */
  fallbackFolderName?: string;
}

export interface ContentRoot {
  /** Member-name prefix stripped before writing; "" or ends with "/" */
  prefix: string;
  /** Folder created under the destination for this root; null writes straight into it */
  folderName: string | null;
}

export interface ResolvedArchiveRoot {
  /** Single hosting-platform wrapper folder, or "" */
  wrapperPrefix: string;
  roots: ContentRoot[];
}

export interface MemberMapping {
  member: string;
  /** Member path with the root prefix removed; never empty */
  relativePath: string;
  isDirectory: boolean;
}

/**
 * Archives exported by source-hosting platforms wrap everything in one
 * top-level folder (e.g. "repo-main/"). Returns that folder plus "/", or ""
 * when members live under zero or several top-level folders. Bare top-level
 * files do not count.
 */
export function detectWrapperPrefix(members: readonly string[]): string {
  const topDirs = new Set<string>();
  for (const member of members) {
    const parts = member.split("/");
    if (parts.length > 1 && parts[0]) topDirs.add(parts[0]);
  }
  if (topDirs.size === 1) {
    const [only] = topDirs;
    return `${only}/`;
  }
  return "";
}

function trimSlashes(path: string): string {
  return path.replace(/\\/g, "/").replace(/^\/+/, "").replace(/\/+$/, "");
}

function lastSegment(prefix: string): string {
  const parts = trimSlashes(prefix).split("/");
  return parts[parts.length - 1];
}

/** Members under `prefix`, with the prefix removed. The prefix entry itself is skipped. */
export function relativeMembers(members: readonly string[], prefix: string): MemberMapping[] {
  const mapped: MemberMapping[] = [];
  for (const member of members) {
    if (!member.startsWith(prefix)) continue;
    const relativePath = member.slice(prefix.length).replace(/^\/+/, "");
    if (!relativePath || relativePath === "/") continue;
    mapped.push({ member, relativePath, isDirectory: member.endsWith("/") });
  }
  return mapped;
}

/** Directories containing a file named exactly modinfo.json, as prefixes. */
export function findMarkerRoots(members: readonly string[], marker = MOD_MARKER_FILE): string[] {
  const roots = new Set<string>();
  for (const member of members) {
    const parts = member.split("/");
    if (parts[parts.length - 1] !== marker) continue;
    const dir = parts.slice(0, -1).join("/");
    roots.add(dir ? `${dir}/` : "");
  }
  return [...roots].sort();
}

/**
 * Work out which part of an archive to install.
 *
 * - With `contentSubpath`: one root, wrapper + subpath, written straight into
 *   the destination.
 * - Otherwise with `autoDetect`: one root per modinfo.json directory, each
 *   written into a folder named after the directory's last segment.
 * - Otherwise: one root, the wrapper folder (or the archive top level).
 *
 * @throws ContentNotFoundError when the subpath matches nothing or no
 *   modinfo.json exists.
 */
export function resolveArchiveRoot(members: readonly string[], options: ResolveOptions = {}): ResolvedArchiveRoot {
  const wrapperPrefix = detectWrapperPrefix(members);
  const subpath = options.contentSubpath ? trimSlashes(options.contentSubpath) : "";

  if (subpath) {
    const prefix = `${wrapperPrefix}${subpath}/`;
    if (relativeMembers(members, prefix).length === 0) {
      throw new ContentNotFoundError(`No files found under '${subpath}' in the archive`, subpath);
    }
    return { wrapperPrefix, roots: [{ prefix, folderName: null }] };
  }

  if (options.autoDetect) {
    const markerRoots = findMarkerRoots(members);
    if (markerRoots.length === 0) {
      throw new ContentNotFoundError(`No ${MOD_MARKER_FILE} found in the archive`, MOD_MARKER_FILE);
    }
    const roots = markerRoots.map((prefix) => ({
      prefix,
      folderName: prefix ? lastSegment(prefix) : (options.fallbackFolderName ?? "mod"),
    }));
    return { wrapperPrefix, roots };
  }

  if (relativeMembers(members, wrapperPrefix).length === 0) {
    throw new ContentNotFoundError("The archive contains no files");
  }
  return { wrapperPrefix, roots: [{ prefix: wrapperPrefix, folderName: null }] };
}
