import { createLogger } from "@modkeeper/logger";

const log = createLogger("updater:version");

/**
 * Parse a dotted numeric version ("1.2", "0.7.2") into its segments.
 * Returns null for anything else, including pre-release suffixes.
 */
export function parseVersion(version: string): number[] | null {
  if (!/^\d+(\.\d+)*$/.test(version)) return null;
  return version.split(".").map(Number);
}

/**
 * Compare two dotted numeric versions, padding the shorter with zeros.
 * Returns -1 if a < b, 0 if a === b, 1 if a > b.
 *
 * @throws Error if either version is not dotted numeric.
 */
export function compareVersions(a: string, b: string): -1 | 0 | 1 {
  const left = parseVersion(a);
  const right = parseVersion(b);
  if (!left) throw new Error(`Invalid version string: "${a}"`);
  if (!right) throw new Error(`Invalid version string: "${b}"`);

  const length = Math.max(left.length, right.length);
  for (let i = 0; i < length; i++) {
    const l = left[i] ?? 0;
    const r = right[i] ?? 0;
    if (l !== r) return l > r ? 1 : -1;
  }
  return 0;
}

/**
 * Returns true if `candidate` is newer than `current`.
 *
 * When either side is not dotted numeric (a renamed tag, "update_test"),
 * any difference counts as newer. This can report an update for a tag that
 * was merely renamed.
 */
export function isNewerVersion(current: string, candidate: string): boolean {
  if (!candidate) return false;
  if (parseVersion(current) && parseVersion(candidate)) {
    return compareVersions(candidate, current) === 1;
  }
  if (current !== candidate) {
    log.info(`Non-numeric version detected: ${candidate}. Treating as update available.`);
    return true;
  }
  return false;
}
