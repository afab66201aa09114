import { isAbsolute, relative, resolve } from "node:path";

/**
 * Path as written to disk: relative to `base` when it lies inside it,
 * absolute otherwise (outside the base, or on another drive).
 */
export function toStoredPath(path: string, base: string): string {
  if (!path || !isAbsolute(path)) return path;
  const rel = relative(base, path);
  if (rel === "") return ".";
  if (rel.startsWith("..") || isAbsolute(rel)) return path;
  return rel;
}

/** Absolute path for a stored value; empty values fall back to `fallback`. */
export function resolveStoredPath(stored: string | undefined, base: string, fallback: string): string {
  if (!stored) return fallback;
  return isAbsolute(stored) ? stored : resolve(base, stored);
}
