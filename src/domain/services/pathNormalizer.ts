/**
 * Path Normalizer
 *
 * Expands user-supplied path strings into absolute paths.
 * Pure functions with no filesystem access.
 */

import * as path from "path";

export interface NormalizePathOptions {
  /** Directory that `~` stands for */
  homeDir: string;
  /** Directory relative paths are resolved against */
  cwd: string;
}

/**
 * Expand a path string into an absolute path.
 *
 * - `~` becomes the home directory
 * - `~/rest` becomes `<home>/rest`
 * - anything else is resolved against `cwd`
 *
 * `~user` forms are not expanded.
 *
 * @example
 * normalizePath("~/code", { homeDir: "/home/alice", cwd: "/tmp" }) // "/home/alice/code"
 */
export function normalizePath(raw: string, options: NormalizePathOptions): string {
  const trimmed = raw.trim();

  if (trimmed === "~") {
    return path.resolve(options.homeDir);
  }

  if (trimmed.startsWith("~/") || trimmed.startsWith(`~${path.sep}`)) {
    return path.resolve(options.homeDir, trimmed.slice(2));
  }

  return path.resolve(options.cwd, trimmed);
}

/**
 * Normalize a list of path strings, dropping duplicates while keeping
 * the first occurrence's position.
 */
export function normalizePaths(
  raws: readonly string[],
  options: NormalizePathOptions
): string[] {
  return [...new Set(raws.map((raw) => normalizePath(raw, options)))];
}
