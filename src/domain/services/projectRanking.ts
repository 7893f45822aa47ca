/**
 * Project Ranking
 *
 * Orders discovered projects for selection.
 */

import type { SortMode } from "../entities";

/**
 * Anything that can order paths by recency.
 */
export interface RecencySource {
  compareByRecency(a: string, b: string): number;
}

/** Code-point order, independent of locale */
export function comparePaths(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Sort project paths.
 *
 * - alphabetical: by path
 * - recent: most recently accessed first, then by path
 *
 * @returns A new array; the input is left untouched
 */
export function rankProjects(
  paths: readonly string[],
  sortMode: SortMode,
  recency?: RecencySource
): string[] {
  const ranked = [...paths];

  if (sortMode === "recent" && recency) {
    return ranked.sort((a, b) => recency.compareByRecency(a, b) || comparePaths(a, b));
  }

  return ranked.sort(comparePaths);
}

/**
 * Drop one path (e.g. the current directory) from a list.
 */
export function excludePath(paths: readonly string[], excluded: string): string[] {
  return paths.filter((p) => p !== excluded);
}
