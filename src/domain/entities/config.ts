/**
 * Config Entity
 *
 * Configuration for project discovery and ranking.
 */

/**
 * How the project list is ordered.
 * - alphabetical: by path
 * - recent: most recently recorded access first
 */
export type SortMode = "alphabetical" | "recent";

export const SORT_MODES: readonly SortMode[] = ["alphabetical", "recent"];

/**
 * Config file as written by the user, before validation.
 * Path fields may still use the `~/` shorthand.
 */
export interface ConfigFile {
  /** Directories whose children are project candidates */
  projectHomes: string[];

  /** Extra project paths or glob patterns */
  projects?: string[];

  /** Drop the current working directory from the list */
  skipCurrent?: boolean;

  /** "alphabetical" or "recent" (case-insensitive) */
  sortMode?: string;

  /** Location of the access cache store */
  cachePath?: string;

  /** Maximum number of entries kept in the access cache */
  cacheCapacity?: number;

  /** Directory levels below a home that are candidates */
  maxDepth?: number;
}

/**
 * Resolved configuration.
 *
 * Built once by the config loader and handed to everything that needs it.
 * All paths are absolute.
 */
export interface Config {
  projectHomes: string[];
  projects: string[];
  skipCurrent: boolean;
  sortMode: SortMode;
  cachePath: string;
  cacheCapacity: number;
  maxDepth: number;
}

/** Default access cache capacity */
export const DEFAULT_CACHE_CAPACITY = 32;

/** Default discovery depth: immediate children of each home */
export const DEFAULT_MAX_DEPTH = 1;

export const DEFAULT_SORT_MODE: SortMode = "alphabetical";

/**
 * Parse a sort mode name, ignoring case.
 * Returns null for names that are not a known mode.
 */
export function parseSortMode(value: string): SortMode | null {
  const normalized = value.trim().toLowerCase();
  return SORT_MODES.find((mode) => mode === normalized) ?? null;
}
