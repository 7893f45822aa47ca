/**
 * List Projects Use Case
 *
 * Produces the ranked list of project paths offered for selection.
 */

import type { Config } from "../entities";
import type { FileSystem, Logger } from "../ports";
import { excludePath, rankProjects, type RecencySource } from "../services/projectRanking";

/**
 * Dependencies required by this use case
 */
export interface ListProjectsDependencies {
  /** Filesystem abstraction (used to expand glob entries) */
  fileSystem: FileSystem;
  /** Discovers projects under the configured homes */
  resolver: { discover(roots: readonly string[]): Promise<string[]> };
  /** Recency ordering, used when sorting by "recent" */
  recency?: RecencySource;
  /** Working directory, dropped from the list when skipCurrent is set */
  cwd: string;
  logger?: Logger;
}

/**
 * List projects.
 *
 * This use case:
 * 1. Discovers projects under every home
 * 2. Adds the explicitly configured projects
 * 3. Drops duplicates and, optionally, the current directory
 * 4. Ranks the result by the configured sort mode
 */
export async function listProjects(
  config: Config,
  deps: ListProjectsDependencies
): Promise<string[]> {
  const { fileSystem, resolver, recency, cwd, logger } = deps;

  const discovered = await resolver.discover(config.projectHomes);
  const explicit = await expandProjects(config.projects, fileSystem);
  logger?.debug(
    `Found ${discovered.length} project(s) under homes, ${explicit.length} configured explicitly`
  );

  let projects = [...new Set([...explicit, ...discovered])];
  if (config.skipCurrent) {
    projects = excludePath(projects, cwd);
  }

  return rankProjects(projects, config.sortMode, recency);
}

/**
 * Expand glob entries to the directories they match.
 * Literal entries are kept whether or not they exist.
 */
async function expandProjects(
  entries: readonly string[],
  fileSystem: FileSystem
): Promise<string[]> {
  const expanded: string[] = [];
  for (const entry of entries) {
    if (fileSystem.isGlobPattern(entry)) {
      expanded.push(...(await fileSystem.findDirectories(entry)));
    } else {
      expanded.push(entry);
    }
  }
  return expanded;
}
