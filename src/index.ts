/**
 * pathpick - List project directories for a fuzzy picker
 *
 * Finds projects under configured home directories, expands bare git
 * repositories into their worktrees, and ranks the result alphabetically
 * or by most recent use.
 *
 * @example
 * ```ts
 * import pathpick from 'pathpick';
 *
 * // List projects using ~/.config/pathpick/config.json
 * const projects = await pathpick.list();
 *
 * // Remember the one the user picked
 * await pathpick.record(projects[0]);
 *
 * // Most recently used first
 * const recent = await pathpick.list({ sortMode: 'recent' });
 * ```
 *
 * @example Lower-level pieces
 * ```ts
 * import {
 *   ProjectResolver,
 *   GitMetadataClassifier,
 *   nodeFileSystem,
 *   createLogger,
 * } from 'pathpick';
 *
 * const resolver = new ProjectResolver({
 *   fileSystem: nodeFileSystem,
 *   classifier: new GitMetadataClassifier(nodeFileSystem),
 *   logger: createLogger({ verbose: true }),
 * });
 * const found = await resolver.discover(['/home/alice/code']);
 * ```
 */

import { list, record } from "./app/projects";

// Re-export types
export type { ListOptions, ProjectsOptions } from "./app/projects";
export type {
  Config,
  ConfigFile,
  SortMode,
  ProjectPath,
  RepositoryClassification,
  AppErrorCode,
  FileSystem,
  FileStats,
  Logger,
  LoggerFactory,
  RepositoryClassifier,
  Clock,
  ProjectDiscoveryDependencies,
  ProjectDiscoveryOptions,
  ListProjectsDependencies,
  RecencySource,
} from "./domain";
export type { AccessCacheOptions, LoadConfigOptions } from "./infrastructure";

// Core services
export {
  ProjectResolver,
  RecencyCache,
  systemClock,
  rankProjects,
  excludePath,
  normalizePath,
  normalizePaths,
  validateConfigFile,
  formatValidationIssues,
  listProjects,
  AppError,
  isAppError,
} from "./domain";

// Adapters
export {
  GitMetadataClassifier,
  AccessCache,
  withAccessCache,
  NodeFileSystem,
  nodeFileSystem,
  loadConfig,
  getConfigPath,
  getDefaultCachePath,
  ConsoleLogger,
  StderrLogger,
  SilentLogger,
  createLogger,
  createStderrLogger,
  createSilentLogger,
} from "./infrastructure";

export { VERSION } from "./version";
export { list, record };

const pathpick = {
  list,
  record,
};

export default pathpick;
