/**
 * Domain Entities
 *
 * Core objects with no external dependencies.
 */

// Config - Application configuration
export type { Config, ConfigFile, SortMode } from "./config";
export {
  SORT_MODES,
  DEFAULT_CACHE_CAPACITY,
  DEFAULT_MAX_DEPTH,
  DEFAULT_SORT_MODE,
  parseSortMode,
} from "./config";

// Project - Paths and repository classification
export type { ProjectPath, RepositoryClassification } from "./project";
export { GIT_METADATA_DIR } from "./project";

// Errors
export type { AppErrorCode } from "./errors";
export { AppError, isAppError, describeError } from "./errors";
