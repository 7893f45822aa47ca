/**
 * Infrastructure Layer
 *
 * Contains adapters that implement domain ports.
 * These connect the domain to external systems (filesystem, git metadata, etc.)
 */

// FileSystem
export { NodeFileSystem, nodeFileSystem } from "./filesystem";

// Git
export { GitMetadataClassifier } from "./git";

// Storage
export { AccessCache, withAccessCache } from "./storage";
export type { AccessCacheOptions } from "./storage";

// Config
export {
  APP_DIR_NAME,
  getConfigDir,
  getCacheDir,
  getConfigPath,
  getDefaultCachePath,
  resolveConfig,
  loadConfig,
} from "./config";
export type { DirectoryOptions, LoadConfigOptions } from "./config";

// Logger
export {
  ConsoleLogger,
  StderrLogger,
  SilentLogger,
  createLogger,
  createStderrLogger,
  createSilentLogger,
} from "./logger";
