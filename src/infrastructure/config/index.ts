/**
 * Configuration Infrastructure
 *
 * Handles loading the pathpick configuration from the filesystem.
 */

export {
  // Constants
  APP_DIR_NAME,
  // Path utilities
  getConfigDir,
  getCacheDir,
  getConfigPath,
  getDefaultCachePath,
  resolveConfig,
  // I/O operations
  loadConfig,
} from "./configLoader";
export type { DirectoryOptions, LoadConfigOptions } from "./configLoader";
