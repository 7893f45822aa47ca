/**
 * Configuration Loader
 *
 * Infrastructure adapter for loading the pathpick configuration.
 * Reads the JSON config file, validates it and resolves every path
 * into an absolute one.
 */

import * as path from "path";
import * as os from "os";
import type { Config, ConfigFile } from "../../domain/entities";
import {
  AppError,
  DEFAULT_CACHE_CAPACITY,
  DEFAULT_MAX_DEPTH,
  DEFAULT_SORT_MODE,
  parseSortMode,
} from "../../domain/entities";
import type { FileSystem, Logger } from "../../domain/ports";
import {
  formatValidationIssues,
  normalizePath,
  normalizePaths,
  validateConfigFile,
} from "../../domain/services";
import { nodeFileSystem } from "../filesystem";

// ============================================================================
// Constants
// ============================================================================

/** Directory name used under the config and cache directories */
export const APP_DIR_NAME = "pathpick";

const CONFIG_FILE_NAME = "config.json";
const CACHE_FILE_NAME = "access_cache.json";

type Env = Record<string, string | undefined>;

export interface DirectoryOptions {
  /** Environment to read XDG variables from (defaults to process.env) */
  env?: Env;
  /** Home directory (defaults to os.homedir()) */
  homeDir?: string;
}

// ============================================================================
// Path Utilities (pure functions)
// ============================================================================

/**
 * An XDG base directory, or `<home>/<fallback>` when the variable is unset
 * or not absolute.
 */
function xdgDir(variable: string, fallback: string, options: DirectoryOptions): string {
  const env = options.env ?? process.env;
  const value = env[variable];
  if (value !== undefined && path.isAbsolute(value)) {
    return value;
  }
  return path.join(options.homeDir ?? os.homedir(), fallback);
}

/**
 * Base configuration directory ($XDG_CONFIG_HOME or ~/.config)
 */
export function getConfigDir(options: DirectoryOptions = {}): string {
  return xdgDir("XDG_CONFIG_HOME", ".config", options);
}

/**
 * Base cache directory ($XDG_CACHE_HOME or ~/.cache)
 */
export function getCacheDir(options: DirectoryOptions = {}): string {
  return xdgDir("XDG_CACHE_HOME", ".cache", options);
}

/**
 * Default location of the config file
 */
export function getConfigPath(options: DirectoryOptions = {}): string {
  return path.join(getConfigDir(options), APP_DIR_NAME, CONFIG_FILE_NAME);
}

/**
 * Default location of the access cache store
 */
export function getDefaultCachePath(options: DirectoryOptions = {}): string {
  return path.join(getCacheDir(options), APP_DIR_NAME, CACHE_FILE_NAME);
}

/**
 * Apply defaults and make every path absolute.
 */
export function resolveConfig(
  file: ConfigFile,
  options: DirectoryOptions & { cwd?: string } = {}
): Config {
  const normalizeOptions = {
    homeDir: options.homeDir ?? os.homedir(),
    cwd: options.cwd ?? process.cwd(),
  };

  return {
    projectHomes: normalizePaths(file.projectHomes, normalizeOptions),
    projects: normalizePaths(file.projects ?? [], normalizeOptions),
    skipCurrent: file.skipCurrent ?? false,
    sortMode:
      file.sortMode === undefined
        ? DEFAULT_SORT_MODE
        : parseSortMode(file.sortMode) ?? DEFAULT_SORT_MODE,
    cachePath:
      file.cachePath === undefined
        ? getDefaultCachePath(options)
        : normalizePath(file.cachePath, normalizeOptions),
    cacheCapacity: file.cacheCapacity ?? DEFAULT_CACHE_CAPACITY,
    maxDepth: file.maxDepth ?? DEFAULT_MAX_DEPTH,
  };
}

// ============================================================================
// Config I/O (infrastructure)
// ============================================================================

export interface LoadConfigOptions extends DirectoryOptions {
  /** Explicit config file; defaults to getConfigPath() */
  configPath?: string;
  /** Directory relative paths are resolved against */
  cwd?: string;
  fileSystem?: FileSystem;
  /** Receives validation warnings */
  logger?: Logger;
}

/**
 * Load, validate and resolve the config file.
 *
 * @throws AppError CONFIG_INVALID when the file is missing, is not JSON,
 *   or fails validation
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<Config> {
  const fileSystem = options.fileSystem ?? nodeFileSystem;
  const configPath = options.configPath ?? getConfigPath(options);

  if (!(await fileSystem.exists(configPath))) {
    throw new AppError("CONFIG_INVALID", `Config file not found: ${configPath}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(await fileSystem.readFile(configPath));
  } catch (error) {
    throw new AppError("CONFIG_INVALID", `Could not parse config file ${configPath}`, {
      cause: error,
    });
  }

  const result = validateConfigFile(raw);
  if (result.config === null) {
    throw new AppError(
      "CONFIG_INVALID",
      `Invalid config file ${configPath}\n${formatValidationIssues(result.getErrors())}`
    );
  }

  for (const issue of result.getWarnings()) {
    options.logger?.warn(`${configPath}: ${issue.path}: ${issue.message}`);
  }

  return resolveConfig(result.config, options);
}
