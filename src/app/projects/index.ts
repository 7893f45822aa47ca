// Projects module - list and record projects for a picker
import * as os from "os";
import type { Config, SortMode } from "../../domain/entities";
import { isAppError } from "../../domain/entities";
import type { FileSystem, Logger } from "../../domain/ports";
import { normalizePath } from "../../domain/services";
import { listProjects } from "../../domain/usecases";
import { loadConfig } from "../../infrastructure/config";
import type { AccessCache } from "../../infrastructure/storage";
import { withAccessCache } from "../../infrastructure/storage";
import {
  createListProjectsDependencies,
  createServiceContainer,
  openAccessCache,
  type ServiceContainer,
} from "../../composition";

/**
 * Options shared by list() and record()
 */
export interface ProjectsOptions {
  /** Use this configuration instead of loading one */
  config?: Config;
  /** Config file to load (defaults to the XDG location) */
  configPath?: string;
  /** Working directory (defaults to process.cwd()) */
  cwd?: string;
  /** Home directory for `~` (defaults to os.homedir()) */
  homeDir?: string;
  /** Environment for XDG lookups (defaults to process.env) */
  env?: Record<string, string | undefined>;
  fileSystem?: FileSystem;
  logger?: Logger;
  signal?: AbortSignal;
}

export interface ListOptions extends ProjectsOptions {
  /** Overrides the configured sort mode */
  sortMode?: SortMode;
}

async function setup(options: ProjectsOptions): Promise<{
  container: ServiceContainer;
  cwd: string;
}> {
  const cwd = options.cwd ?? process.cwd();
  const config =
    options.config ??
    (await loadConfig({
      configPath: options.configPath,
      cwd,
      homeDir: options.homeDir,
      env: options.env,
      fileSystem: options.fileSystem,
      logger: options.logger,
    }));

  const container = createServiceContainer(config, {
    fileSystem: options.fileSystem,
    logger: options.logger,
    signal: options.signal,
  });
  return { container, cwd };
}

/**
 * Open the persistent cache for reading. A store that cannot be used
 * costs the ordering, not the listing.
 */
async function openCacheForListing(container: ServiceContainer): Promise<AccessCache> {
  try {
    return await openAccessCache(container, true);
  } catch (error) {
    if (isAppError(error, "STORE_CORRUPT") || isAppError(error, "STORE_UNREADABLE")) {
      container.logger.warn(`${error.message}; listing without access history`);
      return openAccessCache(container, false);
    }
    throw error;
  }
}

/**
 * List projects, ranked by the configured (or requested) sort mode.
 */
export async function list(options: ListOptions = {}): Promise<string[]> {
  const { container, cwd } = await setup(options);
  const sortMode = options.sortMode ?? container.config.sortMode;
  const config = { ...container.config, sortMode };

  const cache =
    sortMode === "recent"
      ? await openCacheForListing(container)
      : await openAccessCache(container, false);

  return withAccessCache(cache, (recency) =>
    listProjects(config, createListProjectsDependencies(container, recency, cwd))
  );
}

/**
 * Record that a project was just opened.
 *
 * @returns The normalized path that was recorded
 * @throws AppError STORE_CORRUPT or STORE_UNREADABLE when the store
 *   cannot be loaded; it is left untouched in that case
 */
export async function record(projectPath: string, options: ProjectsOptions = {}): Promise<string> {
  const { container, cwd } = await setup(options);
  const normalized = normalizePath(projectPath, {
    homeDir: options.homeDir ?? os.homedir(),
    cwd,
  });

  const cache = await openAccessCache(container, true);
  await withAccessCache(cache, (c) => c.registerAccess(normalized));
  container.logger.debug(`Recorded access to ${normalized}`);
  return normalized;
}
