/**
 * Composition Root
 *
 * This is the single place where all dependencies are wired together.
 * The composition root creates concrete implementations and injects them
 * into use cases and services.
 *
 * This is the only file that knows about concrete implementations.
 * Everything else depends only on interfaces (ports).
 */

import type { Config } from "./domain/entities";
import type { FileSystem, Logger, RepositoryClassifier } from "./domain/ports";
import { ProjectResolver } from "./domain/services";
import type { ListProjectsDependencies } from "./domain/usecases";

// Infrastructure implementations
import { nodeFileSystem } from "./infrastructure/filesystem";
import { GitMetadataClassifier } from "./infrastructure/git";
import { createSilentLogger } from "./infrastructure/logger";
import { AccessCache } from "./infrastructure/storage";

// ============================================================================
// Service Container
// ============================================================================

/**
 * Container for all application services.
 * Created once per command and passed to use cases.
 */
export interface ServiceContainer {
  config: Config;
  fileSystem: FileSystem;
  classifier: RepositoryClassifier;
  resolver: ProjectResolver;
  logger: Logger;
}

export interface ServiceContainerOptions {
  /** Defaults to the Node filesystem */
  fileSystem?: FileSystem;
  /** Defaults to a silent logger */
  logger?: Logger;
  /** Cancels discovery */
  signal?: AbortSignal;
}

/**
 * Create a service container for a resolved configuration.
 */
export function createServiceContainer(
  config: Config,
  options: ServiceContainerOptions = {}
): ServiceContainer {
  const fileSystem = options.fileSystem ?? nodeFileSystem;
  const logger = options.logger ?? createSilentLogger();
  const classifier = new GitMetadataClassifier(fileSystem);
  const resolver = new ProjectResolver(
    { fileSystem, classifier, logger },
    { maxDepth: config.maxDepth, signal: options.signal }
  );

  return { config, fileSystem, classifier, resolver, logger };
}

/**
 * Open the configured access cache.
 *
 * @param persistent - false for a throwaway in-memory cache
 */
export async function openAccessCache(
  container: ServiceContainer,
  persistent: boolean
): Promise<AccessCache> {
  const { config, fileSystem, logger } = container;
  if (!persistent) {
    return AccessCache.loadEphemeral(config.cacheCapacity);
  }
  return AccessCache.load(config.cachePath, config.cacheCapacity, { fileSystem, logger });
}

// ============================================================================
// Use Case Dependencies
// ============================================================================

/**
 * Create dependencies for the listProjects use case.
 */
export function createListProjectsDependencies(
  container: ServiceContainer,
  cache: AccessCache,
  cwd: string
): ListProjectsDependencies {
  return {
    fileSystem: container.fileSystem,
    resolver: container.resolver,
    recency: cache,
    cwd,
    logger: container.logger,
  };
}
