/**
 * Domain Ports
 *
 * Interfaces defining what the domain needs from external systems.
 * These are implemented by infrastructure adapters.
 */

export type { FileSystem, FileStats } from "./filesystem";
export type { Logger, LoggerFactory } from "./logger";
export type { RepositoryClassifier } from "./repositoryClassifier";
export type { Clock } from "./clock";
