/**
 * Domain Services
 *
 * Pure algorithms and business logic. Anything touching the outside
 * world goes through a port.
 */

// Path expansion
export { normalizePath, normalizePaths, type NormalizePathOptions } from "./pathNormalizer";

// Config validation
export {
  validateConfigFile,
  formatValidationIssues,
  type ValidationIssue,
  type ValidationResult,
} from "./configValidator";

// Discovery
export {
  ProjectResolver,
  type ProjectDiscoveryDependencies,
  type ProjectDiscoveryOptions,
} from "./projectDiscovery";

// Recency
export { RecencyCache, systemClock } from "./recencyCache";

// Ranking
export { rankProjects, excludePath, comparePaths, type RecencySource } from "./projectRanking";
