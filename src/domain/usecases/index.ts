/**
 * Domain Use Cases
 *
 * Orchestrate domain services with injected dependencies.
 */

export { listProjects, type ListProjectsDependencies } from "./listProjects";
