/**
 * Domain Layer
 *
 * Contains the core logic of project discovery and ranking:
 * - Entities: Core data structures
 * - Ports: Interfaces for external dependencies
 * - Services: Pure business logic and algorithms
 * - Use Cases: Application business logic
 */

export * from "./entities";
export * from "./ports";
export * from "./services";
export * from "./usecases";

