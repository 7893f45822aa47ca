/**
 * Project Entities
 */

/** Absolute filesystem path identifying a project */
export type ProjectPath = string;

/**
 * Name of the repository metadata directory.
 * Never a project candidate and never scanned.
 */
export const GIT_METADATA_DIR = ".git";

/**
 * What the repository classifier found at a directory.
 */
export type RepositoryClassification =
  | { kind: "none" }
  | { kind: "repository" }
  | { kind: "bare"; worktrees: string[] };
