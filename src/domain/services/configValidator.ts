/**
 * Configuration Validator
 *
 * Validates a parsed config file and provides helpful error messages
 * for invalid configurations.
 */

import type { ConfigFile } from "../entities/config";
import { SORT_MODES, parseSortMode } from "../entities/config";

/**
 * Validation result for a single field or section.
 */
export interface ValidationIssue {
  /** The path to the invalid field (e.g., "projectHomes[0]") */
  path: string;

  /** The type of issue: error (invalid) or warning (ignored or suboptimal) */
  severity: "error" | "warning";

  /** Human-readable description of the issue */
  message: string;

  /** Suggested fix (optional) */
  suggestion?: string;
}

/**
 * Overall validation result.
 */
export interface ValidationResult {
  /** Whether the configuration is valid (no errors) */
  valid: boolean;

  /** List of all issues found */
  issues: ValidationIssue[];

  /** The config file, typed, when there are no errors */
  config: ConfigFile | null;

  /** Helper method to get issues by severity */
  getErrors(): ValidationIssue[];
  getWarnings(): ValidationIssue[];
}

/**
 * Keys the config file may contain.
 */
const KNOWN_KEYS = [
  "projectHomes",
  "projects",
  "skipCurrent",
  "sortMode",
  "cachePath",
  "cacheCapacity",
  "maxDepth",
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Validate a parsed config file.
 *
 * @param raw - The value parsed from the config file
 * @returns Validation result with any issues found
 */
export function validateConfigFile(raw: unknown): ValidationResult {
  const issues: ValidationIssue[] = [];

  if (!isRecord(raw)) {
    issues.push({
      path: "(root)",
      severity: "error",
      message: "Configuration must be a JSON object",
      suggestion: 'Start from { "projectHomes": ["~/code"] }',
    });
    return createValidationResult(issues, null);
  }

  const projectHomes = validatePathList(raw, "projectHomes", true, issues);
  const projects = validatePathList(raw, "projects", false, issues);

  if (
    projectHomes !== undefined &&
    projectHomes.length === 0 &&
    (projects === undefined || projects.length === 0)
  ) {
    issues.push({
      path: "projectHomes",
      severity: "warning",
      message: "No project homes or projects are configured",
      suggestion: "Add a directory to projectHomes (e.g., '~/code')",
    });
  }

  // Validate skipCurrent
  const skipCurrent = raw.skipCurrent;
  if (skipCurrent !== undefined && typeof skipCurrent !== "boolean") {
    issues.push({
      path: "skipCurrent",
      severity: "error",
      message: "skipCurrent must be true or false",
    });
  }

  // Validate sortMode
  const sortMode = raw.sortMode;
  if (sortMode !== undefined) {
    if (typeof sortMode !== "string") {
      issues.push({
        path: "sortMode",
        severity: "error",
        message: "sortMode must be a string",
        suggestion: `Valid modes: ${SORT_MODES.join(", ")}`,
      });
    } else if (parseSortMode(sortMode) === null) {
      issues.push({
        path: "sortMode",
        severity: "warning",
        message: `Unknown sort mode '${sortMode}', using alphabetical`,
        suggestion: `Valid modes: ${SORT_MODES.join(", ")}`,
      });
    }
  }

  // Validate cachePath
  const cachePath = raw.cachePath;
  if (cachePath !== undefined && (typeof cachePath !== "string" || cachePath.trim() === "")) {
    issues.push({
      path: "cachePath",
      severity: "error",
      message: "cachePath must be a non-empty path",
    });
  }

  const cacheCapacity = validatePositiveInteger(raw, "cacheCapacity", issues);
  const maxDepth = validatePositiveInteger(raw, "maxDepth", issues);

  // Flag keys we do not understand
  for (const key of Object.keys(raw)) {
    if (!KNOWN_KEYS.includes(key)) {
      issues.push({
        path: key,
        severity: "warning",
        message: `Unknown option '${key}' is ignored`,
        suggestion: `Known options: ${KNOWN_KEYS.join(", ")}`,
      });
    }
  }

  const hasErrors = issues.some((i) => i.severity === "error");
  const config: ConfigFile | null =
    hasErrors || projectHomes === undefined
      ? null
      : {
          projectHomes,
          projects,
          skipCurrent: typeof skipCurrent === "boolean" ? skipCurrent : undefined,
          sortMode: typeof sortMode === "string" ? sortMode : undefined,
          cachePath: typeof cachePath === "string" ? cachePath : undefined,
          cacheCapacity,
          maxDepth,
        };

  return createValidationResult(issues, config);
}

/**
 * Validate a list of path strings.
 * Returns the list when it is well-formed.
 */
function validatePathList(
  raw: Record<string, unknown>,
  key: string,
  required: boolean,
  issues: ValidationIssue[]
): string[] | undefined {
  const value = raw[key];

  if (value === undefined) {
    if (required) {
      issues.push({
        path: key,
        severity: "error",
        message: `${key} is required`,
        suggestion: `Add "${key}": ["~/code"]`,
      });
    }
    return undefined;
  }

  if (!Array.isArray(value)) {
    issues.push({
      path: key,
      severity: "error",
      message: `${key} must be a list of paths`,
    });
    return undefined;
  }

  const paths: string[] = [];
  let valid = true;
  value.forEach((entry: unknown, i) => {
    if (typeof entry !== "string" || entry.trim() === "") {
      issues.push({
        path: `${key}[${i}]`,
        severity: "error",
        message: "Path must be a non-empty string",
      });
      valid = false;
      return;
    }
    paths.push(entry);
  });

  return valid ? paths : undefined;
}

function validatePositiveInteger(
  raw: Record<string, unknown>,
  key: string,
  issues: ValidationIssue[]
): number | undefined {
  const value = raw[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== "number" || !Number.isInteger(value) || value < 1) {
    issues.push({
      path: key,
      severity: "error",
      message: `${key} must be a positive integer`,
    });
    return undefined;
  }
  return value;
}

/**
 * Create a validation result object with helper methods.
 */
function createValidationResult(
  issues: ValidationIssue[],
  config: ConfigFile | null
): ValidationResult {
  const errors = issues.filter((i) => i.severity === "error");
  const warnings = issues.filter((i) => i.severity === "warning");

  return {
    valid: errors.length === 0,
    issues,
    config,
    getErrors: () => errors,
    getWarnings: () => warnings,
  };
}

const SECTIONS: Array<{ severity: ValidationIssue["severity"]; title: string; marker: string }> = [
  { severity: "error", title: "ERRORS:", marker: "✗" },
  { severity: "warning", title: "WARNINGS:", marker: "⚠" },
];

/**
 * Format validation issues for display, grouped by severity.
 */
export function formatValidationIssues(issues: ValidationIssue[]): string {
  if (issues.length === 0) {
    return "Configuration is valid.";
  }

  const lines: string[] = [];

  for (const section of SECTIONS) {
    const matching = issues.filter((i) => i.severity === section.severity);
    if (matching.length === 0) continue;

    if (lines.length > 0) lines.push("");
    lines.push(section.title);
    for (const issue of matching) {
      lines.push(`  ${section.marker} ${issue.path}: ${issue.message}`);
      if (issue.suggestion) {
        lines.push(`    → ${issue.suggestion}`);
      }
    }
  }

  return lines.join("\n");
}
