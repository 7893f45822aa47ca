/**
 * Project Discovery Resolver
 *
 * Turns configured root directories into a flat, de-duplicated list of
 * project paths. Bare git repositories are expanded into their linked
 * worktrees instead of being listed themselves.
 *
 * The walk uses an explicit worklist rather than recursion. Directories are
 * tracked by canonical path (symlinks resolved), which keeps overlapping
 * roots and symlink cycles from producing duplicates or endless work.
 */

import { AppError, GIT_METADATA_DIR } from "../entities";
import type { FileSystem, Logger, RepositoryClassifier } from "../ports";

/**
 * Dependencies required by the resolver
 */
export interface ProjectDiscoveryDependencies {
  /** Filesystem abstraction */
  fileSystem: FileSystem;
  /** Tells plain directories, repositories and bare repositories apart */
  classifier: RepositoryClassifier;
  /** Receives notes about skipped roots */
  logger?: Logger;
}

export interface ProjectDiscoveryOptions {
  /**
   * Directory levels below a root that are project candidates.
   * 1 (the default) means only immediate children of each root.
   */
  maxDepth?: number;
  /** Checked between worklist iterations */
  signal?: AbortSignal;
}

interface WorkItem {
  dir: string;
  depth: number;
}

export class ProjectResolver {
  private readonly fs: FileSystem;
  private readonly classifier: RepositoryClassifier;
  private readonly logger: Logger | undefined;
  private readonly maxDepth: number;
  private readonly signal: AbortSignal | undefined;

  constructor(deps: ProjectDiscoveryDependencies, options: ProjectDiscoveryOptions = {}) {
    this.fs = deps.fileSystem;
    this.classifier = deps.classifier;
    this.logger = deps.logger;
    this.maxDepth = options.maxDepth ?? 1;
    this.signal = options.signal;
  }

  /**
   * Discover projects under the given roots.
   *
   * Roots that do not exist are skipped. A directory that exists but
   * cannot be listed aborts the whole run with a ROOT_UNREADABLE error.
   *
   * @param roots - Absolute root directories
   * @returns Project paths, each at most once, in discovery order
   */
  async discover(roots: readonly string[]): Promise<string[]> {
    // canonical path -> path as first reached
    const found = new Map<string, string>();
    // directories whose children were already listed
    const scanned = new Set<string>();
    // candidates already classified and claimed
    const seen = new Set<string>();

    const worklist: WorkItem[] = [...roots].reverse().map((dir) => ({ dir, depth: 0 }));

    while (worklist.length > 0) {
      this.signal?.throwIfAborted();
      const item = worklist.pop();
      if (item === undefined) break;
      const { dir, depth } = item;

      if (!(await this.fs.exists(dir))) {
        this.logger?.debug(`Skipping missing directory: ${dir}`);
        continue;
      }

      const key = await this.canonical(dir);
      if (scanned.has(key)) continue;
      scanned.add(key);

      // A bare root stands for its worktrees. Any other root is scanned,
      // even one holding a .git of its own.
      if (depth === 0) {
        const classification = await this.classifier.classify(dir);
        if (classification.kind === "bare") {
          await this.addWorktrees(dir, classification.worktrees, found);
          continue;
        }
      }

      for (const child of await this.listChildDirectories(dir)) {
        const childKey = await this.canonical(child);
        if (seen.has(childKey)) continue;

        const classification = await this.classifier.classify(child);
        if (classification.kind === "bare") {
          await this.addWorktrees(child, classification.worktrees, found);
          continue;
        }

        seen.add(childKey);
        if (!found.has(childKey)) found.set(childKey, child);

        if (classification.kind === "none" && depth + 1 < this.maxDepth) {
          worklist.push({ dir: child, depth: depth + 1 });
        }
      }
    }

    return [...found.values()];
  }

  /**
   * List the subdirectories of `dir`, skipping the git metadata directory.
   */
  private async listChildDirectories(dir: string): Promise<string[]> {
    let names: string[];
    try {
      names = await this.fs.readDir(dir);
    } catch (error) {
      throw new AppError("ROOT_UNREADABLE", `Could not read directory ${dir}`, {
        cause: error,
      });
    }

    const children: string[] = [];
    for (const name of [...names].sort()) {
      if (name === GIT_METADATA_DIR) continue;

      const child = this.fs.join(dir, name);
      if (await this.isDirectory(child)) {
        children.push(child);
      }
    }
    return children;
  }

  private async addWorktrees(
    repoDir: string,
    worktrees: readonly string[],
    found: Map<string, string>
  ): Promise<void> {
    for (const name of worktrees) {
      const worktree = this.fs.join(repoDir, name);
      const key = await this.canonical(worktree);
      if (!found.has(key)) found.set(key, worktree);
    }
  }

  /**
   * Whether a path is a directory. Broken symlinks and entries that
   * cannot be inspected are not.
   */
  private async isDirectory(filepath: string): Promise<boolean> {
    try {
      return (await this.fs.getStats(filepath)).isDirectory;
    } catch {
      return false;
    }
  }

  /**
   * Canonical form of a path, used as the de-duplication key.
   * Paths that cannot be resolved (e.g. a stale worktree) key on themselves.
   */
  private async canonical(filepath: string): Promise<string> {
    try {
      return await this.fs.realpath(filepath);
    } catch {
      return this.fs.resolve(filepath);
    }
  }
}
