/**
 * Git Metadata Classifier
 *
 * Implements the RepositoryClassifier port by reading git's on-disk
 * metadata directly. No git binary is needed.
 *
 * The git directory of `<dir>` is found the way git opens a repository:
 * - `<dir>/.git/` when it is a directory
 * - the `gitdir:` target of a `<dir>/.git` file, relative to `<dir>`
 * - `<dir>` itself when it has HEAD, objects/ and refs/
 *
 * A git directory whose config sets core.bare is a bare repository; its
 * linked worktrees are registered under `<gitdir>/worktrees/<name>` and
 * live at `<dir>/<name>`. Anything else with a `.git` is a repository with
 * a working tree.
 */

import type { RepositoryClassification } from "../../domain/entities";
import { AppError, GIT_METADATA_DIR } from "../../domain/entities";
import type { FileStats, FileSystem, RepositoryClassifier } from "../../domain/ports";

const SECTION_HEADER = /^\s*\[([^\]]+)\](.*)$/;
const BARE_KEY = /^\s*bare\s*(?:=(.*))?$/i;
const GITDIR_LINE = /^gitdir:\s*(.+?)\s*$/m;

const TRUE_VALUES = new Set(["true", "yes", "on", "1"]);
const FALSE_VALUES = new Set(["false", "no", "off", "0", ""]);

export class GitMetadataClassifier implements RepositoryClassifier {
  constructor(private readonly fs: FileSystem) {}

  async classify(dirpath: string): Promise<RepositoryClassification> {
    const dotGit = this.fs.join(dirpath, GIT_METADATA_DIR);
    const dotGitStats = await this.statOf(dotGit);

    let gitDir: string | null;
    if (dotGitStats === null) {
      gitDir = dirpath;
    } else if (dotGitStats.isDirectory) {
      gitDir = dotGit;
    } else {
      gitDir = await this.readGitfile(dirpath, dotGit);
    }

    const isGitDir = gitDir !== null && (await this.isGitDirectory(gitDir));
    if (gitDir === null || !isGitDir) {
      return dotGitStats === null ? { kind: "none" } : { kind: "repository" };
    }

    if (!(await this.isBare(gitDir))) {
      return { kind: "repository" };
    }

    return { kind: "bare", worktrees: await this.listWorktrees(gitDir) };
  }

  /**
   * Target of a `.git` file, resolved against the directory holding it.
   * Null when the file has no `gitdir:` line.
   */
  private async readGitfile(dirpath: string, gitfile: string): Promise<string | null> {
    const match = GITDIR_LINE.exec(await this.read(gitfile));
    const target = match?.[1];
    return target === undefined ? null : this.fs.resolve(dirpath, target);
  }

  /**
   * A git directory has HEAD plus objects/ and refs/.
   */
  private async isGitDirectory(dirpath: string): Promise<boolean> {
    const [head, objects, refs] = await Promise.all([
      this.statOf(this.fs.join(dirpath, "HEAD")),
      this.statOf(this.fs.join(dirpath, "objects")),
      this.statOf(this.fs.join(dirpath, "refs")),
    ]);
    return Boolean(head?.isFile && objects?.isDirectory && refs?.isDirectory);
  }

  private async isBare(gitDir: string): Promise<boolean> {
    const configPath = this.fs.join(gitDir, "config");
    if (!(await this.fs.exists(configPath))) {
      return false;
    }
    return readCoreBare(await this.read(configPath));
  }

  /**
   * Names of registered worktrees: subdirectories of `worktrees/` that
   * hold a `gitdir` file. Sorted for a stable order.
   */
  private async listWorktrees(gitDir: string): Promise<string[]> {
    const worktreesDir = this.fs.join(gitDir, "worktrees");
    const stats = await this.statOf(worktreesDir);
    if (!stats?.isDirectory) {
      return [];
    }

    let entries: string[];
    try {
      entries = await this.fs.readDir(worktreesDir);
    } catch (error) {
      throw new AppError("ROOT_UNREADABLE", `Could not read directory ${worktreesDir}`, {
        cause: error,
      });
    }

    const names: string[] = [];
    for (const name of entries) {
      const gitdirFile = await this.statOf(this.fs.join(worktreesDir, name, "gitdir"));
      if (gitdirFile?.isFile) {
        names.push(name);
      }
    }
    return names.sort();
  }

  private async read(filepath: string): Promise<string> {
    try {
      return await this.fs.readFile(filepath);
    } catch (error) {
      throw new AppError("ROOT_UNREADABLE", `Could not read ${filepath}`, { cause: error });
    }
  }

  private async statOf(filepath: string): Promise<FileStats | null> {
    if (!(await this.fs.exists(filepath))) {
      return null;
    }
    return this.fs.getStats(filepath);
  }
}

/**
 * Parse a git config boolean. A key with no `=` is true.
 * Returns null for values git would reject.
 */
export function parseGitBoolean(raw: string | undefined): boolean | null {
  if (raw === undefined) return true;

  let value = stripComment(raw).trim();
  if (value.length >= 2 && value.startsWith('"') && value.endsWith('"')) {
    value = value.slice(1, -1);
  }
  value = value.toLowerCase();

  if (TRUE_VALUES.has(value)) return true;
  if (FALSE_VALUES.has(value)) return false;
  return null;
}

/** Drop a `#` or `;` comment that is not inside quotes */
function stripComment(text: string): string {
  let quoted = false;
  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (ch === '"') quoted = !quoted;
    else if (!quoted && (ch === "#" || ch === ";")) return text.slice(0, i);
  }
  return text;
}

/**
 * Value of core.bare in a git config file. The last setting wins;
 * unset or unparseable means not bare.
 */
export function readCoreBare(content: string): boolean {
  let bare = false;
  let inCore = false;

  for (const line of content.split(/\r?\n/)) {
    let body = line;
    const header = SECTION_HEADER.exec(line);
    if (header) {
      inCore = (header[1] ?? "").trim().toLowerCase() === "core";
      body = header[2] ?? "";
    }
    if (!inCore) continue;

    const setting = BARE_KEY.exec(stripComment(body).trimEnd());
    if (setting) {
      bare = parseGitBoolean(setting[1]) ?? bare;
    }
  }
  return bare;
}
