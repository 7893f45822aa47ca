/**
 * FileSystem Port
 *
 * Abstract interface for filesystem operations.
 * This allows the domain to remain independent of the actual filesystem implementation.
 */

/**
 * File statistics
 */
export interface FileStats {
  /** Whether this is a directory (symlinks are followed) */
  isDirectory: boolean;
  /** Whether this is a regular file (symlinks are followed) */
  isFile: boolean;
}

/**
 * Abstract filesystem interface.
 *
 * All filesystem operations should go through this interface
 * to maintain domain independence from Node.js fs module.
 */
export interface FileSystem {
  /**
   * Read a file's content as UTF-8 string
   */
  readFile(filepath: string): Promise<string>;

  /**
   * Write content to a file (creates directories if needed)
   */
  writeFile(filepath: string, content: string): Promise<void>;

  /**
   * Get file statistics
   */
  getStats(filepath: string): Promise<FileStats>;

  /**
   * Check if a file exists
   */
  exists(filepath: string): Promise<boolean>;

  /**
   * List entry names in a directory.
   * Rejects when the directory cannot be read.
   */
  readDir(dirpath: string): Promise<string[]>;

  /**
   * Resolve symlinks to the canonical path
   */
  realpath(filepath: string): Promise<string>;

  /**
   * Find directories matching a glob pattern (absolute paths)
   */
  findDirectories(pattern: string): Promise<string[]>;

  /**
   * Whether a string contains glob syntax
   */
  isGlobPattern(pattern: string): boolean;

  /**
   * Join path segments
   */
  join(...segments: string[]): string;

  /**
   * Resolve to absolute path
   */
  resolve(...segments: string[]): string;
}
