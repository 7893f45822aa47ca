/**
 * Node.js FileSystem Adapter
 *
 * Implements the FileSystem port using Node.js fs/promises and path modules.
 */

import * as fs from "fs/promises";
import * as path from "path";
import { glob, hasMagic } from "glob";
import type { FileSystem, FileStats } from "../../domain/ports";

/**
 * Node.js implementation of the FileSystem port.
 */
export class NodeFileSystem implements FileSystem {
  async readFile(filepath: string): Promise<string> {
    return fs.readFile(filepath, "utf-8");
  }

  async writeFile(filepath: string, content: string): Promise<void> {
    await fs.mkdir(path.dirname(filepath), { recursive: true });
    await fs.writeFile(filepath, content, "utf-8");
  }

  async getStats(filepath: string): Promise<FileStats> {
    const stats = await fs.stat(filepath);
    return {
      isDirectory: stats.isDirectory(),
      isFile: stats.isFile(),
    };
  }

  async exists(filepath: string): Promise<boolean> {
    try {
      await fs.access(filepath);
      return true;
    } catch {
      return false;
    }
  }

  async readDir(dirpath: string): Promise<string[]> {
    return fs.readdir(dirpath);
  }

  async realpath(filepath: string): Promise<string> {
    return fs.realpath(filepath);
  }

  async findDirectories(pattern: string): Promise<string[]> {
    const matches = await glob(pattern, { absolute: true, dot: false });

    const directories: string[] = [];
    for (const match of matches.sort()) {
      try {
        if ((await fs.stat(match)).isDirectory()) {
          directories.push(match);
        }
      } catch {
        // Broken symlink
      }
    }
    return directories;
  }

  isGlobPattern(pattern: string): boolean {
    return hasMagic(pattern);
  }

  join(...segments: string[]): string {
    return path.join(...segments);
  }

  resolve(...segments: string[]): string {
    return path.resolve(...segments);
  }
}

/**
 * Default singleton instance
 */
export const nodeFileSystem = new NodeFileSystem();
