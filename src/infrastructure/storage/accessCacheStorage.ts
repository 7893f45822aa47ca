/**
 * Access Cache Storage
 *
 * Persists a RecencyCache as a JSON object mapping absolute project paths
 * to Unix-second timestamps:
 *
 * {
 *   "/home/alice/code/proj1": 1700000000,
 *   "/home/alice/code/proj2/wt-a": 1700000100
 * }
 *
 * Keys are written in sorted order so the file diffs cleanly.
 */

import { AppError, describeError } from "../../domain/entities";
import type { Clock, FileSystem, Logger } from "../../domain/ports";
import { RecencyCache } from "../../domain/services";
import { nodeFileSystem } from "../filesystem";

export interface AccessCacheOptions {
  fileSystem?: FileSystem;
  /** Receives a warning when the store cannot be written */
  logger?: Logger;
  clock?: Clock;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Parse store content into entries.
 *
 * @throws AppError STORE_CORRUPT when the content is not a map of paths
 *   to non-negative integer timestamps
 */
function parseStore(content: string, location: string): Array<[string, number]> {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new AppError("STORE_CORRUPT", `Access cache ${location} is not valid JSON`, {
      cause: error,
    });
  }

  if (!isRecord(raw)) {
    throw new AppError("STORE_CORRUPT", `Access cache ${location} must be a JSON object`);
  }

  const entries: Array<[string, number]> = [];
  for (const [path, time] of Object.entries(raw)) {
    if (typeof time !== "number" || !Number.isSafeInteger(time) || time < 0) {
      throw new AppError(
        "STORE_CORRUPT",
        `Access cache ${location} has an invalid timestamp for ${path}`
      );
    }
    entries.push([path, time]);
  }
  return entries;
}

/**
 * A RecencyCache backed by a file.
 *
 * Changes are written back by close(). An ephemeral cache has no
 * location and close() writes nothing.
 */
export class AccessCache extends RecencyCache {
  readonly location: string | null;
  private readonly fs: FileSystem;
  private readonly logger: Logger | undefined;
  private dirty: boolean;
  private closed = false;

  private constructor(
    location: string | null,
    capacity: number,
    entries: Array<[string, number]>,
    options: AccessCacheOptions
  ) {
    super(capacity, entries, options.clock);
    this.location = location;
    this.fs = options.fileSystem ?? nodeFileSystem;
    this.logger = options.logger;
    // A store larger than the capacity was trimmed and needs rewriting
    this.dirty = entries.length > this.size;
  }

  /**
   * Load the cache stored at `location`.
   *
   * A missing store yields an empty cache; the file is created on close().
   *
   * @throws AppError STORE_UNREADABLE when the store exists but cannot be read
   * @throws AppError STORE_CORRUPT when the store cannot be parsed
   */
  static async load(
    location: string,
    capacity: number,
    options: AccessCacheOptions = {}
  ): Promise<AccessCache> {
    const fileSystem = options.fileSystem ?? nodeFileSystem;

    if (!(await fileSystem.exists(location))) {
      options.logger?.debug(`No access cache at ${location}, starting empty`);
      return new AccessCache(location, capacity, [], options);
    }

    let content: string;
    try {
      content = await fileSystem.readFile(location);
    } catch (error) {
      throw new AppError("STORE_UNREADABLE", `Could not read access cache ${location}`, {
        cause: error,
      });
    }

    return new AccessCache(location, capacity, parseStore(content, location), options);
  }

  /**
   * An empty cache that is never persisted.
   */
  static loadEphemeral(
    capacity: number,
    options: Pick<AccessCacheOptions, "clock"> = {}
  ): AccessCache {
    return new AccessCache(null, capacity, [], options);
  }

  get isEphemeral(): boolean {
    return this.location === null;
  }

  override registerAccess(path: string): void {
    super.registerAccess(path);
    this.dirty = true;
  }

  /**
   * Write pending changes to the store. Safe to call more than once.
   *
   * A write failure is logged as a warning and does not throw: losing one
   * access record must not fail the command that produced it.
   */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    if (this.location === null || !this.dirty) return;

    try {
      await this.fs.writeFile(this.location, `${JSON.stringify(this.toJSON(), null, 2)}\n`);
      this.dirty = false;
    } catch (error) {
      this.logger?.warn(
        `Could not write access cache ${this.location}: ${describeError(error)}`
      );
    }
  }
}

/**
 * Run `fn` with the cache and close it afterwards, even when `fn` throws.
 */
export async function withAccessCache<T>(
  cache: AccessCache,
  fn: (cache: AccessCache) => Promise<T> | T
): Promise<T> {
  try {
    return await fn(cache);
  } finally {
    await cache.close();
  }
}
