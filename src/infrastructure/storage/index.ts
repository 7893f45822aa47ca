/**
 * Storage Infrastructure
 *
 * Handles persistence of the access cache to the filesystem.
 */

export { AccessCache, withAccessCache } from "./accessCacheStorage";
export type { AccessCacheOptions } from "./accessCacheStorage";
