import type { CacheBackendName } from '../errors.js'
import type { CacheEntry, EntryInput, Identifier } from '../identifier.js'

// --- NameCache (implemented by every cache package) ---

/**
 * Identifier→name cache.
 *
 * Error contract:
 * - Malformed input rejects with `InvalidArgumentError` before any storage access.
 * - Every storage failure rejects with `CacheError`. Missing identifiers are not failures.
 * - `putAll()` is not atomic across entries: a failure can leave a prefix of the batch written.
 */
export interface NameCache {
  putAll(entries: EntryInput): Promise<void>
  getAllPresent(identifiers: Iterable<Identifier>): Promise<ReadonlyMap<Identifier, string>>
  put(identifier: Identifier, name: string): Promise<void>
  getIfPresent(identifier: Identifier): Promise<string | undefined>
  ping(): Promise<void>
  close(): Promise<void>
}

// --- NameCacheBackend (wrapped by defineNameCache) ---

/**
 * Storage half of a `NameCache`. Receives validated, lower-cased, non-empty
 * batches and is never called again once `close()` has been requested.
 */
export interface NameCacheBackend {
  readonly name: CacheBackendName
  storeAll(entries: readonly CacheEntry[]): Promise<void>
  loadAll(identifiers: readonly Identifier[]): Promise<Map<Identifier, string>>
  ping(): Promise<void>
  close(): Promise<void>
}
