import { CacheError } from './errors.js'
import type { EntryInput, Identifier } from './identifier.js'
import { normalizeEntries, normalizeIdentifiers, requireIdentifier } from './identifier.js'
import type { NameCache, NameCacheBackend } from './types/interfaces.js'

/**
 * Build a `NameCache` on top of a storage backend.
 *
 * Shared by every implementation: whole-batch validation, lower-casing,
 * empty-batch short-circuits, the single-entry conveniences and the closed
 * state. The backend only ever sees non-empty, canonical batches.
 */
export function defineNameCache(backend: NameCacheBackend): NameCache {
  let closed = false

  function ensureOpen(): void {
    if (closed) {
      throw new CacheError({ backend: backend.name, stage: 'closed' })
    }
  }

  const cache: NameCache = {
    async putAll(entries: EntryInput): Promise<void> {
      const list = normalizeEntries(entries)
      ensureOpen()
      if (list.length === 0) return
      await backend.storeAll(list)
    },

    async getAllPresent(identifiers: Iterable<Identifier>): Promise<ReadonlyMap<Identifier, string>> {
      const ids = normalizeIdentifiers(identifiers)
      ensureOpen()
      if (ids.length === 0) return new Map()
      return backend.loadAll(ids)
    },

    async put(identifier: Identifier, name: string): Promise<void> {
      await cache.putAll(new Map([[identifier, name]]))
    },

    async getIfPresent(identifier: Identifier): Promise<string | undefined> {
      const id = requireIdentifier(identifier, 'identifier')
      const found = await cache.getAllPresent([id])
      return found.get(id)
    },

    async ping(): Promise<void> {
      ensureOpen()
      await backend.ping()
    },

    async close(): Promise<void> {
      if (closed) return
      closed = true
      try {
        await backend.close()
      } catch (err) {
        // Still open: a later close() retries
        closed = false
        throw err
      }
    },
  }

  return cache
}
