import type { Identifier } from './identifier.js'
import { defineNameCache } from './nameCache.js'
import type { NameCache } from './types/interfaces.js'

/** `Map`-backed cache. Nothing survives the process. */
export function createMemoryNameCache(): NameCache {
  const store = new Map<Identifier, string>()

  return defineNameCache({
    name: 'memory',

    async storeAll(entries) {
      for (const { identifier, name } of entries) {
        store.set(identifier, name)
      }
    },

    async loadAll(identifiers) {
      const result = new Map<Identifier, string>()
      for (const id of identifiers) {
        const name = store.get(id)
        if (name !== undefined) result.set(id, name)
      }
      return result
    },

    async ping() {},

    async close() {
      store.clear()
    },
  })
}
