import type { DebugSink, Identifier, NameCache } from '@namecache/core'
import { InvalidArgumentError, debugEntry, defineNameCache, toCacheError } from '@namecache/core'
import type { RedisOptions } from 'ioredis'
import { Redis } from 'ioredis'

export interface RedisNameCacheConfig {
  readonly url?: string | undefined
  readonly host?: string | undefined
  readonly port?: number | undefined
  readonly password?: string | undefined
  readonly db?: number | undefined
  /** Prepended to every identifier to form its key. Defaults to `uuid_cache:`. */
  readonly keyPrefix?: string | undefined
  readonly onDebug?: DebugSink | undefined
}

export const DEFAULT_KEY_PREFIX = 'uuid_cache:'

/**
 * Cache entries as plain string keys. A lookup is one MGET and a write is one
 * MSET, which the server applies atomically. Redis runs a connection's
 * commands in order, so no client-side lock is needed.
 */
export function createRedisNameCache(config: RedisNameCacheConfig): NameCache {
  const keyPrefix = config.keyPrefix ?? DEFAULT_KEY_PREFIX
  if (keyPrefix.length === 0) {
    throw new InvalidArgumentError('keyPrefix must not be empty', { argument: 'keyPrefix', actual: "''" })
  }

  const options: RedisOptions = { keyPrefix }
  if (config.password !== undefined) options.password = config.password
  if (config.db !== undefined) options.db = config.db

  const redis =
    config.url !== undefined
      ? new Redis(config.url, options)
      : new Redis({ ...options, host: config.host ?? 'localhost', port: config.port ?? 6379 })

  // ioredis reconnects by itself; commands issued meanwhile reject with their own errors
  redis.on('error', (err: Error) => {
    config.onDebug?.(debugEntry('error', `Connection error: ${err.message}`, 0))
  })

  return defineNameCache({
    name: 'redis',

    async storeAll(entries) {
      const keyValues: string[] = []
      for (const { identifier, name } of entries) {
        keyValues.push(identifier, name)
      }
      try {
        await redis.mset(...keyValues)
      } catch (err) {
        throw toCacheError(err, { backend: 'redis', stage: 'upsert' })
      }
    },

    async loadAll(identifiers) {
      let values: (string | null)[]
      try {
        values = await redis.mget(...identifiers)
      } catch (err) {
        throw toCacheError(err, { backend: 'redis', stage: 'lookup' })
      }

      const result = new Map<Identifier, string>()
      for (let i = 0; i < identifiers.length; i++) {
        const id = identifiers[i]
        const name = values[i]
        if (id !== undefined && name !== null && name !== undefined) {
          result.set(id, name)
        }
      }
      return result
    },

    async ping(): Promise<void> {
      try {
        await redis.ping()
      } catch (err) {
        throw toCacheError(err, { backend: 'redis', stage: 'ping' })
      }
    },

    async close(): Promise<void> {
      try {
        await redis.quit()
      } catch (err) {
        throw toCacheError(err, { backend: 'redis', stage: 'close' })
      }
    },
  })
}
