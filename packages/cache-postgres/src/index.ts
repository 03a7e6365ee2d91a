import type { ConnectionOptions } from 'node:tls'
import type { DebugSink, Identifier, NameCache } from '@namecache/core'
import {
  InvalidArgumentError,
  PostgresDialect,
  createSerialLock,
  debugEntry,
  defineNameCache,
  foldRows,
  toCacheError,
} from '@namecache/core'
import type { Pool } from 'pg'
import pg from 'pg'

export interface PostgresNameCacheConfig {
  readonly connectionString?: string | undefined
  readonly host?: string | undefined
  readonly port?: number | undefined
  readonly database?: string | undefined
  readonly user?: string | undefined
  readonly password?: string | undefined
  readonly ssl?: boolean | ConnectionOptions | undefined
  readonly timeoutMs?: number | undefined
  readonly onDebug?: DebugSink | undefined
}

const dialect = new PostgresDialect()

/** Server-side name of the prepared upsert; pg prepares it once per connection. */
const UPSERT_STATEMENT = 'namecache_upsert'

/** SQLSTATE duplicate_table, raised for an existing index as well. */
const DUPLICATE_RELATION = '42P07'

export async function createPostgresNameCache(config: PostgresNameCacheConfig): Promise<NameCache> {
  validateConfig(config)
  const debug = config.onDebug
  const t0 = Date.now()

  // One connection, so the prepared upsert is reused and calls never overlap
  const pool = new pg.Pool({
    connectionString: config.connectionString,
    host: config.host,
    port: config.port,
    database: config.database,
    user: config.user,
    password: config.password,
    ssl: config.ssl,
    max: 1,
    statement_timeout: config.timeoutMs,
  })
  // pg-pool evicts an idle client whose connection drops; the next query reconnects or rejects on its own
  pool.on('error', (err: Error) => {
    debug?.(debugEntry('error', `Idle client error: ${err.message}`, 0))
  })

  try {
    await ensureSchema(pool, debug)
  } catch (err) {
    await pool.end()
    throw err
  }
  debug?.(debugEntry('open', 'Connected to postgres', Date.now() - t0))

  const lock = createSerialLock()
  const upsertSql = dialect.upsertSql()

  return defineNameCache({
    name: 'postgres',

    async storeAll(entries) {
      await lock(async () => {
        const t1 = Date.now()
        for (const { identifier, name } of entries) {
          try {
            await pool.query({ name: UPSERT_STATEMENT, text: upsertSql, values: [identifier, name] })
          } catch (err) {
            throw toCacheError(err, { backend: 'postgres', stage: 'upsert', sql: upsertSql, identifier })
          }
        }
        debug?.(debugEntry('upsert', `Upsert (${entries.length} entries)`, Date.now() - t1))
      })
    },

    async loadAll(identifiers) {
      return lock(async () => {
        const t1 = Date.now()
        const result = new Map<Identifier, string>()
        for (const statement of dialect.lookupStatements(identifiers)) {
          try {
            const { rows } = await pool.query<Record<string, unknown>>(statement.sql, [...statement.params])
            foldRows(rows, result)
          } catch (err) {
            throw toCacheError(err, { backend: 'postgres', stage: 'lookup', sql: statement.sql })
          }
        }
        debug?.(debugEntry('lookup', `Lookup (${identifiers.length} ids, ${result.size} found)`, Date.now() - t1))
        return result
      })
    },

    async ping() {
      await lock(async () => {
        try {
          await pool.query('SELECT 1')
        } catch (err) {
          throw toCacheError(err, { backend: 'postgres', stage: 'ping', sql: 'SELECT 1' })
        }
      })
    },

    async close() {
      await lock(async () => {
        const t1 = Date.now()
        try {
          await pool.end()
        } catch (err) {
          throw toCacheError(err, { backend: 'postgres', stage: 'close' })
        }
        debug?.(debugEntry('close', 'Closed postgres pool', Date.now() - t1))
      })
    },
  })
}

// --- Open ---

function validateConfig(config: PostgresNameCacheConfig): void {
  if (config.timeoutMs !== undefined && !(Number.isInteger(config.timeoutMs) && config.timeoutMs > 0)) {
    throw new InvalidArgumentError(`timeoutMs must be a positive integer, got ${config.timeoutMs}`, {
      argument: 'timeoutMs',
      actual: String(config.timeoutMs),
    })
  }
}

async function ensureSchema(pool: Pool, debug: DebugSink | undefined): Promise<void> {
  const client = await pool.connect().catch((err: unknown) => {
    throw toCacheError(err, { backend: 'postgres', stage: 'connect' })
  })

  try {
    for (const statement of dialect.schemaStatements()) {
      const t0 = Date.now()
      try {
        await client.query(statement.sql)
      } catch (err) {
        if (statement.tolerateExisting && isAlreadyExists(err)) continue
        throw toCacheError(err, { backend: 'postgres', stage: 'schema', sql: statement.sql })
      }
      debug?.(debugEntry('schema', statement.sql, Date.now() - t0))
    }
  } finally {
    client.release()
  }
}

function isAlreadyExists(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === DUPLICATE_RELATION
}
