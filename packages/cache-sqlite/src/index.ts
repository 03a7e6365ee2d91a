import type { CacheStage, DebugSink, Identifier, NameCache } from '@namecache/core'
import {
  InvalidArgumentError,
  SqliteDialect,
  createSerialLock,
  debugEntry,
  defineNameCache,
  foldRows,
  toCacheError,
  withDebugLog,
} from '@namecache/core'
import Database from 'better-sqlite3'

export interface SqliteNameCacheConfig {
  /** Path of the cache file (created if absent), or `':memory:'`. */
  readonly filename: string
  /** How long a statement waits on a file locked by another connection. */
  readonly timeoutMs?: number | undefined
  readonly onDebug?: DebugSink | undefined
}

const dialect = new SqliteDialect()

/**
 * Open (or create) a SQLite cache file and ensure its schema.
 *
 * One connection and one prepared upsert statement are held for the life of
 * the cache; every operation on them runs under a single lock. Throws
 * `CacheError` if the file cannot be opened or initialized, in which case
 * nothing is left open.
 */
export function createSqliteNameCache(config: SqliteNameCacheConfig): NameCache {
  validateConfig(config)
  const debug = config.onDebug
  const t0 = performance.now()

  const db = openDatabase(config)
  const upsert = initialize(db, debug)
  debug?.(debugEntry('open', `Opened ${config.filename}`, performance.now() - t0))

  const lock = createSerialLock()

  return defineNameCache({
    name: 'sqlite',

    async storeAll(entries) {
      await lock(() =>
        withDebugLog(
          debug,
          'upsert',
          (written) => `Upsert (${written} entries)`,
          () => {
            let written = 0
            for (const { identifier, name } of entries) {
              try {
                upsert.run(identifier, name)
              } catch (err) {
                throw toCacheError(err, { backend: 'sqlite', stage: 'upsert', sql: upsert.source, identifier })
              }
              written++
            }
            return written
          },
        ),
      )
    },

    async loadAll(identifiers) {
      return lock(() =>
        withDebugLog(
          debug,
          'lookup',
          (found) => `Lookup (${identifiers.length} ids, ${found.size} found)`,
          () => {
            const result = new Map<Identifier, string>()
            for (const statement of dialect.lookupStatements(identifiers)) {
              try {
                const rows = db.prepare<unknown[], Record<string, unknown>>(statement.sql).all(...statement.params)
                foldRows(rows, result)
              } catch (err) {
                throw toCacheError(err, { backend: 'sqlite', stage: 'lookup', sql: statement.sql })
              }
            }
            return result
          },
        ),
      )
    },

    async ping() {
      await lock(() => {
        try {
          db.prepare('SELECT 1').get()
        } catch (err) {
          throw toCacheError(err, { backend: 'sqlite', stage: 'ping', sql: 'SELECT 1' })
        }
      })
    },

    async close() {
      await lock(() =>
        withDebugLog(
          debug,
          'close',
          () => `Closed ${config.filename}`,
          () => {
            try {
              db.close()
            } catch (err) {
              throw toCacheError(err, { backend: 'sqlite', stage: 'close' })
            }
          },
        ),
      )
    },
  })
}

// --- Open ---

function validateConfig(config: SqliteNameCacheConfig): void {
  if (typeof config.filename !== 'string' || config.filename.length === 0) {
    throw new InvalidArgumentError('filename must be a non-empty path', {
      argument: 'filename',
      actual: String(config.filename),
    })
  }
  if (config.timeoutMs !== undefined && !(Number.isInteger(config.timeoutMs) && config.timeoutMs >= 0)) {
    throw new InvalidArgumentError(`timeoutMs must be a non-negative integer, got ${config.timeoutMs}`, {
      argument: 'timeoutMs',
      actual: String(config.timeoutMs),
    })
  }
}

function openDatabase(config: SqliteNameCacheConfig): Database.Database {
  try {
    return new Database(config.filename, { timeout: config.timeoutMs ?? 5000 })
  } catch (err) {
    throw toCacheError(err, { backend: 'sqlite', stage: openFailureStage(err) })
  }
}

/** A missing or mismatched native binding surfaces as a load error, not a SQLite one. */
function openFailureStage(err: unknown): CacheStage {
  return err instanceof Error && /bindings file|NODE_MODULE_VERSION|dlopen/i.test(err.message) ? 'driver' : 'connect'
}

function initialize(db: Database.Database, debug: DebugSink | undefined): Database.Statement<[string, string]> {
  try {
    ensureSchema(db, debug)
    const sql = dialect.upsertSql()
    try {
      return db.prepare<[string, string]>(sql)
    } catch (err) {
      throw toCacheError(err, { backend: 'sqlite', stage: 'prepare', sql })
    }
  } catch (err) {
    db.close()
    throw err
  }
}

function ensureSchema(db: Database.Database, debug: DebugSink | undefined): void {
  for (const statement of dialect.schemaStatements()) {
    try {
      withDebugLog(
        debug,
        'schema',
        () => statement.sql,
        () => db.exec(statement.sql),
      )
    } catch (err) {
      if (statement.tolerateExisting && isAlreadyExists(err)) continue
      throw toCacheError(err, { backend: 'sqlite', stage: 'schema', sql: statement.sql })
    }
  }
}

function isAlreadyExists(err: unknown): boolean {
  return err instanceof Database.SqliteError && /already exists/i.test(err.message)
}
