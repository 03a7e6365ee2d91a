// Debug log
export type { DebugLogEntry, DebugPhase, DebugSink } from './debug/logger.js'
export { debugEntry, withDebugLog } from './debug/logger.js'
// Dialects
export type { CacheDialect, SchemaStatement, SqlStatement } from './dialects/dialect.js'
export { CACHE_TABLE, NAME_INDEX } from './dialects/dialect.js'
export { PostgresDialect } from './dialects/postgres.js'
export { SQLITE_MAX_PARAMS, SqliteDialect } from './dialects/sqlite.js'
// Errors
export type { CacheBackendName, CacheErrorDetails, CacheStage, InvalidArgumentDetails } from './errors.js'
export { CacheError, InvalidArgumentError, NameCacheError, toCacheError } from './errors.js'
// Result folding
export { foldRows } from './generator/rows.js'
// Identifiers
export type { CacheEntry, EntryInput, Identifier } from './identifier.js'
export { isIdentifier, normalizeEntries, normalizeIdentifiers, requireIdentifier } from './identifier.js'
// Serial lock
export type { SerialLock } from './lock.js'
export { createSerialLock } from './lock.js'
// In-memory cache
export { createMemoryNameCache } from './memory.js'
// Facade
export { defineNameCache } from './nameCache.js'
// Public interfaces
export type { NameCache, NameCacheBackend } from './types/interfaces.js'
