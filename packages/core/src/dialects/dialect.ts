import type { Identifier } from '../identifier.js'

export interface SqlStatement {
  readonly sql: string
  readonly params: readonly unknown[]
}

export interface SchemaStatement {
  readonly sql: string
  /** The statement is expected to fail with "already exists" on an initialized store. */
  readonly tolerateExisting: boolean
}

/**
 * SQL for one storage engine. Statements only reference the fixed cache table;
 * identifiers always travel as bound parameters.
 */
export interface CacheDialect {
  readonly name: 'sqlite' | 'postgres'
  schemaStatements(): readonly SchemaStatement[]
  /** Single-row insert-or-replace. Parameters: identifier, name. */
  upsertSql(): string
  /** Membership lookups covering `identifiers`; none for an empty list. */
  lookupStatements(identifiers: readonly Identifier[]): SqlStatement[]
}

export const CACHE_TABLE = 'uuid_cache'
export const NAME_INDEX = 'name_index'
