import type { Identifier } from '../identifier.js'
import { requireIdentifier } from '../identifier.js'
import type { CacheDialect, SchemaStatement, SqlStatement } from './dialect.js'
import { CACHE_TABLE, NAME_INDEX } from './dialect.js'

/** SQLite's default SQLITE_MAX_VARIABLE_NUMBER before 3.32. */
export const SQLITE_MAX_PARAMS = 999

// --- SQLite Dialect ---

export class SqliteDialect implements CacheDialect {
  readonly name = 'sqlite'
  private readonly maxParams: number

  constructor(maxParams: number = SQLITE_MAX_PARAMS) {
    this.maxParams = maxParams
  }

  schemaStatements(): readonly SchemaStatement[] {
    return [
      {
        sql: `CREATE TABLE IF NOT EXISTS ${CACHE_TABLE} (uuid CHAR(36) PRIMARY KEY NOT NULL, name CHAR(32) NOT NULL)`,
        tolerateExisting: false,
      },
      { sql: `CREATE INDEX ${NAME_INDEX} ON ${CACHE_TABLE} (name)`, tolerateExisting: true },
    ]
  }

  upsertSql(): string {
    return `INSERT OR REPLACE INTO ${CACHE_TABLE} (uuid, name) VALUES (?, ?)`
  }

  lookupStatements(identifiers: readonly Identifier[]): SqlStatement[] {
    const params = identifiers.map((id, i) => requireIdentifier(id, 'identifiers', i))
    const statements: SqlStatement[] = []
    for (let start = 0; start < params.length; start += this.maxParams) {
      const chunk = params.slice(start, start + this.maxParams)
      statements.push({
        sql: `SELECT name, uuid FROM ${CACHE_TABLE} WHERE uuid IN (${chunk.map(() => '?').join(', ')})`,
        params: chunk,
      })
    }
    return statements
  }
}
