import type { Identifier } from '../identifier.js'
import { requireIdentifier } from '../identifier.js'
import type { CacheDialect, SchemaStatement, SqlStatement } from './dialect.js'
import { CACHE_TABLE, NAME_INDEX } from './dialect.js'

// --- Postgres Dialect ---

export class PostgresDialect implements CacheDialect {
  readonly name = 'postgres'

  schemaStatements(): readonly SchemaStatement[] {
    // name stays TEXT: Postgres would enforce a CHAR(32) width
    return [
      {
        sql: `CREATE TABLE IF NOT EXISTS "${CACHE_TABLE}" ("uuid" CHAR(36) PRIMARY KEY NOT NULL, "name" TEXT NOT NULL)`,
        tolerateExisting: false,
      },
      { sql: `CREATE INDEX "${NAME_INDEX}" ON "${CACHE_TABLE}" ("name")`, tolerateExisting: true },
    ]
  }

  upsertSql(): string {
    return (
      `INSERT INTO "${CACHE_TABLE}" ("uuid", "name") VALUES ($1, $2) ` +
      `ON CONFLICT ("uuid") DO UPDATE SET "name" = EXCLUDED."name"`
    )
  }

  lookupStatements(identifiers: readonly Identifier[]): SqlStatement[] {
    if (identifiers.length === 0) return []
    const params = identifiers.map((id, i) => requireIdentifier(id, 'identifiers', i))
    return [
      {
        sql: `SELECT "name", "uuid" FROM "${CACHE_TABLE}" WHERE "uuid" = ANY($1::text[])`,
        params: [params],
      },
    ]
  }
}
