import { describe, expect, it } from 'vitest'
import { PostgresDialect } from '../src/dialects/postgres.js'
import { SqliteDialect } from '../src/dialects/sqlite.js'
import { InvalidArgumentError } from '../src/errors.js'
import { foldRows } from '../src/generator/rows.js'

const ID1 = '069a79f4-44e9-4726-a5be-fca90e38aaf5'
const ID2 = '61699b2e-d327-4a01-9f1e-0ea8c3f06bc6'
const ID3 = '853c80ef-3c37-49fd-aa49-938b674adae6'

describe('SqliteDialect', () => {
  const dialect = new SqliteDialect()

  it('creates the table then the name index', () => {
    expect(dialect.schemaStatements()).toEqual([
      {
        sql: 'CREATE TABLE IF NOT EXISTS uuid_cache (uuid CHAR(36) PRIMARY KEY NOT NULL, name CHAR(32) NOT NULL)',
        tolerateExisting: false,
      },
      { sql: 'CREATE INDEX name_index ON uuid_cache (name)', tolerateExisting: true },
    ])
  })

  it('upserts with INSERT OR REPLACE', () => {
    expect(dialect.upsertSql()).toBe('INSERT OR REPLACE INTO uuid_cache (uuid, name) VALUES (?, ?)')
  })

  it('binds every identifier into one IN predicate', () => {
    expect(dialect.lookupStatements([ID1, ID2])).toEqual([
      { sql: 'SELECT name, uuid FROM uuid_cache WHERE uuid IN (?, ?)', params: [ID1, ID2] },
    ])
  })

  it('emits no statement for an empty batch', () => {
    expect(dialect.lookupStatements([])).toEqual([])
  })

  it('splits batches above the parameter limit', () => {
    const small = new SqliteDialect(2)
    expect(small.lookupStatements([ID1, ID2, ID3])).toEqual([
      { sql: 'SELECT name, uuid FROM uuid_cache WHERE uuid IN (?, ?)', params: [ID1, ID2] },
      { sql: 'SELECT name, uuid FROM uuid_cache WHERE uuid IN (?)', params: [ID3] },
    ])
  })

  it('rejects a malformed identifier before building SQL', () => {
    expect(() => dialect.lookupStatements([ID1, "x') OR ('1'='1"])).toThrow(InvalidArgumentError)
  })
})

describe('PostgresDialect', () => {
  const dialect = new PostgresDialect()

  it('keeps name unbounded and tolerates an existing index', () => {
    expect(dialect.schemaStatements()).toEqual([
      {
        sql: 'CREATE TABLE IF NOT EXISTS "uuid_cache" ("uuid" CHAR(36) PRIMARY KEY NOT NULL, "name" TEXT NOT NULL)',
        tolerateExisting: false,
      },
      { sql: 'CREATE INDEX "name_index" ON "uuid_cache" ("name")', tolerateExisting: true },
    ])
  })

  it('upserts with ON CONFLICT', () => {
    expect(dialect.upsertSql()).toBe(
      'INSERT INTO "uuid_cache" ("uuid", "name") VALUES ($1, $2) ON CONFLICT ("uuid") DO UPDATE SET "name" = EXCLUDED."name"',
    )
  })

  it('passes the whole batch as one array parameter', () => {
    expect(dialect.lookupStatements([ID1, ID2.toUpperCase()])).toEqual([
      { sql: 'SELECT "name", "uuid" FROM "uuid_cache" WHERE "uuid" = ANY($1::text[])', params: [[ID1, ID2]] },
    ])
  })

  it('emits no statement for an empty batch', () => {
    expect(dialect.lookupStatements([])).toEqual([])
  })
})

describe('foldRows', () => {
  it('keys names by lower-cased identifier', () => {
    const rows = [
      { name: 'Alice', uuid: ID1.toUpperCase() },
      { name: 'Bob', uuid: ID2 },
    ]
    expect(foldRows(rows)).toEqual(
      new Map([
        [ID1, 'Alice'],
        [ID2, 'Bob'],
      ]),
    )
  })

  it('appends into an existing map', () => {
    const into = new Map([[ID1, 'Alice']])
    const result = foldRows([{ name: 'Bob', uuid: ID2 }], into)
    expect(result).toBe(into)
    expect(result.size).toBe(2)
  })

  it('returns an empty map for no rows', () => {
    expect(foldRows([]).size).toBe(0)
  })

  it('throws on a row without string columns', () => {
    expect(() => foldRows([{ name: null, uuid: ID1 }])).toThrow('Unexpected cache row shape: uuid=string, name=object')
  })
})
