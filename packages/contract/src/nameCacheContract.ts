import type { NameCache } from '@namecache/core'
import { CacheError, InvalidArgumentError } from '@namecache/core'
import { afterAll, beforeAll, describe, expect, it } from 'vitest'

// ── Fixtures ───────────────────────────────────────────────────

/** Deterministic canonical identifier for test number `n` within `block`. */
export function testIdentifier(block: number, n: number): string {
  const b = block.toString(16).padStart(4, '0')
  const tail = n.toString(16).padStart(12, '0')
  return `0000${b}-0000-4000-8000-${tail}`
}

// ── describeNameCacheContract ──────────────────────────────────

/**
 * Parameterized contract test suite.
 * Verifies that any `NameCache` implementation behaves the same way.
 *
 * Usage:
 * ```ts
 * describeNameCacheContract('sqlite', () => createSqliteNameCache({ filename: ':memory:' }))
 * ```
 */
export function describeNameCacheContract(name: string, factory: () => NameCache | Promise<NameCache>): void {
  describe(`NameCacheContract: ${name}`, () => {
    let cache: NameCache

    beforeAll(async () => {
      cache = await factory()
    })

    afterAll(async () => {
      await cache?.close()
    })

    it('C100: entries written by putAll are read back by getAllPresent', async () => {
      const entries = new Map([
        [testIdentifier(1, 1), 'Alice'],
        [testIdentifier(1, 2), 'Bob'],
        [testIdentifier(1, 3), 'Carol'],
      ])
      await cache.putAll(entries)
      const found = await cache.getAllPresent(entries.keys())
      expect(found).toEqual(entries)
    })

    it('C101: missing identifiers are omitted, not errors', async () => {
      const [id1, id2, id3] = [testIdentifier(2, 1), testIdentifier(2, 2), testIdentifier(2, 3)]
      await cache.putAll({ [id1]: 'Alice', [id2]: 'Bob' })
      const found = await cache.getAllPresent([id1, id2, id3])
      expect(found.size).toBe(2)
      expect(found.get(id1)).toBe('Alice')
      expect(found.get(id2)).toBe('Bob')
      expect(found.has(id3)).toBe(false)
    })

    it('C102: later writes replace the name', async () => {
      const id = testIdentifier(3, 1)
      await cache.put(id, 'Notch')
      await cache.put(id, 'jeb_')
      expect(await cache.getAllPresent([id])).toEqual(new Map([[id, 'jeb_']]))
    })

    it('C103: rewriting the same name is observably a no-op', async () => {
      const id = testIdentifier(4, 1)
      await cache.put(id, 'Dinnerbone')
      await cache.put(id, 'Dinnerbone')
      expect(await cache.getAllPresent([id])).toEqual(new Map([[id, 'Dinnerbone']]))
    })

    it('C104: empty lookup resolves to an empty map', async () => {
      const found = await cache.getAllPresent([])
      expect(found.size).toBe(0)
    })

    it('C105: empty write resolves', async () => {
      await expect(cache.putAll(new Map())).resolves.toBeUndefined()
      await expect(cache.putAll({})).resolves.toBeUndefined()
    })

    it('C106: null identifier in a lookup rejects with InvalidArgumentError', async () => {
      const ids = [testIdentifier(5, 1), null as unknown as string]
      await expect(cache.getAllPresent(ids)).rejects.toThrow(InvalidArgumentError)
    })

    it('C107: null identifier in a write rejects and writes nothing', async () => {
      const valid = testIdentifier(6, 1)
      const entries = new Map([
        [valid, 'Alice'],
        [null as unknown as string, 'Bob'],
      ])
      await expect(cache.putAll(entries)).rejects.toThrow(InvalidArgumentError)
      expect((await cache.getAllPresent([valid])).size).toBe(0)
    })

    it('C108: malformed identifier rejects with InvalidArgumentError', async () => {
      try {
        await cache.getAllPresent(["' OR 1=1 --"])
        expect.fail('Expected InvalidArgumentError')
      } catch (err) {
        expect(err).toBeInstanceOf(InvalidArgumentError)
        if (err instanceof InvalidArgumentError) {
          expect(err.code).toBe('INVALID_ARGUMENT')
          expect(err.details).toEqual({ argument: 'identifiers', index: 0, actual: "'' OR 1=1 --'" })
        }
      }
    })

    it('C109: non-string name rejects with InvalidArgumentError', async () => {
      const id = testIdentifier(7, 1)
      await expect(cache.putAll({ [id]: 42 as unknown as string })).rejects.toThrow(InvalidArgumentError)
    })

    it('C110: identifiers are case-insensitive and returned in lower case', async () => {
      const id = 'ABCDEF01-2345-4678-89AB-CDEF01234567'
      await cache.put(id, 'Grumm')
      const found = await cache.getAllPresent([id])
      expect(found).toEqual(new Map([[id.toLowerCase(), 'Grumm']]))
      expect(await cache.getIfPresent(id.toLowerCase())).toBe('Grumm')
    })

    it('C111: duplicate identifiers in a lookup yield one entry', async () => {
      const id = testIdentifier(8, 1)
      await cache.put(id, 'Alice')
      const found = await cache.getAllPresent([id, id, id.toUpperCase()])
      expect(found).toEqual(new Map([[id, 'Alice']]))
    })

    it('C112: getIfPresent returns undefined for an unknown identifier', async () => {
      expect(await cache.getIfPresent(testIdentifier(9, 1))).toBeUndefined()
    })

    it('C113: returned maps are snapshots', async () => {
      const id = testIdentifier(10, 1)
      await cache.put(id, 'before')
      const first = await cache.getAllPresent([id])
      await cache.put(id, 'after')
      expect(first.get(id)).toBe('before')
      expect(await cache.getIfPresent(id)).toBe('after')
    })

    it('C114: concurrent writes and reads all succeed', async () => {
      const ids = Array.from({ length: 20 }, (_, i) => testIdentifier(11, i))
      const ops: Promise<unknown>[] = []
      for (const [i, id] of ids.entries()) {
        ops.push(cache.putAll({ [id]: `name${i}` }))
        ops.push(cache.getAllPresent(ids))
      }
      await expect(Promise.all(ops)).resolves.toHaveLength(40)

      const found = await cache.getAllPresent(ids)
      expect(found.size).toBe(20)
      expect(found.get(ids[7] ?? '')).toBe('name7')
    })

    it('C115: ping() resolves for an open cache', async () => {
      await expect(cache.ping()).resolves.toBeUndefined()
    })

    it('C116: operations after close() reject with CacheError', async () => {
      const temp = await factory()
      await temp.close()
      try {
        await temp.getAllPresent([testIdentifier(12, 1)])
        expect.fail('Expected CacheError')
      } catch (err) {
        expect(err).toBeInstanceOf(CacheError)
        if (err instanceof CacheError) {
          expect(err.code).toBe('CACHE_FAILED')
          expect(err.details.stage).toBe('closed')
        }
      }
      await expect(temp.putAll({ [testIdentifier(12, 2)]: 'x' })).rejects.toThrow(CacheError)
      await expect(temp.close()).resolves.toBeUndefined()
    })
  })
}
