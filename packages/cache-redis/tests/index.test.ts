import type { DebugLogEntry } from '@namecache/core'
import { CacheError, InvalidArgumentError } from '@namecache/core'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { DEFAULT_KEY_PREFIX, createRedisNameCache } from '../src/index.js'

// ── Mock ioredis ───────────────────────────────────────────────

const mockConstruct = vi.fn()
const mockMset = vi.fn()
const mockMget = vi.fn()
const mockPing = vi.fn()
const mockQuit = vi.fn()
const mockOn = vi.fn()

vi.mock('ioredis', () => ({
  Redis: class {
    mset = mockMset
    mget = mockMget
    ping = mockPing
    quit = mockQuit
    on = mockOn

    constructor(...args: unknown[]) {
      mockConstruct(...args)
    }
  },
}))

const ID1 = '069a79f4-44e9-4726-a5be-fca90e38aaf5'
const ID2 = '61699b2e-d327-4a01-9f1e-0ea8c3f06bc6'
const ID3 = '853c80ef-3c37-49fd-aa49-938b674adae6'

// ── Tests ──────────────────────────────────────────────────────

describe('cache-redis', () => {
  beforeEach(() => {
    mockMset.mockResolvedValue('OK')
    mockMget.mockResolvedValue([])
    mockPing.mockResolvedValue('PONG')
    mockQuit.mockResolvedValue('OK')
  })

  afterEach(() => {
    vi.resetAllMocks()
  })

  describe('config', () => {
    it('connects to localhost:6379 with the default prefix', () => {
      createRedisNameCache({})

      expect(DEFAULT_KEY_PREFIX).toBe('uuid_cache:')
      expect(mockConstruct).toHaveBeenCalledWith({ keyPrefix: 'uuid_cache:', host: 'localhost', port: 6379 })
    })

    it('passes the url with prefix, password and db', () => {
      createRedisNameCache({ url: 'redis://cache:6379', keyPrefix: 'names:', password: 'test-secret', db: 2 })

      expect(mockConstruct).toHaveBeenCalledWith('redis://cache:6379', {
        keyPrefix: 'names:',
        password: 'test-secret',
        db: 2,
      })
    })

    it('rejects an empty prefix before connecting', () => {
      expect(() => createRedisNameCache({ keyPrefix: '' })).toThrow(InvalidArgumentError)
      expect(mockConstruct).not.toHaveBeenCalled()
    })
  })

  describe('connection errors', () => {
    it('reports client errors to the debug sink without throwing', () => {
      const entries: DebugLogEntry[] = []
      createRedisNameCache({ onDebug: (e) => entries.push(e) })

      expect(mockOn).toHaveBeenCalledWith('error', expect.any(Function))
      const onError = mockOn.mock.calls.find(([event]) => event === 'error')?.[1]
      expect(() => onError(new Error('connect ECONNREFUSED 127.0.0.1:6379'))).not.toThrow()
      expect(entries).toHaveLength(1)
      expect(entries[0]?.phase).toBe('error')
      expect(entries[0]?.message).toBe('Connection error: connect ECONNREFUSED 127.0.0.1:6379 (0.0ms)')
    })

    it('client errors are ignored without a debug sink', () => {
      createRedisNameCache({})

      const onError = mockOn.mock.calls.find(([event]) => event === 'error')?.[1]
      expect(() => onError(new Error('read ECONNRESET'))).not.toThrow()
    })
  })

  describe('putAll', () => {
    it('writes the whole batch with one MSET in input order', async () => {
      const cache = createRedisNameCache({})

      await cache.putAll(
        new Map([
          [ID2.toUpperCase(), 'Bob'],
          [ID1, 'Alice'],
        ]),
      )

      expect(mockMset).toHaveBeenCalledTimes(1)
      expect(mockMset).toHaveBeenCalledWith(ID2, 'Bob', ID1, 'Alice')
    })

    it('empty batch issues no command', async () => {
      const cache = createRedisNameCache({})

      await cache.putAll({})

      expect(mockMset).not.toHaveBeenCalled()
    })

    it('MSET failure rejects with CacheError (upsert)', async () => {
      const cache = createRedisNameCache({})
      mockMset.mockRejectedValueOnce(new Error('OOM command not allowed when used memory > maxmemory'))

      try {
        await cache.put(ID1, 'Alice')
        expect.fail('Expected CacheError')
      } catch (err) {
        expect(err).toBeInstanceOf(CacheError)
        const e = err as CacheError
        expect(e.message).toBe('Upsert failed on redis cache store')
        expect(e.details).toEqual({ backend: 'redis', stage: 'upsert' })
        expect((e.cause as Error).message).toBe('OOM command not allowed when used memory > maxmemory')
      }
    })
  })

  describe('getAllPresent', () => {
    it('reads the batch with one MGET and omits missing keys', async () => {
      const cache = createRedisNameCache({})
      mockMget.mockResolvedValueOnce(['Alice', null, 'Carol'])

      const found = await cache.getAllPresent([ID1, ID2, ID3])

      expect(mockMget).toHaveBeenCalledTimes(1)
      expect(mockMget).toHaveBeenCalledWith(ID1, ID2, ID3)
      expect(found).toEqual(
        new Map([
          [ID1, 'Alice'],
          [ID3, 'Carol'],
        ]),
      )
    })

    it('sends each identifier once, lower-cased', async () => {
      const cache = createRedisNameCache({})
      mockMget.mockResolvedValueOnce([null])

      await cache.getAllPresent([ID1.toUpperCase(), ID1])

      expect(mockMget).toHaveBeenCalledWith(ID1)
    })

    it('empty batch issues no command', async () => {
      const cache = createRedisNameCache({})

      expect((await cache.getAllPresent([])).size).toBe(0)
      expect(mockMget).not.toHaveBeenCalled()
    })

    it('MGET failure rejects with CacheError (lookup)', async () => {
      const cache = createRedisNameCache({})
      mockMget.mockRejectedValueOnce(new Error('Connection is closed.'))

      await expect(cache.getAllPresent([ID1])).rejects.toThrow('Lookup failed on redis cache store')
    })
  })

  describe('ping and close', () => {
    it('ping failure rejects with CacheError (ping)', async () => {
      const cache = createRedisNameCache({})
      mockPing.mockRejectedValueOnce(new Error('connect ECONNREFUSED 127.0.0.1:6379'))

      await expect(cache.ping()).rejects.toThrow('The redis cache store is unreachable')
    })

    it('close quits once and later calls reject', async () => {
      const cache = createRedisNameCache({})

      await cache.close()
      await cache.close()

      expect(mockQuit).toHaveBeenCalledTimes(1)
      await expect(cache.put(ID1, 'Alice')).rejects.toThrow('The redis cache store is closed')
      expect(mockMset).not.toHaveBeenCalled()
    })
  })
})
