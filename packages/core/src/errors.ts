// --- Base Error ---

export class NameCacheError extends Error {
  readonly code: string

  constructor(code: string, message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'NameCacheError'
    this.code = code
  }

  toJSON(): Record<string, unknown> {
    const json: Record<string, unknown> = {
      code: this.code,
      message: this.message,
    }
    if (this.cause !== undefined) {
      json.cause = causeToJSON(this.cause)
    }
    return json
  }
}

// --- Cache Error ---

export type CacheBackendName = 'memory' | 'sqlite' | 'postgres' | 'redis'

export type CacheStage =
  | 'driver'
  | 'connect'
  | 'schema'
  | 'prepare'
  | 'lookup'
  | 'upsert'
  | 'ping'
  | 'close'
  | 'closed'

export interface CacheErrorDetails {
  backend: CacheBackendName
  stage: CacheStage
  sql?: string | undefined
  identifier?: string | undefined
}

/**
 * Every storage-layer failure. The stage tells driver, connection, schema and
 * query failures apart; the wrapped `cause` keeps the driver's own error.
 */
export class CacheError extends NameCacheError {
  declare readonly code: 'CACHE_FAILED'
  readonly details: CacheErrorDetails

  constructor(details: CacheErrorDetails, cause?: Error | undefined) {
    super('CACHE_FAILED', defaultCacheMessage(details), cause ? { cause } : undefined)
    this.name = 'CacheError'
    this.details = details
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      details: this.details,
    }
  }
}

// --- Invalid Argument Error ---

export interface InvalidArgumentDetails {
  argument: string
  index?: number | undefined
  actual?: string | undefined
}

export class InvalidArgumentError extends NameCacheError {
  declare readonly code: 'INVALID_ARGUMENT'
  readonly details: InvalidArgumentDetails

  constructor(message: string, details: InvalidArgumentDetails) {
    super('INVALID_ARGUMENT', message)
    this.name = 'InvalidArgumentError'
    this.details = details
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      details: this.details,
    }
  }
}

// --- Helpers ---

/** Wrap any thrown value as a `CacheError`; existing `CacheError`s pass through unchanged. */
export function toCacheError(err: unknown, details: CacheErrorDetails): CacheError {
  if (err instanceof CacheError) return err
  const cause = err instanceof Error ? err : new Error(String(err))
  return new CacheError(details, cause)
}

/** Driver errors keep their own `code` (SQLSTATE, `SQLITE_*`, errno) in the serialized chain. */
function causeToJSON(cause: unknown): unknown {
  if (cause instanceof NameCacheError) return cause.toJSON()
  if (!(cause instanceof Error)) return cause

  const json: Record<string, unknown> = { name: cause.name, message: cause.message }
  if ('code' in cause && typeof cause.code === 'string') json.code = cause.code
  if (cause.cause !== undefined) json.cause = causeToJSON(cause.cause)
  return json
}

function defaultCacheMessage(details: CacheErrorDetails): string {
  const { backend } = details
  switch (details.stage) {
    case 'driver':
      return `The ${backend} driver is not available`
    case 'connect':
      return `Failed to connect to ${backend} cache store`
    case 'schema':
      return `Failed to create ${backend} cache schema`
    case 'prepare':
      return `Failed to prepare ${backend} cache statements`
    case 'lookup':
      return `Lookup failed on ${backend} cache store`
    case 'upsert':
      return details.identifier !== undefined
        ? `Upsert failed on ${backend} cache store at ${details.identifier}`
        : `Upsert failed on ${backend} cache store`
    case 'ping':
      return `The ${backend} cache store is unreachable`
    case 'close':
      return `Failed to close ${backend} cache store`
    case 'closed':
      return `The ${backend} cache store is closed`
  }
}
