import { InvalidArgumentError } from './errors.js'

/** Canonical hyphenated UUID string, compared and stored in lower case. */
export type Identifier = string

/** Writes accept either a `Map` or a plain object keyed by identifier. */
export type EntryInput = ReadonlyMap<Identifier, string> | Readonly<Record<Identifier, string>>

export interface CacheEntry {
  readonly identifier: Identifier
  readonly name: string
}

// --- Identifier Validation ---

const IDENTIFIER_REGEX = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i

export function isIdentifier(value: unknown): value is Identifier {
  return typeof value === 'string' && IDENTIFIER_REGEX.test(value)
}

/**
 * Validate one identifier and return its lower-case canonical form.
 * Anything that is not a canonical UUID string is rejected, so an identifier
 * can never carry SQL or key syntax into a statement.
 */
export function requireIdentifier(value: unknown, argument: string, index?: number | undefined): Identifier {
  if (value === null || value === undefined) {
    throw new InvalidArgumentError(
      index !== undefined ? `Unexpected null identifier at index ${index}` : 'Unexpected null identifier',
      { argument, index, actual: String(value) },
    )
  }
  if (!isIdentifier(value)) {
    throw new InvalidArgumentError(`Identifier must be a canonical UUID string, got ${describe(value)}`, {
      argument,
      index,
      actual: describe(value),
    })
  }
  return value.toLowerCase()
}

/**
 * Validate a whole lookup batch up front. Returns the distinct canonical
 * identifiers in first-seen order.
 */
export function normalizeIdentifiers(identifiers: Iterable<unknown>, argument = 'identifiers'): Identifier[] {
  if (!isIterable(identifiers)) {
    throw new InvalidArgumentError(`${argument} must be an iterable of identifiers`, {
      argument,
      actual: describe(identifiers),
    })
  }
  const seen = new Set<Identifier>()
  let index = 0
  for (const value of identifiers) {
    seen.add(requireIdentifier(value, argument, index))
    index++
  }
  return [...seen]
}

/**
 * Validate a whole write batch up front. Entries keep the input's iteration
 * order; case variants of one identifier collapse onto the same key, so the
 * later one wins.
 */
export function normalizeEntries(entries: EntryInput, argument = 'entries'): CacheEntry[] {
  if (entries === null || typeof entries !== 'object') {
    throw new InvalidArgumentError(`${argument} must be a Map or an object of identifier to name`, {
      argument,
      actual: describe(entries),
    })
  }
  const pairs: Iterable<[unknown, unknown]> = isMap(entries) ? entries.entries() : Object.entries(entries)
  const result: CacheEntry[] = []
  let index = 0
  for (const [key, name] of pairs) {
    const identifier = requireIdentifier(key, argument, index)
    if (typeof name !== 'string') {
      throw new InvalidArgumentError(`Name for ${identifier} must be a string, got ${describe(name)}`, {
        argument,
        index,
        actual: describe(name),
      })
    }
    result.push({ identifier, name })
    index++
  }
  return result
}

// --- Helpers ---

function isMap(value: EntryInput): value is ReadonlyMap<Identifier, string> {
  return value instanceof Map
}

function isIterable(value: unknown): value is Iterable<unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    Symbol.iterator in value &&
    typeof value[Symbol.iterator] === 'function'
  )
}

function describe(value: unknown): string {
  if (value === null) return 'null'
  if (typeof value === 'string') return `'${value}'`
  return typeof value
}
