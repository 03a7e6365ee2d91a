import type { Identifier } from '../identifier.js'

/**
 * Fold `{ uuid, name }` rows into `into` (a fresh map by default), keyed by the
 * lower-cased identifier. Rows of any other shape throw.
 */
export function foldRows(
  rows: readonly Record<string, unknown>[],
  into: Map<Identifier, string> = new Map(),
): Map<Identifier, string> {
  for (const row of rows) {
    const uuid = row.uuid
    const name = row.name
    if (typeof uuid !== 'string' || typeof name !== 'string') {
      throw new Error(`Unexpected cache row shape: uuid=${typeof uuid}, name=${typeof name}`)
    }
    into.set(uuid.trim().toLowerCase(), name)
  }
  return into
}
