export type DebugPhase = 'open' | 'schema' | 'lookup' | 'upsert' | 'close' | 'error'

export interface DebugLogEntry {
  timestamp: number
  phase: DebugPhase
  message: string
  details?: unknown
}

export type DebugSink = (entry: DebugLogEntry) => void

export function debugEntry(phase: DebugPhase, message: string, durationMs: number, details?: unknown): DebugLogEntry {
  const result: DebugLogEntry = {
    timestamp: Date.now(),
    phase,
    message: `${message} (${durationMs.toFixed(1)}ms)`,
  }
  if (details !== undefined) result.details = details
  return result
}

/** Run `fn`, then report its duration to `sink` (if any) under `phase`. */
export function withDebugLog<T>(
  sink: DebugSink | undefined,
  phase: DebugPhase,
  message: (result: T) => string,
  fn: () => T,
): T {
  if (sink === undefined) return fn()
  const t0 = performance.now()
  const result = fn()
  sink(debugEntry(phase, message(result), performance.now() - t0))
  return result
}
