import pLimit from 'p-limit'

export type SerialLock = <T>(task: () => T | Promise<T>) => Promise<T>

/**
 * Mutual exclusion for a single shared connection. Tasks run one at a time
 * in the order they were submitted; a rejected task does not block the next.
 */
export function createSerialLock(): SerialLock {
  const limit = pLimit(1)
  return (task) => limit(task)
}
