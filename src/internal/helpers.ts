/**
 * Internal Helpers
 *
 * Utility functions shared across internal modules.
 */

import { randomUUID } from 'node:crypto'
import { SchedulerError, StoreFailureError } from '../errors'

// ============================================================================
// ID Generation
// ============================================================================

export function uuid(): string {
  return randomUUID()
}

// ============================================================================
// Store Round-trips
// ============================================================================

/**
 * Run a store call, surfacing any failure as StoreFailureError with the
 * original error as its cause.
 */
export async function withStore<T>(action: string, call: () => Promise<T>): Promise<T> {
  try {
    return await call()
  } catch (e) {
    if (e instanceof StoreFailureError) throw e
    const detail = e instanceof Error ? e.message : String(e)
    const kind = e instanceof SchedulerError ? ` (${e.code})` : ''
    throw new StoreFailureError(`Store failed to ${action}${kind}: ${detail}`, e)
  }
}

// ============================================================================
// Ordering
// ============================================================================

export function nextSortOrder(items: readonly { sortOrder: number }[]): number {
  let max = -1
  for (const item of items) {
    if (item.sortOrder > max) max = item.sortOrder
  }
  return max + 1
}

export function pushToIndex<K, V>(index: Map<K, V[]>, key: K, value: V): void {
  const list = index.get(key)
  if (list) list.push(value)
  else index.set(key, [value])
}

export function removeFromIndex<K, V>(index: Map<K, V[]>, key: K, value: V): void {
  const list = index.get(key)
  if (!list) return
  const i = list.indexOf(value)
  if (i >= 0) list.splice(i, 1)
  if (list.length === 0) index.delete(key)
}
