/**
 * Reorder/Move Engine
 *
 * Drag reordering within a bucket and moves between sections. Sort orders
 * are renumbered from 0 over the incomplete commitments of each touched
 * bucket; completed commitments keep theirs.
 */

import type { Section, SortOrderAndSectionUpdate, SortOrderUpdate } from '../domain-types'
import { NotFoundError } from '../errors'
import type { CommitmentLedger } from './commitment-ledger'

// ============================================================================
// Planning
// ============================================================================

/**
 * Remove `movedId` from `items`, reinsert it at `toIndex` (clamped) and
 * number the result from 0. Returns [] when the id is unknown or the item
 * already sits at that index.
 */
export function planReorder(
  items: readonly { id: string }[],
  movedId: string,
  toIndex: number,
): SortOrderUpdate[] {
  const from = items.findIndex(i => i.id === movedId)
  if (from < 0) return []
  const target = Math.max(0, Math.min(Math.trunc(toIndex), items.length - 1))
  if (target === from) return []

  const ids = items.map(i => i.id)
  ids.splice(from, 1)
  ids.splice(target, 0, movedId)
  return ids.map((id, sortOrder) => ({ id, sortOrder }))
}

function renumber(ids: readonly string[]): SortOrderUpdate[] {
  return ids.map((id, sortOrder) => ({ id, sortOrder }))
}

// ============================================================================
// Engine
// ============================================================================

type ReorderEngineDeps = {
  ledger: CommitmentLedger
}

export function createReorderEngine(deps: ReorderEngineDeps) {
  const { ledger } = deps

  function incompleteBucket(section: Section, commitmentId: string) {
    const c = ledger.reader.get(commitmentId)
    if (!c) throw new NotFoundError(`Commitment '${commitmentId}' not found`)
    return ledger.commitmentsFor(section, c.timeframe, c.periodAnchorDate)
      .filter(x => !ledger.isCompleted(x))
  }

  // ========== Reorder ==========

  /** Returns the persisted sort orders; empty when nothing moved. */
  async function reorder(commitmentId: string, toIndex: number): Promise<SortOrderUpdate[]> {
    const c = ledger.reader.get(commitmentId)
    if (!c) throw new NotFoundError(`Commitment '${commitmentId}' not found`)

    const updates = planReorder(incompleteBucket(c.section, commitmentId), commitmentId, toIndex)
    if (updates.length === 0) return []
    await ledger.applySortOrders(updates)
    return updates
  }

  // ========== Move ==========

  /**
   * Move a commitment into another section of the same (timeframe, period).
   * Returns false without touching anything when the destination is full.
   */
  async function move(commitmentId: string, targetSection: Section, toIndex?: number): Promise<boolean> {
    const c = ledger.reader.get(commitmentId)
    if (!c) throw new NotFoundError(`Commitment '${commitmentId}' not found`)
    if (c.section === targetSection) return true
    if (!ledger.canAdd(targetSection, c.timeframe, c.periodAnchorDate, c.id)) return false

    const sourceIds = incompleteBucket(c.section, c.id)
      .map(x => x.id)
      .filter(id => id !== c.id)
    const destinationIds = ledger.commitmentsFor(targetSection, c.timeframe, c.periodAnchorDate)
      .filter(x => !ledger.isCompleted(x))
      .map(x => x.id)
    const at = toIndex === undefined
      ? destinationIds.length
      : Math.max(0, Math.min(Math.trunc(toIndex), destinationIds.length))
    destinationIds.splice(at, 0, c.id)

    const updates: SortOrderAndSectionUpdate[] = [
      ...renumber(sourceIds).map(u => ({ ...u, section: c.section })),
      ...renumber(destinationIds).map(u => ({ ...u, section: targetSection })),
    ]
    await ledger.applySortOrdersAndSections(updates)
    return true
  }

  return { reorder, move }
}

export type ReorderEngine = ReturnType<typeof createReorderEngine>
