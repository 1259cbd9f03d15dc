/**
 * Commitment Ledger
 *
 * Stateful commitment management. Owns the commitment mirror and its
 * parent → children index. Enforces section capacity and the
 * parent-timeframe rule, and assigns sort orders within a bucket.
 */

import type { LocalDate, LocalDateTime } from '../time-date'
import type {
  Commitment, CommitmentFilter, Section, Timeframe,
  SortOrderUpdate, SortOrderAndSectionUpdate,
} from '../domain-types'
import type { CommitmentStore } from '../store'
import {
  BreakdownNotAllowedError, CapacityExceededError, NotFoundError, ValidationError,
} from '../errors'
import { periodStart, samePeriod } from '../periods'
import { type SectionLimits, isHigherTimeframe, maxOccupancy } from '../timeframes'
import type { CommitmentReader, ModuleContext } from './types'
import { nextSortOrder, pushToIndex, removeFromIndex, uuid, withStore } from './helpers'

export type CreateCommitmentInput = {
  taskId: string
  timeframe: Timeframe
  section: Section
  /** Any day inside the target period */
  date: LocalDate | LocalDateTime
  parentCommitmentId?: string | null
  scheduledTime?: LocalDateTime | null
  durationMinutes?: number | null
}

export type Capacity = number | 'unlimited'

type CommitmentLedgerDeps = ModuleContext & {
  store: CommitmentStore
  limits: SectionLimits
  isTaskCompleted: (taskId: string) => boolean
}

function copy(c: Commitment): Commitment {
  return { ...c }
}

export function createCommitmentLedger(deps: CommitmentLedgerDeps) {
  const { store, limits, isTaskCompleted, ownerId, clock } = deps

  const commitments = new Map<string, Commitment>()
  const childrenByParent = new Map<string, string[]>()

  // ========== Mirror Maintenance ==========

  function put(c: Commitment): void {
    const existing = commitments.get(c.id)
    if (existing?.parentCommitmentId != null && existing.parentCommitmentId !== c.parentCommitmentId) {
      removeFromIndex(childrenByParent, existing.parentCommitmentId, c.id)
    }
    if (c.parentCommitmentId != null && existing?.parentCommitmentId !== c.parentCommitmentId) {
      pushToIndex(childrenByParent, c.parentCommitmentId, c.id)
    }
    commitments.set(c.id, c)
  }

  function evict(id: string): void {
    const c = commitments.get(id)
    if (!c) return
    if (c.parentCommitmentId != null) removeFromIndex(childrenByParent, c.parentCommitmentId, id)
    commitments.delete(id)
  }

  function bySortOrder(a: Commitment, b: Commitment): number {
    return a.sortOrder - b.sortOrder
  }

  function rawBucket(section: Section, timeframe: Timeframe, date: LocalDate | LocalDateTime): Commitment[] {
    const result: Commitment[] = []
    for (const c of commitments.values()) {
      if (c.section !== section || c.timeframe !== timeframe) continue
      if (!samePeriod(c.periodAnchorDate, timeframe, date)) continue
      result.push(c)
    }
    return result
  }

  // ========== Reader ==========

  const reader: CommitmentReader = {
    get(id) {
      const c = commitments.get(id)
      return c ? copy(c) : undefined
    },
    childrenOf(id) {
      const ids = childrenByParent.get(id) ?? []
      return ids
        .map(cid => commitments.get(cid))
        .filter((c): c is Commitment => c !== undefined)
        .sort(bySortOrder)
        .map(copy)
    },
    forTask(taskId) {
      return [...commitments.values()].filter(c => c.taskId === taskId).map(copy)
    },
    bucket(section, timeframe, date) {
      return rawBucket(section, timeframe, date).sort(bySortOrder).map(copy)
    },
    all() {
      return [...commitments.values()].map(copy)
    },
  }

  function isCompleted(c: Commitment): boolean {
    return isTaskCompleted(c.taskId)
  }

  // ========== Capacity ==========

  function occupancy(
    section: Section, timeframe: Timeframe, date: LocalDate | LocalDateTime, excludingId?: string,
  ): number {
    return rawBucket(section, timeframe, date).filter(c => c.id !== excludingId).length
  }

  function capacityRemaining(section: Section, timeframe: Timeframe, date: LocalDate | LocalDateTime): Capacity {
    const limit = maxOccupancy(limits, section, timeframe)
    if (limit === undefined) return 'unlimited'
    return Math.max(0, limit - occupancy(section, timeframe, date))
  }

  function canAdd(
    section: Section, timeframe: Timeframe, date: LocalDate | LocalDateTime, excludingCommitmentId?: string,
  ): boolean {
    return checkCapacity(section, timeframe, date, excludingCommitmentId) === null
  }

  /** The error a create or move into this bucket would fail with, or null. */
  function checkCapacity(
    section: Section, timeframe: Timeframe, date: LocalDate | LocalDateTime, excludingCommitmentId?: string,
  ): CapacityExceededError | null {
    const limit = maxOccupancy(limits, section, timeframe)
    if (limit === undefined) return null
    const count = occupancy(section, timeframe, date, excludingCommitmentId)
    return count < limit ? null : new CapacityExceededError(section, timeframe, limit, count)
  }

  // ========== Queries ==========

  /** Incomplete commitments by sortOrder, then completed ones. */
  function commitmentsFor(section: Section, timeframe: Timeframe, date: LocalDate | LocalDateTime): Commitment[] {
    const bucket = rawBucket(section, timeframe, date)
    const incomplete = bucket.filter(c => !isCompleted(c)).sort(bySortOrder)
    const completed = bucket.filter(c => isCompleted(c))
    return [...incomplete, ...completed].map(copy)
  }

  function hasCommitmentInPeriod(taskId: string, timeframe: Timeframe, date: LocalDate | LocalDateTime): boolean {
    for (const c of commitments.values()) {
      if (c.taskId === taskId && c.timeframe === timeframe && samePeriod(c.periodAnchorDate, timeframe, date)) {
        return true
      }
    }
    return false
  }

  // ========== Create ==========

  async function create(input: CreateCommitmentInput): Promise<Commitment> {
    const owner = ownerId()
    if (input.durationMinutes != null && input.durationMinutes <= 0) {
      throw new ValidationError(`Duration must be positive, got ${input.durationMinutes}`)
    }

    const parentId = input.parentCommitmentId ?? null
    if (parentId !== null) {
      const parent = commitments.get(parentId)
      if (!parent) {
        throw new BreakdownNotAllowedError(`Parent commitment '${parentId}' not found`)
      }
      if (!isHigherTimeframe(parent.timeframe, input.timeframe)) {
        throw new BreakdownNotAllowedError(
          `A ${input.timeframe} commitment cannot belong to a ${parent.timeframe} commitment`,
        )
      }
    }

    const capacityError = checkCapacity(input.section, input.timeframe, input.date)
    if (capacityError) throw capacityError

    const commitment: Commitment = {
      id: uuid(),
      ownerId: owner,
      taskId: input.taskId,
      timeframe: input.timeframe,
      section: input.section,
      periodAnchorDate: periodStart(input.timeframe, input.date),
      sortOrder: nextSortOrder(rawBucket(input.section, input.timeframe, input.date)),
      parentCommitmentId: parentId,
      scheduledTime: input.scheduledTime ?? null,
      durationMinutes: input.durationMinutes ?? null,
      createdAt: clock(),
    }

    await withStore('create commitment', () => store.create(commitment))
    put(commitment)
    return copy(commitment)
  }

  // ========== Update ==========

  /** Applies `changes` to the mirror, then persists the whole commitment. */
  async function update(
    id: string,
    changes: Partial<Omit<Commitment, 'id' | 'ownerId' | 'taskId' | 'createdAt'>>,
  ): Promise<Commitment> {
    const existing = commitments.get(id)
    if (!existing) throw new NotFoundError(`Commitment '${id}' not found`)
    const updated: Commitment = { ...existing, ...changes }
    put(updated)
    await withStore('update commitment', () => store.update(updated))
    return copy(updated)
  }

  async function applySortOrders(updates: SortOrderUpdate[]): Promise<void> {
    if (updates.length === 0) return
    for (const u of updates) {
      const c = commitments.get(u.id)
      if (!c) throw new NotFoundError(`Commitment '${u.id}' not found`)
      put({ ...c, sortOrder: u.sortOrder })
    }
    await withStore('update sort orders', () => store.batchUpdateSortOrders(updates))
  }

  async function applySortOrdersAndSections(updates: SortOrderAndSectionUpdate[]): Promise<void> {
    if (updates.length === 0) return
    for (const u of updates) {
      const c = commitments.get(u.id)
      if (!c) throw new NotFoundError(`Commitment '${u.id}' not found`)
      put({ ...c, sortOrder: u.sortOrder, section: u.section })
    }
    await withStore('update sort orders and sections', () => store.batchUpdateSortOrdersAndSections(updates))
  }

  // ========== Delete ==========

  /** Deletes a single commitment that has no breakdown children. */
  async function deleteOne(id: string): Promise<void> {
    if (!commitments.has(id)) throw new NotFoundError(`Commitment '${id}' not found`)
    if ((childrenByParent.get(id) ?? []).length > 0) {
      throw new ValidationError(`Commitment '${id}' has breakdown children`)
    }
    await withStore('delete commitment', () => store.delete(id))
    evict(id)
  }

  /** Depth-first: children go before their parent. Stops at the first failure. */
  async function deleteWithDescendants(id: string): Promise<string[]> {
    if (!commitments.has(id)) throw new NotFoundError(`Commitment '${id}' not found`)
    const deleted: string[] = []

    async function visit(current: string): Promise<void> {
      for (const childId of [...(childrenByParent.get(current) ?? [])]) {
        await visit(childId)
      }
      await withStore('delete commitment', () => store.delete(current))
      evict(current)
      childrenByParent.delete(current)
      deleted.push(current)
    }

    await visit(id)
    return deleted
  }

  /** Removes every commitment bound to `taskId`, each with its descendants. */
  async function deleteForTask(taskId: string): Promise<string[]> {
    const deleted: string[] = []
    const roots = [...commitments.values()]
      .filter(c => c.taskId === taskId)
      .map(c => c.id)
    for (const id of roots) {
      // An earlier root's cascade may already have removed this one
      if (!commitments.has(id)) continue
      deleted.push(...await deleteWithDescendants(id))
    }
    return deleted
  }

  // ========== Store Reads ==========

  /** Fetch from the store and merge the results into the mirror. */
  async function fetchAndMerge(filter: CommitmentFilter): Promise<Commitment[]> {
    const fetched = await withStore('fetch commitments', () => store.fetchByFilter(filter))
    for (const c of fetched) put(c)
    return fetched.map(copy)
  }

  // ========== Hydration ==========

  async function hydrate(): Promise<void> {
    const owner = ownerId()
    const fetched = await withStore('fetch commitments', () => store.fetchByFilter({ ownerId: owner }))
    commitments.clear()
    childrenByParent.clear()
    const byId = new Map(fetched.map(c => [c.id, c]))

    function rooted(c: Commitment): boolean {
      let current: Commitment | undefined = c
      for (let depth = 0; current && depth <= byId.size; depth++) {
        if (current.parentCommitmentId == null) return true
        current = byId.get(current.parentCommitmentId)
      }
      return false
    }

    for (const c of fetched) {
      if (!rooted(c)) {
        console.warn(`Skipping commitment '${c.id}': its parent chain is broken`)
        continue
      }
      put(c)
    }
  }

  return {
    reader,
    isCompleted,
    capacityRemaining,
    canAdd,
    checkCapacity,
    commitmentsFor,
    hasCommitmentInPeriod,
    create,
    update,
    applySortOrders,
    applySortOrdersAndSections,
    delete: deleteOne,
    deleteWithDescendants,
    deleteForTask,
    fetchAndMerge,
    hydrate,
  }
}

export type CommitmentLedger = ReturnType<typeof createCommitmentLedger>
