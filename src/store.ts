/**
 * Store
 *
 * Domain-oriented persistence interfaces + in-memory mock implementations.
 * All methods are async so remote and embedded stores share one contract.
 */

import type {
  Task, TaskType, Commitment, CommitmentFilter,
  SortOrderUpdate, SortOrderAndSectionUpdate,
} from './domain-types'
import { DuplicateKeyError, NotFoundError } from './errors'

// ============================================================================
// Interfaces
// ============================================================================

export interface TaskStore {
  create(task: Task): Promise<void>
  update(task: Task): Promise<void>
  delete(id: string): Promise<void>
  fetchById(ids: string[]): Promise<Task[]>
  /** Subtasks of `parentId`, by sortOrder */
  fetchByParent(parentId: string): Promise<Task[]>
  fetchByType(ownerId: string, type: TaskType): Promise<Task[]>
  fetchByOwner(ownerId: string): Promise<Task[]>
}

export interface CommitmentStore {
  create(commitment: Commitment): Promise<void>
  update(commitment: Commitment): Promise<void>
  delete(id: string): Promise<void>
  /** Matches by sortOrder */
  fetchByFilter(filter: CommitmentFilter): Promise<Commitment[]>
  /** All-or-nothing; an unknown id rejects the whole batch. */
  batchUpdateSortOrders(updates: SortOrderUpdate[]): Promise<void>
  batchUpdateSortOrdersAndSections(updates: SortOrderAndSectionUpdate[]): Promise<void>
}

// ============================================================================
// Filter Matching
// ============================================================================

export function matchesFilter(c: Commitment, filter: CommitmentFilter): boolean {
  if (filter.ownerId !== undefined && c.ownerId !== filter.ownerId) return false
  if (filter.timeframe !== undefined && c.timeframe !== filter.timeframe) return false
  if (filter.section !== undefined && c.section !== filter.section) return false
  if (filter.taskId !== undefined && c.taskId !== filter.taskId) return false
  if (filter.parentCommitmentId !== undefined && c.parentCommitmentId !== filter.parentCommitmentId) return false
  if (filter.dateRange !== undefined) {
    if (c.periodAnchorDate < filter.dateRange.start) return false
    if (c.periodAnchorDate >= filter.dateRange.end) return false
  }
  return true
}

function bySortOrder<T extends { sortOrder: number }>(a: T, b: T): number {
  return a.sortOrder - b.sortOrder
}

// ============================================================================
// Mock Task Store
// ============================================================================

export function createMockTaskStore(): TaskStore {
  const tasks = new Map<string, Task>()

  function clone<T>(obj: T): T {
    return structuredClone(obj)
  }

  return {
    async create(task) {
      if (tasks.has(task.id)) throw new DuplicateKeyError(`Task '${task.id}' already exists`)
      tasks.set(task.id, clone(task))
    },

    async update(task) {
      if (!tasks.has(task.id)) throw new NotFoundError(`Task '${task.id}' not found`)
      tasks.set(task.id, clone(task))
    },

    async delete(id) {
      tasks.delete(id)
    },

    async fetchById(ids) {
      const result: Task[] = []
      for (const id of ids) {
        const t = tasks.get(id)
        if (t) result.push(clone(t))
      }
      return result
    },

    async fetchByParent(parentId) {
      return [...tasks.values()]
        .filter(t => t.parentTaskId === parentId)
        .sort(bySortOrder)
        .map(clone)
    },

    async fetchByType(ownerId, type) {
      return [...tasks.values()]
        .filter(t => t.ownerId === ownerId && t.type === type)
        .sort(bySortOrder)
        .map(clone)
    },

    async fetchByOwner(ownerId) {
      return [...tasks.values()]
        .filter(t => t.ownerId === ownerId)
        .sort(bySortOrder)
        .map(clone)
    },
  }
}

// ============================================================================
// Mock Commitment Store
// ============================================================================

export function createMockCommitmentStore(): CommitmentStore {
  const commitments = new Map<string, Commitment>()

  function clone<T>(obj: T): T {
    return structuredClone(obj)
  }

  function requireAll(ids: string[]): void {
    for (const id of ids) {
      if (!commitments.has(id)) throw new NotFoundError(`Commitment '${id}' not found`)
    }
  }

  return {
    async create(commitment) {
      if (commitments.has(commitment.id)) {
        throw new DuplicateKeyError(`Commitment '${commitment.id}' already exists`)
      }
      commitments.set(commitment.id, clone(commitment))
    },

    async update(commitment) {
      if (!commitments.has(commitment.id)) {
        throw new NotFoundError(`Commitment '${commitment.id}' not found`)
      }
      commitments.set(commitment.id, clone(commitment))
    },

    async delete(id) {
      commitments.delete(id)
    },

    async fetchByFilter(filter) {
      return [...commitments.values()]
        .filter(c => matchesFilter(c, filter))
        .sort(bySortOrder)
        .map(clone)
    },

    async batchUpdateSortOrders(updates) {
      requireAll(updates.map(u => u.id))
      for (const u of updates) {
        const c = commitments.get(u.id)
        if (c) commitments.set(u.id, { ...c, sortOrder: u.sortOrder })
      }
    },

    async batchUpdateSortOrdersAndSections(updates) {
      requireAll(updates.map(u => u.id))
      for (const u of updates) {
        const c = commitments.get(u.id)
        if (c) commitments.set(u.id, { ...c, sortOrder: u.sortOrder, section: u.section })
      }
    },
  }
}
