/**
 * Canonical Domain Types
 *
 * Single source of truth for the business entities shared by the stores,
 * the internal engines and the public façade.
 */

import type { LocalDate, LocalDateTime } from './time-date'

// ============================================================================
// Enumerations
// ============================================================================

/** Granularity of the period a commitment is bound to. */
export type Timeframe = 'daily' | 'weekly' | 'monthly' | 'yearly'

/** Highest first. */
export const TIMEFRAMES: readonly Timeframe[] = ['yearly', 'monthly', 'weekly', 'daily']

/** A capacity-limited list within a period. */
export type Section = 'primary' | 'overflow'

export const SECTIONS: readonly Section[] = ['primary', 'overflow']

/** `task` is a plain item; `project` and `list` are containers for subtasks. */
export type TaskType = 'task' | 'project' | 'list'

export const TASK_TYPES: readonly TaskType[] = ['task', 'project', 'list']

// ============================================================================
// Entities
// ============================================================================

export type Task = {
  id: string
  ownerId: string
  title: string
  description?: string
  type: TaskType
  /** null for top-level tasks */
  parentTaskId: string | null
  isCompleted: boolean
  /** Non-null exactly when isCompleted */
  completedAt: LocalDateTime | null
  sortOrder: number
  /** Subtask completion states captured when the task was last completed */
  previousCompletionSnapshot: boolean[] | null
  createdAt: LocalDateTime
  modifiedAt: LocalDateTime
}

export type Commitment = {
  id: string
  ownerId: string
  taskId: string
  timeframe: Timeframe
  section: Section
  /** First day of the period for `timeframe` */
  periodAnchorDate: LocalDate
  sortOrder: number
  parentCommitmentId: string | null
  scheduledTime: LocalDateTime | null
  durationMinutes: number | null
  createdAt: LocalDateTime
}

// ============================================================================
// Queries
// ============================================================================

export type DateRange = {
  /** inclusive */
  start: LocalDate
  /** exclusive */
  end: LocalDate
}

/** Every field present narrows the result; an empty filter matches everything. */
export type CommitmentFilter = {
  ownerId?: string
  timeframe?: Timeframe
  section?: Section
  /** Matches on periodAnchorDate */
  dateRange?: DateRange
  taskId?: string
  /** null selects top-level commitments */
  parentCommitmentId?: string | null
}

export type SortOrderUpdate = {
  id: string
  sortOrder: number
}

export type SortOrderAndSectionUpdate = {
  id: string
  sortOrder: number
  section: Section
}

// ============================================================================
// Collaborators
// ============================================================================

export type CurrentUser = {
  currentUserId(): string | null
}

// ============================================================================
// Events
// ============================================================================

export type CompletionChangedEvent = {
  taskId: string
  isCompleted: boolean
  completedAt: LocalDateTime | null
  /** True when the change also rewrote the task's subtasks */
  subtasksChanged: boolean
  source: string
}

export type SchedulerEvents = {
  completionChanged: CompletionChangedEvent
}

export type SchedulerEventName = keyof SchedulerEvents
