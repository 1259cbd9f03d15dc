/**
 * Internal Types
 *
 * Reader interfaces for cross-module synchronous state access, and the
 * dependencies every stateful module shares.
 */

import type { LocalDate, LocalDateTime } from '../time-date'
import type { Commitment, Section, Task, Timeframe } from '../domain-types'

// ============================================================================
// Shared Dependencies
// ============================================================================

export type ModuleContext = {
  /** Current owner id; throws NotAuthenticatedError when signed out */
  ownerId: () => string
  clock: () => LocalDateTime
}

// ============================================================================
// Reader Interfaces
// ============================================================================

export interface TaskReader {
  get(id: string): Task | undefined
  /** Subtasks by sortOrder */
  subtasksOf(parentId: string): Task[]
  topLevel(): Task[]
  isCompleted(id: string): boolean
}

export interface CommitmentReader {
  get(id: string): Commitment | undefined
  /** Direct breakdown children by sortOrder */
  childrenOf(id: string): Commitment[]
  forTask(taskId: string): Commitment[]
  /** Every commitment in the (section, timeframe, period) bucket containing `date`, by sortOrder */
  bucket(section: Section, timeframe: Timeframe, date: LocalDate | LocalDateTime): Commitment[]
  all(): Commitment[]
}
