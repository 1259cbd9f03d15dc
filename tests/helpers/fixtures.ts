/**
 * Builders for store-level test data.
 */
import { addMinutes, type LocalDate, type LocalDateTime } from '../../src/time-date'
import type { Commitment, CurrentUser, Task } from '../../src/domain-types'

export const date = (s: string) => s as LocalDate
export const datetime = (s: string) => s as LocalDateTime

export const OWNER = 'user-1'

export function makeTask(overrides: Partial<Task> & { id: string }): Task {
  return {
    ownerId: OWNER,
    title: `Task ${overrides.id}`,
    type: 'task',
    parentTaskId: null,
    isCompleted: false,
    completedAt: null,
    sortOrder: 0,
    previousCompletionSnapshot: null,
    createdAt: datetime('2024-03-01T08:00:00'),
    modifiedAt: datetime('2024-03-01T08:00:00'),
    ...overrides,
  }
}

export function makeCommitment(overrides: Partial<Commitment> & { id: string; taskId: string }): Commitment {
  return {
    ownerId: OWNER,
    timeframe: 'daily',
    section: 'primary',
    periodAnchorDate: date('2024-03-13'),
    sortOrder: 0,
    parentCommitmentId: null,
    scheduledTime: null,
    durationMinutes: null,
    createdAt: datetime('2024-03-01T08:00:00'),
    ...overrides,
  }
}

/** A signed-in user whose id can be changed or cleared mid-test. */
export function makeUser(initial: string | null = OWNER): CurrentUser & { set(id: string | null): void } {
  let id = initial
  return {
    currentUserId: () => id,
    set(next) { id = next },
  }
}

/** Advances one minute per call from the given start. */
export function makeClock(start = '2024-03-13T09:00:00'): () => LocalDateTime {
  let minute = 0
  return () => addMinutes(datetime(start), minute++)
}
