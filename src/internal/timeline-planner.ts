/**
 * Timeline Planner
 *
 * Places commitments at a time of day, independently of their timeframe.
 * Times snap to the quarter hour.
 */

import type { LocalDate, LocalDateTime } from '../time-date'
import {
  calendarDay, compareDateTimes, dateOf, hourOf, makeDateTime, makeTime, minuteOf, timeOf,
} from '../time-date'
import type { Commitment } from '../domain-types'
import { NotFoundError, ValidationError } from '../errors'
import type { CommitmentLedger } from './commitment-ledger'

export const SLOT_MINUTES = 15
export const DEFAULT_DURATION_MINUTES = 30

const LAST_SLOT = 24 * 60 - SLOT_MINUTES

// ============================================================================
// Snapping
// ============================================================================

/** Nearest quarter hour on the same day; never rolls past 23:45. */
export function snapToSlot(at: LocalDateTime): LocalDateTime {
  const time = timeOf(at)
  const minutes = hourOf(time) * 60 + minuteOf(time)
  const snapped = Math.min(Math.round(minutes / SLOT_MINUTES) * SLOT_MINUTES, LAST_SLOT)
  return makeDateTime(dateOf(at), makeTime(Math.floor(snapped / 60), snapped % 60))
}

/** Rounded to the quarter hour, at least one slot long. */
export function normalizeDuration(minutes: number): number {
  if (!Number.isFinite(minutes) || minutes <= 0) {
    throw new ValidationError(`Duration must be a positive number of minutes, got ${minutes}`)
  }
  return Math.max(SLOT_MINUTES, Math.round(minutes / SLOT_MINUTES) * SLOT_MINUTES)
}

// ============================================================================
// Planner
// ============================================================================

type TimelinePlannerDeps = {
  ledger: CommitmentLedger
}

export function createTimelinePlanner(deps: TimelinePlannerDeps) {
  const { ledger } = deps

  async function scheduleTime(
    commitmentId: string,
    at: LocalDateTime,
    durationMinutes: number = DEFAULT_DURATION_MINUTES,
  ): Promise<Commitment> {
    if (!ledger.reader.get(commitmentId)) throw new NotFoundError(`Commitment '${commitmentId}' not found`)
    const duration = normalizeDuration(durationMinutes)
    return ledger.update(commitmentId, { scheduledTime: snapToSlot(at), durationMinutes: duration })
  }

  async function unscheduleTime(commitmentId: string): Promise<Commitment> {
    if (!ledger.reader.get(commitmentId)) throw new NotFoundError(`Commitment '${commitmentId}' not found`)
    return ledger.update(commitmentId, { scheduledTime: null, durationMinutes: null })
  }

  /** A daily overflow commitment for a task dropped straight onto the timeline. */
  async function createTimedCommitment(taskId: string, at: LocalDateTime): Promise<Commitment> {
    const scheduledTime = snapToSlot(at)
    return ledger.create({
      taskId,
      timeframe: 'daily',
      section: 'overflow',
      date: scheduledTime,
      scheduledTime,
      durationMinutes: DEFAULT_DURATION_MINUTES,
    })
  }

  function timedCommitments(date: LocalDate): Commitment[] {
    const timed: { commitment: Commitment; at: LocalDateTime }[] = []
    for (const c of ledger.reader.all()) {
      if (c.scheduledTime !== null && calendarDay(c.scheduledTime) === date) {
        timed.push({ commitment: c, at: c.scheduledTime })
      }
    }
    return timed
      .sort((a, b) => compareDateTimes(a.at, b.at))
      .map(t => t.commitment)
  }

  return { scheduleTime, unscheduleTime, createTimedCommitment, timedCommitments }
}

export type TimelinePlanner = ReturnType<typeof createTimelinePlanner>
