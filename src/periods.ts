/**
 * Period Calculator
 *
 * Maps a date to the calendar period that contains it at a given timeframe.
 * Weeks start on Sunday. Bounds are half-open: start inclusive, end exclusive.
 */

import type { LocalDate, LocalDateTime } from './time-date'
import {
  addDays, calendarDay, makeDate, yearOf, monthOf, weekdayIndex,
} from './time-date'
import type { DateRange, Timeframe } from './domain-types'

export type PeriodBounds = DateRange

// ============================================================================
// Bounds
// ============================================================================

export function periodBounds(timeframe: Timeframe, date: LocalDate | LocalDateTime): PeriodBounds {
  const day = calendarDay(date)
  switch (timeframe) {
    case 'daily':
      return { start: day, end: addDays(day, 1) }
    case 'weekly': {
      const start = addDays(day, -weekdayIndex(day))
      return { start, end: addDays(start, 7) }
    }
    case 'monthly': {
      const year = yearOf(day)
      const month = monthOf(day)
      const start = makeDate(year, month, 1)
      const end = month === 12 ? makeDate(year + 1, 1, 1) : makeDate(year, month + 1, 1)
      return { start, end }
    }
    case 'yearly': {
      const year = yearOf(day)
      return { start: makeDate(year, 1, 1), end: makeDate(year + 1, 1, 1) }
    }
  }
}

export function periodStart(timeframe: Timeframe, date: LocalDate | LocalDateTime): LocalDate {
  return periodBounds(timeframe, date).start
}

/** Start of the period following the one containing `date`. */
export function nextPeriodAnchor(timeframe: Timeframe, date: LocalDate | LocalDateTime): LocalDate {
  return periodBounds(timeframe, date).end
}

export function samePeriod(
  date: LocalDate | LocalDateTime,
  timeframe: Timeframe,
  referenceDate: LocalDate | LocalDateTime,
): boolean {
  return periodStart(timeframe, date) === periodStart(timeframe, referenceDate)
}

// ============================================================================
// Range Predicates
// ============================================================================

export function containsDate(bounds: PeriodBounds, date: LocalDate | LocalDateTime): boolean {
  const day = calendarDay(date)
  return day >= bounds.start && day < bounds.end
}

export function periodsOverlap(a: PeriodBounds, b: PeriodBounds): boolean {
  return a.start < b.end && b.start < a.end
}

// ============================================================================
// Sub-periods
// ============================================================================

/**
 * Starts of every `target` period that intersects the `parent` period
 * containing `parentDate`, in chronological order. A week straddling the
 * parent's start is included at its own Sunday.
 */
export function subPeriodStarts(
  parentTimeframe: Timeframe,
  parentDate: LocalDate | LocalDateTime,
  targetTimeframe: Timeframe,
): LocalDate[] {
  const parent = periodBounds(parentTimeframe, parentDate)
  const starts: LocalDate[] = []
  let cursor = periodStart(targetTimeframe, parent.start)
  while (cursor < parent.end) {
    starts.push(cursor)
    cursor = nextPeriodAnchor(targetTimeframe, cursor)
  }
  return starts
}
