/**
 * commitment-scheduler
 *
 * Public API exports
 */

// Error system
export {
  SchedulerError, SchedulerErrorCode,
  ValidationError, ParseError, NotFoundError, NotAuthenticatedError,
  CapacityExceededError, BreakdownNotAllowedError,
  StoreFailureError, DuplicateKeyError,
} from './errors'
export type { SchedulerErrorCode as SchedulerErrorCodeType } from './errors'

// Result type
export type { Result } from './result'
export { Ok, Err } from './result'

// Time & Date
export type { LocalDate, LocalTime, LocalDateTime, Weekday } from './time-date'
export {
  isLeapYear, daysInMonth,
  parseDate, parseDateTime, toLocalDate, toLocalDateTime,
  makeDate, makeTime, makeDateTime, nowLocal,
  yearOf, monthOf, dayOf, hourOf, minuteOf, dateOf, timeOf, calendarDay,
  addDays, daysBetween, addMinutes, minutesBetween,
  dayOfWeek, weekdayIndex,
  compareDates, compareDateTimes,
} from './time-date'

// Domain types
export type {
  Timeframe, Section, TaskType, Task, Commitment, DateRange, CommitmentFilter,
  SortOrderUpdate, SortOrderAndSectionUpdate,
  CurrentUser, CompletionChangedEvent, SchedulerEvents, SchedulerEventName,
} from './domain-types'
export { TIMEFRAMES, SECTIONS, TASK_TYPES } from './domain-types'

// Timeframe rules
export type { SectionLimits } from './timeframes'
export {
  timeframeRank, isHigherTimeframe, isTimeframe, isSection,
  availableBreakdownTimeframes, canBreakDownInto,
  DEFAULT_SECTION_LIMITS, maxOccupancy,
} from './timeframes'

// Period calculator
export type { PeriodBounds } from './periods'
export {
  periodBounds, periodStart, nextPeriodAnchor, samePeriod,
  containsDate, periodsOverlap, subPeriodStarts,
} from './periods'

// Stores (persistence interfaces + in-memory mocks)
export type { TaskStore, CommitmentStore } from './store'
export { createMockTaskStore, createMockCommitmentStore, matchesFilter } from './store'

// SQLite stores
export type { SqliteStores } from './sqlite-store'
export { createSqliteStores } from './sqlite-store'

// Scheduling façade
export type { SchedulerConfig, Scheduler, CommitTarget } from './public-api'
export { createScheduler } from './public-api'
export type { CreateTaskInput, SubtaskToggleOutcome } from './internal/task-graph'
export type { Capacity } from './internal/commitment-ledger'
export type { BreakdownTree } from './internal/breakdown-engine'
export type { Unsubscribe } from './internal/event-bus'
export { planReorder } from './internal/reorder-engine'
export { snapToSlot, normalizeDuration } from './internal/timeline-planner'
