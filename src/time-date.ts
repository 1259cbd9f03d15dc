/**
 * Time & Date Utilities
 *
 * Pure functions for date/time parsing, construction and calendar arithmetic.
 * Uses Julian Day Number for all date arithmetic to avoid month-length edge cases.
 * Dates carry no time zone: a LocalDate is a calendar day wherever the code runs.
 */

import { type Result, Ok, Err } from './result'
import { ParseError } from './errors'

export { ParseError } from './errors'

// ============================================================================
// Branded Types
// ============================================================================

declare const __localDate: unique symbol
declare const __localTime: unique symbol
declare const __localDateTime: unique symbol

/** ISO 8601 date string: YYYY-MM-DD */
export type LocalDate = string & { readonly [__localDate]: true }

/** ISO 8601 time string: HH:MM:SS */
export type LocalTime = string & { readonly [__localTime]: true }

/** ISO 8601 datetime string: YYYY-MM-DDThh:mm:ss */
export type LocalDateTime = string & { readonly [__localDateTime]: true }

export type Weekday = 'sun' | 'mon' | 'tue' | 'wed' | 'thu' | 'fri' | 'sat'

// ============================================================================
// Helpers
// ============================================================================

const MONTH_LENGTHS = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31] as const

export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0
}

export function daysInMonth(year: number, month: number): number {
  if (month === 2 && isLeapYear(year)) return 29
  return MONTH_LENGTHS[month - 1] ?? 0
}

function pad2(n: number): string {
  return n < 10 ? '0' + n : '' + n
}

function pad4(n: number): string {
  return String(n).padStart(4, '0')
}

// ============================================================================
// Julian Day Number (for date arithmetic)
// ============================================================================

function dateToJDN(year: number, month: number, day: number): number {
  const a = Math.floor((14 - month) / 12)
  const y = year + 4800 - a
  const m = month + 12 * a - 3
  return (
    day +
    Math.floor((153 * m + 2) / 5) +
    365 * y +
    Math.floor(y / 4) -
    Math.floor(y / 100) +
    Math.floor(y / 400) -
    32045
  )
}

function jdnToDate(jdn: number): { year: number; month: number; day: number } {
  const a = jdn + 32044
  const b = Math.floor((4 * a + 3) / 146097)
  const c = a - Math.floor(146097 * b / 4)
  const d = Math.floor((4 * c + 3) / 1461)
  const e = c - Math.floor(1461 * d / 4)
  const m = Math.floor((5 * e + 2) / 153)
  const day = e - Math.floor((153 * m + 2) / 5) + 1
  const month = m + 3 - 12 * Math.floor(m / 10)
  const year = 100 * b + d - 4800 + Math.floor(m / 10)
  return { year, month, day }
}

function toJDN(date: LocalDate): number {
  return dateToJDN(yearOf(date), monthOf(date), dayOf(date))
}

// ============================================================================
// Parsing
// ============================================================================

const DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/
const DATE_TIME_RE = /^(\d{4}-\d{2}-\d{2})T(\d{2}):(\d{2})(?::(\d{2}))?$/

export function parseDate(str: string): Result<LocalDate, ParseError> {
  const match = DATE_RE.exec(str)
  if (!match) return Err(new ParseError(`Invalid date format: '${str}'`))

  const year = parseInt(match[1] ?? '', 10)
  const month = parseInt(match[2] ?? '', 10)
  const day = parseInt(match[3] ?? '', 10)

  if (month < 1 || month > 12)
    return Err(new ParseError(`Invalid month in date: '${str}'`))
  if (day < 1 || day > daysInMonth(year, month))
    return Err(new ParseError(`Invalid day in date: '${str}'`))

  return Ok(makeDate(year, month, day))
}

export function parseDateTime(str: string): Result<LocalDateTime, ParseError> {
  const match = DATE_TIME_RE.exec(str)
  if (!match) return Err(new ParseError(`Invalid datetime format: '${str}'`))

  const dateResult = parseDate(match[1] ?? '')
  if (!dateResult.ok) return Err(new ParseError(`Invalid datetime: '${str}'`))

  const hour = parseInt(match[2] ?? '', 10)
  const minute = parseInt(match[3] ?? '', 10)
  const second = match[4] ? parseInt(match[4], 10) : 0
  if (hour > 23 || minute > 59 || second > 59)
    return Err(new ParseError(`Invalid time in datetime: '${str}'`))

  return Ok(makeDateTime(dateResult.value, makeTime(hour, minute, second)))
}

/** Parse or throw; for literals and values already validated at a boundary. */
export function toLocalDate(str: string): LocalDate {
  const result = parseDate(str)
  if (!result.ok) throw result.error
  return result.value
}

export function toLocalDateTime(str: string): LocalDateTime {
  const result = parseDateTime(str)
  if (!result.ok) throw result.error
  return result.value
}

// ============================================================================
// Construction
// ============================================================================

export function makeDate(year: number, month: number, day: number): LocalDate {
  return `${pad4(year)}-${pad2(month)}-${pad2(day)}` as LocalDate
}

export function makeTime(hour: number, minute: number, second?: number): LocalTime {
  return `${pad2(hour)}:${pad2(minute)}:${pad2(second ?? 0)}` as LocalTime
}

export function makeDateTime(date: LocalDate, time: LocalTime): LocalDateTime {
  return `${date}T${time}` as LocalDateTime
}

/** Current wall-clock time of the host, to the second. */
export function nowLocal(): LocalDateTime {
  const now = new Date()
  return makeDateTime(
    makeDate(now.getFullYear(), now.getMonth() + 1, now.getDate()),
    makeTime(now.getHours(), now.getMinutes(), now.getSeconds()),
  )
}

// ============================================================================
// Component Extraction
// ============================================================================

export function yearOf(date: LocalDate): number {
  return parseInt(date.substring(0, 4), 10)
}

export function monthOf(date: LocalDate): number {
  return parseInt(date.substring(5, 7), 10)
}

export function dayOf(date: LocalDate): number {
  return parseInt(date.substring(8, 10), 10)
}

export function hourOf(time: LocalTime): number {
  return parseInt(time.substring(0, 2), 10)
}

export function minuteOf(time: LocalTime): number {
  return parseInt(time.substring(3, 5), 10)
}

export function dateOf(dt: LocalDateTime): LocalDate {
  return dt.substring(0, 10) as LocalDate
}

export function timeOf(dt: LocalDateTime): LocalTime {
  return dt.substring(11) as LocalTime
}

/** Calendar day of a date or datetime; the time part is dropped. */
export function calendarDay(value: LocalDate | LocalDateTime): LocalDate {
  return value.substring(0, 10) as LocalDate
}

// ============================================================================
// Date Arithmetic (via JDN)
// ============================================================================

export function addDays(date: LocalDate, n: number): LocalDate {
  const { year, month, day } = jdnToDate(toJDN(date) + n)
  return makeDate(year, month, day)
}

export function daysBetween(a: LocalDate, b: LocalDate): number {
  return toJDN(b) - toJDN(a)
}

// ============================================================================
// DateTime Arithmetic
// ============================================================================

export function addMinutes(dt: LocalDateTime, n: number): LocalDateTime {
  const time = timeOf(dt)
  let totalMinutes = hourOf(time) * 60 + minuteOf(time) + n

  // Handle day overflow/underflow (avoid JS % sign-preservation bug)
  const dayDelta = Math.floor(totalMinutes / 1440)
  totalMinutes = totalMinutes - dayDelta * 1440

  const date = dayDelta === 0 ? dateOf(dt) : addDays(dateOf(dt), dayDelta)
  return makeDateTime(date, makeTime(Math.floor(totalMinutes / 60), totalMinutes % 60))
}

export function minutesBetween(a: LocalDateTime, b: LocalDateTime): number {
  const days = daysBetween(dateOf(a), dateOf(b))
  const timeA = timeOf(a)
  const timeB = timeOf(b)
  const minutesA = hourOf(timeA) * 60 + minuteOf(timeA)
  const minutesB = hourOf(timeB) * 60 + minuteOf(timeB)
  return days * 1440 + (minutesB - minutesA)
}

// ============================================================================
// Day-of-Week
// ============================================================================

const WEEKDAYS: Weekday[] = ['sun', 'mon', 'tue', 'wed', 'thu', 'fri', 'sat']

/** 0 = Sunday … 6 = Saturday */
export function weekdayIndex(date: LocalDate): number {
  // JDN mod 7 is 0 on Mondays; shift so Sunday is 0
  return (((toJDN(date) + 1) % 7) + 7) % 7
}

export function dayOfWeek(date: LocalDate): Weekday {
  return WEEKDAYS[weekdayIndex(date)] ?? 'sun'
}

// ============================================================================
// Comparison
// ============================================================================

export function compareDates(a: LocalDate, b: LocalDate): number {
  if (a < b) return -1
  if (a > b) return 1
  return 0
}

export function compareDateTimes(a: LocalDateTime, b: LocalDateTime): number {
  if (a < b) return -1
  if (a > b) return 1
  return 0
}
