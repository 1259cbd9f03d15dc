/**
 * Segment 01: Time & Date Utilities Tests
 *
 * Pure calendar functions on branded ISO strings. No time zone is involved.
 */
import { describe, it, expect } from 'vitest'
import {
  parseDate,
  parseDateTime,
  toLocalDate,
  addDays,
  addMinutes,
  daysBetween,
  minutesBetween,
  dayOfWeek,
  weekdayIndex,
  isLeapYear,
  daysInMonth,
  yearOf,
  monthOf,
  dayOf,
  dateOf,
  timeOf,
  calendarDay,
  makeDate,
  makeTime,
  makeDateTime,
  compareDates,
  type LocalDate,
  type LocalDateTime,
} from '../src/time-date'
import { ParseError } from '../src/errors'

const date = (s: string) => s as LocalDate
const datetime = (s: string) => s as LocalDateTime

// ============================================================================
// 1. Parsing
// ============================================================================

describe('Segment 01: Time & Date', () => {
  describe('parseDate', () => {
    it('parses a valid date', () => {
      const result = parseDate('2024-03-15')
      expect(result).toEqual({ ok: true, value: '2024-03-15' })
    })

    it('accepts Feb 29 in a leap year', () => {
      expect(parseDate('2024-02-29').ok).toBe(true)
    })

    it('rejects Feb 29 in a common year', () => {
      const result = parseDate('2023-02-29')
      expect(result.ok).toBe(false)
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(ParseError)
        expect(result.error.message).toBe("Invalid day in date: '2023-02-29'")
      }
    })

    it('rejects month 13', () => {
      const result = parseDate('2024-13-01')
      expect(result.ok).toBe(false)
      if (!result.ok) expect(result.error.code).toBe('PARSE_ERROR')
    })

    it('rejects a malformed string', () => {
      expect(parseDate('2024/03/15').ok).toBe(false)
      expect(parseDate('24-3-15').ok).toBe(false)
    })
  })

  describe('parseDateTime', () => {
    it('fills missing seconds', () => {
      expect(parseDateTime('2024-03-15T09:30')).toEqual({ ok: true, value: '2024-03-15T09:30:00' })
    })

    it('rejects hour 24', () => {
      expect(parseDateTime('2024-03-15T24:00:00').ok).toBe(false)
    })

    it('toLocalDate throws the parse error', () => {
      expect(() => toLocalDate('nope')).toThrow(ParseError)
    })
  })

  // ============================================================================
  // 2. Construction & Extraction
  // ============================================================================

  describe('construction', () => {
    it('zero-pads components', () => {
      expect(makeDate(987, 1, 2)).toBe('0987-01-02')
      expect(makeTime(7, 5)).toBe('07:05:00')
      expect(makeDateTime(date('2024-01-02'), makeTime(23, 59, 1))).toBe('2024-01-02T23:59:01')
    })

    it('extracts components', () => {
      const d = date('2024-11-07')
      expect([yearOf(d), monthOf(d), dayOf(d)]).toEqual([2024, 11, 7])
      const dt = datetime('2024-11-07T08:15:00')
      expect(dateOf(dt)).toBe('2024-11-07')
      expect(timeOf(dt)).toBe('08:15:00')
      expect(calendarDay(dt)).toBe('2024-11-07')
      expect(calendarDay(d)).toBe('2024-11-07')
    })
  })

  // ============================================================================
  // 3. Arithmetic
  // ============================================================================

  describe('arithmetic', () => {
    it('adds days across month and year ends', () => {
      expect(addDays(date('2024-02-28'), 1)).toBe('2024-02-29')
      expect(addDays(date('2023-12-31'), 1)).toBe('2024-01-01')
      expect(addDays(date('2024-03-01'), -1)).toBe('2024-02-29')
    })

    it('counts days between dates', () => {
      expect(daysBetween(date('2024-01-01'), date('2025-01-01'))).toBe(366)
      expect(daysBetween(date('2024-03-10'), date('2024-03-03'))).toBe(-7)
    })

    it('adds minutes across midnight in both directions', () => {
      expect(addMinutes(datetime('2024-03-15T23:50:00'), 20)).toBe('2024-03-16T00:10:00')
      expect(addMinutes(datetime('2024-03-15T00:10:00'), -20)).toBe('2024-03-14T23:50:00')
    })

    it('counts minutes between datetimes', () => {
      expect(minutesBetween(datetime('2024-03-15T23:00:00'), datetime('2024-03-16T01:30:00'))).toBe(150)
    })

    it('knows leap years and month lengths', () => {
      expect(isLeapYear(2000)).toBe(true)
      expect(isLeapYear(1900)).toBe(false)
      expect(daysInMonth(2024, 2)).toBe(29)
      expect(daysInMonth(2023, 2)).toBe(28)
      expect(daysInMonth(2024, 4)).toBe(30)
    })
  })

  // ============================================================================
  // 4. Day of Week & Comparison
  // ============================================================================

  describe('day of week', () => {
    it('maps known dates', () => {
      expect(dayOfWeek(date('2024-03-10'))).toBe('sun')
      expect(dayOfWeek(date('2024-03-11'))).toBe('mon')
      expect(dayOfWeek(date('2000-01-01'))).toBe('sat')
    })

    it('numbers Sunday as 0 and Saturday as 6', () => {
      expect(weekdayIndex(date('2024-03-10'))).toBe(0)
      expect(weekdayIndex(date('2024-03-16'))).toBe(6)
    })
  })

  describe('comparison', () => {
    it('orders dates lexically', () => {
      expect(compareDates(date('2024-01-02'), date('2024-01-10'))).toBe(-1)
      expect(compareDates(date('2024-01-10'), date('2024-01-10'))).toBe(0)
      expect(compareDates(date('2025-01-01'), date('2024-12-31'))).toBe(1)
    })
  })
})
