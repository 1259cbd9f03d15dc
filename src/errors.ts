/**
 * Consolidated error system for the commitment scheduler.
 *
 * All error classes extend SchedulerError, which carries a typed error code.
 */

import type { Section, Timeframe } from './domain-types'

// ============================================================================
// Error Codes
// ============================================================================

export const SchedulerErrorCode = {
  // Input
  VALIDATION: 'VALIDATION',
  PARSE_ERROR: 'PARSE_ERROR',
  NOT_FOUND: 'NOT_FOUND',
  NOT_AUTHENTICATED: 'NOT_AUTHENTICATED',

  // Scheduling rules
  CAPACITY_EXCEEDED: 'CAPACITY_EXCEEDED',
  BREAKDOWN_NOT_ALLOWED: 'BREAKDOWN_NOT_ALLOWED',

  // Persistence
  STORE_FAILURE: 'STORE_FAILURE',
  DUPLICATE_KEY: 'DUPLICATE_KEY',
} as const

export type SchedulerErrorCode = (typeof SchedulerErrorCode)[keyof typeof SchedulerErrorCode]

// ============================================================================
// Base Class
// ============================================================================

export class SchedulerError extends Error {
  readonly code: SchedulerErrorCode

  constructor(code: SchedulerErrorCode, message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'SchedulerError'
    this.code = code
  }
}

// ============================================================================
// Input Errors
// ============================================================================

export class ValidationError extends SchedulerError {
  constructor(message: string) {
    super(SchedulerErrorCode.VALIDATION, message)
    this.name = 'ValidationError'
  }
}

export class ParseError extends SchedulerError {
  constructor(message: string) {
    super(SchedulerErrorCode.PARSE_ERROR, message)
    this.name = 'ParseError'
  }
}

export class NotFoundError extends SchedulerError {
  constructor(message: string) {
    super(SchedulerErrorCode.NOT_FOUND, message)
    this.name = 'NotFoundError'
  }
}

export class NotAuthenticatedError extends SchedulerError {
  constructor(message = 'No authenticated user') {
    super(SchedulerErrorCode.NOT_AUTHENTICATED, message)
    this.name = 'NotAuthenticatedError'
  }
}

// ============================================================================
// Scheduling Rule Errors
// ============================================================================

export class CapacityExceededError extends SchedulerError {
  readonly section: Section
  readonly timeframe: Timeframe
  readonly limit: number
  readonly count: number

  constructor(section: Section, timeframe: Timeframe, limit: number, count: number) {
    super(
      SchedulerErrorCode.CAPACITY_EXCEEDED,
      `Section '${section}' is full for ${timeframe} (${count}/${limit})`,
    )
    this.name = 'CapacityExceededError'
    this.section = section
    this.timeframe = timeframe
    this.limit = limit
    this.count = count
  }
}

export class BreakdownNotAllowedError extends SchedulerError {
  constructor(message: string) {
    super(SchedulerErrorCode.BREAKDOWN_NOT_ALLOWED, message)
    this.name = 'BreakdownNotAllowedError'
  }
}

// ============================================================================
// Persistence Errors
// ============================================================================

export class StoreFailureError extends SchedulerError {
  constructor(message: string, cause?: unknown) {
    super(SchedulerErrorCode.STORE_FAILURE, message, cause === undefined ? undefined : { cause })
    this.name = 'StoreFailureError'
  }
}

export class DuplicateKeyError extends SchedulerError {
  constructor(message: string) {
    super(SchedulerErrorCode.DUPLICATE_KEY, message)
    this.name = 'DuplicateKeyError'
  }
}
