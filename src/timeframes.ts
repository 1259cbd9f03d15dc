/**
 * Timeframe & Section Rules
 *
 * Ordering of timeframes, which lower timeframes a commitment may be broken
 * down into, and the per-section occupancy limits.
 */

import type { Section, Timeframe } from './domain-types'

// ============================================================================
// Ordering
// ============================================================================

const RANK: Record<Timeframe, number> = {
  daily: 0,
  weekly: 1,
  monthly: 2,
  yearly: 3,
}

export function timeframeRank(timeframe: Timeframe): number {
  return RANK[timeframe]
}

/** True when `a` is a strictly longer horizon than `b`. */
export function isHigherTimeframe(a: Timeframe, b: Timeframe): boolean {
  return RANK[a] > RANK[b]
}

export function isTimeframe(value: unknown): value is Timeframe {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(RANK, value)
}

export function isSection(value: unknown): value is Section {
  return value === 'primary' || value === 'overflow'
}

// ============================================================================
// Breakdown
// ============================================================================

const BREAKDOWN_TARGETS: Record<Timeframe, readonly Timeframe[]> = {
  yearly: ['monthly', 'weekly'],
  monthly: ['weekly', 'daily'],
  weekly: ['daily'],
  daily: [],
}

/** Timeframes a commitment at `timeframe` may be broken down into, highest first. */
export function availableBreakdownTimeframes(timeframe: Timeframe): Timeframe[] {
  return [...BREAKDOWN_TARGETS[timeframe]]
}

export function canBreakDownInto(parent: Timeframe, target: Timeframe): boolean {
  return BREAKDOWN_TARGETS[parent].includes(target)
}

// ============================================================================
// Section Limits
// ============================================================================

/** Maximum occupancy per timeframe; a missing entry means unlimited. */
export type SectionLimits = Record<Section, Partial<Record<Timeframe, number>>>

export const DEFAULT_SECTION_LIMITS: SectionLimits = {
  primary: { daily: 3, weekly: 5, monthly: 5, yearly: 10 },
  overflow: {},
}

export function maxOccupancy(
  limits: SectionLimits,
  section: Section,
  timeframe: Timeframe,
): number | undefined {
  return limits[section][timeframe]
}
