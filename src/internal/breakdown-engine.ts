/**
 * Breakdown Engine
 *
 * Trickle-down decomposition: binds a task (or one of its subtasks) to a
 * shorter period inside the period of an existing commitment, linked back to
 * that commitment as its parent.
 */

import type { LocalDate, LocalDateTime } from '../time-date'
import type { Commitment, Timeframe } from '../domain-types'
import { BreakdownNotAllowedError } from '../errors'
import { periodBounds, periodStart, periodsOverlap, subPeriodStarts } from '../periods'
import { canBreakDownInto } from '../timeframes'
import type { CommitmentLedger } from './commitment-ledger'

export type BreakdownTree = {
  commitment: Commitment
  children: BreakdownTree[]
}

type BreakdownEngineDeps = {
  ledger: CommitmentLedger
}

export function createBreakdownEngine(deps: BreakdownEngineDeps) {
  const { ledger } = deps

  // ========== Validation ==========

  function assertBreakdown(
    parent: Commitment,
    taskId: string,
    targetTimeframe: Timeframe,
    targetDate: LocalDate | LocalDateTime,
  ): void {
    if (!canBreakDownInto(parent.timeframe, targetTimeframe)) {
      throw new BreakdownNotAllowedError(
        `A ${parent.timeframe} commitment cannot be broken down into ${targetTimeframe}`,
      )
    }
    const parentBounds = periodBounds(parent.timeframe, parent.periodAnchorDate)
    const targetBounds = periodBounds(targetTimeframe, targetDate)
    if (!periodsOverlap(parentBounds, targetBounds)) {
      throw new BreakdownNotAllowedError(
        `${targetTimeframe} period starting ${targetBounds.start} lies outside ` +
        `${parent.timeframe} period starting ${parentBounds.start}`,
      )
    }
    if (ledger.hasCommitmentInPeriod(taskId, targetTimeframe, targetDate)) {
      throw new BreakdownNotAllowedError(
        `Task '${taskId}' is already committed to the ${targetTimeframe} period starting ${targetBounds.start}`,
      )
    }
  }

  // ========== Operations ==========

  async function createChild(
    parent: Commitment,
    targetTimeframe: Timeframe,
    targetDate: LocalDate | LocalDateTime,
  ): Promise<Commitment> {
    assertBreakdown(parent, parent.taskId, targetTimeframe, targetDate)
    return ledger.create({
      taskId: parent.taskId,
      timeframe: targetTimeframe,
      section: parent.section,
      date: targetDate,
      parentCommitmentId: parent.id,
    })
  }

  async function commitSubtask(
    subtaskId: string,
    parent: Commitment,
    targetTimeframe: Timeframe,
    targetDate: LocalDate | LocalDateTime,
  ): Promise<Commitment> {
    assertBreakdown(parent, subtaskId, targetTimeframe, targetDate)
    return ledger.create({
      taskId: subtaskId,
      timeframe: targetTimeframe,
      section: parent.section,
      date: targetDate,
      parentCommitmentId: parent.id,
    })
  }

  function availableSlots(parent: Commitment, targetTimeframe: Timeframe): LocalDate[] {
    if (!canBreakDownInto(parent.timeframe, targetTimeframe)) return []
    const used = new Set(
      ledger.reader.childrenOf(parent.id)
        .filter(c => c.timeframe === targetTimeframe)
        .map(c => periodStart(targetTimeframe, c.periodAnchorDate)),
    )
    return subPeriodStarts(parent.timeframe, parent.periodAnchorDate, targetTimeframe)
      .filter(start => !used.has(start))
  }

  /** Walks the store child by child, merging every level into the ledger. */
  async function fetchDescendantsRecursively(commitment: Commitment): Promise<BreakdownTree> {
    const children = await ledger.fetchAndMerge({ parentCommitmentId: commitment.id })
    const trees: BreakdownTree[] = []
    for (const child of children) {
      trees.push(await fetchDescendantsRecursively(child))
    }
    return { commitment, children: trees }
  }

  function brokenDownCount(commitmentId: string): number {
    return ledger.reader.childrenOf(commitmentId).length
  }

  return {
    createChild,
    commitSubtask,
    availableSlots,
    fetchDescendantsRecursively,
    brokenDownCount,
  }
}

export type BreakdownEngine = ReturnType<typeof createBreakdownEngine>
