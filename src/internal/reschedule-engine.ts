/**
 * Reschedule Engine
 *
 * Relocates a single commitment to another period and/or timeframe within
 * its section. Breakdown children stay where they are, and are detached when
 * their parent drops to their timeframe or below. Removing a commitment takes
 * its whole subtree.
 */

import type { LocalDate, LocalDateTime } from '../time-date'
import type { Commitment, Timeframe } from '../domain-types'
import { type Result, Ok, Err } from '../result'
import { type CapacityExceededError, NotFoundError } from '../errors'
import { nextPeriodAnchor, periodStart } from '../periods'
import { isHigherTimeframe } from '../timeframes'
import type { CommitmentLedger } from './commitment-ledger'
import { nextSortOrder } from './helpers'

type RescheduleEngineDeps = {
  ledger: CommitmentLedger
}

export function createRescheduleEngine(deps: RescheduleEngineDeps) {
  const { ledger } = deps

  async function reschedule(
    commitmentId: string,
    newDate: LocalDate | LocalDateTime,
    newTimeframe: Timeframe,
  ): Promise<Result<Commitment, CapacityExceededError>> {
    const c = ledger.reader.get(commitmentId)
    if (!c) throw new NotFoundError(`Commitment '${commitmentId}' not found`)

    const capacityError = ledger.checkCapacity(c.section, newTimeframe, newDate, c.id)
    if (capacityError) return Err(capacityError)

    const destination = ledger.reader.bucket(c.section, newTimeframe, newDate)
      .filter(x => x.id !== c.id)

    // A parent must stay strictly higher than its child
    let parentCommitmentId = c.parentCommitmentId
    if (parentCommitmentId !== null) {
      const parent = ledger.reader.get(parentCommitmentId)
      if (!parent || !isHigherTimeframe(parent.timeframe, newTimeframe)) parentCommitmentId = null
    }

    const updated = await ledger.update(c.id, {
      timeframe: newTimeframe,
      periodAnchorDate: periodStart(newTimeframe, newDate),
      sortOrder: nextSortOrder(destination),
      parentCommitmentId,
    })

    // Children no longer strictly lower become top-level
    for (const child of ledger.reader.childrenOf(c.id)) {
      if (!isHigherTimeframe(newTimeframe, child.timeframe)) {
        await ledger.update(child.id, { parentCommitmentId: null })
      }
    }
    return Ok(updated)
  }

  /** Moves a commitment to the period right after its current one. */
  async function pushToNext(commitmentId: string): Promise<Result<Commitment, CapacityExceededError>> {
    const c = ledger.reader.get(commitmentId)
    if (!c) throw new NotFoundError(`Commitment '${commitmentId}' not found`)
    return reschedule(c.id, nextPeriodAnchor(c.timeframe, c.periodAnchorDate), c.timeframe)
  }

  /** Deletes the commitment and every descendant, children first. */
  async function removeSubtree(commitmentId: string): Promise<string[]> {
    return ledger.deleteWithDescendants(commitmentId)
  }

  return { reschedule, pushToNext, removeSubtree }
}

export type RescheduleEngine = ReturnType<typeof createRescheduleEngine>
