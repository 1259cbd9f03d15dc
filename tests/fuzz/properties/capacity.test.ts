/**
 * Property tests for section capacity.
 */
import { describe, it, expect } from 'vitest'
import * as fc from 'fast-check'
import { sectionGen, timeframeGen } from '../generators'
import { createCommitmentLedger } from '../../../src/internal/commitment-ledger'
import { createMockCommitmentStore } from '../../../src/store'
import { CapacityExceededError } from '../../../src/errors'
import { DEFAULT_SECTION_LIMITS, maxOccupancy } from '../../../src/timeframes'
import { addDays, toLocalDateTime, type LocalDate } from '../../../src/time-date'

const base = '2024-03-10' as LocalDate

const attemptGen = fc.record({
  section: sectionGen,
  timeframe: timeframeGen,
  offset: fc.integer({ min: 0, max: 9 }),
})

describe('Capacity: commitment ledger', () => {
  it('never fills a bucket past its limit, and refuses only full buckets', async () => {
    await fc.assert(
      fc.asyncProperty(fc.array(attemptGen, { maxLength: 30 }), async (attempts) => {
        const ledger = createCommitmentLedger({
          store: createMockCommitmentStore(),
          limits: DEFAULT_SECTION_LIMITS,
          isTaskCompleted: () => false,
          ownerId: () => 'user-1',
          clock: () => toLocalDateTime('2024-03-10T08:00:00'),
        })

        for (const [i, { section, timeframe, offset }] of attempts.entries()) {
          const date = addDays(base, offset)
          const before = ledger.reader.bucket(section, timeframe, date).length
          const limit = maxOccupancy(DEFAULT_SECTION_LIMITS, section, timeframe)
          const full = limit !== undefined && before >= limit

          const outcome = await ledger.create({ taskId: `t${i}`, timeframe, section, date }).then(
            () => 'created' as const,
            (e: unknown) => e,
          )
          if (full) expect(outcome).toBeInstanceOf(CapacityExceededError)
          else expect(outcome).toBe('created')

          const after = ledger.reader.bucket(section, timeframe, date).length
          if (limit !== undefined) expect(after).toBeLessThanOrEqual(limit)
        }
      }),
    )
  })
})
