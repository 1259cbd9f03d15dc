/**
 * Property tests for drag reordering.
 */
import { describe, it, expect } from 'vitest'
import * as fc from 'fast-check'
import { idListGen } from '../generators'
import { planReorder } from '../../../src/internal/reorder-engine'

describe('Reorder: planReorder', () => {
  it('is a permutation numbered from 0 with the moved item at the clamped index', () => {
    fc.assert(
      fc.property(idListGen, fc.nat(), fc.integer({ min: -3, max: 20 }), (ids, pick, toIndex) => {
        const items = ids.map(id => ({ id }))
        const moved = ids[pick % ids.length]
        if (moved === undefined) return
        const updates = planReorder(items, moved, toIndex)
        const target = Math.max(0, Math.min(toIndex, ids.length - 1))

        if (ids.indexOf(moved) === target) {
          expect(updates).toEqual([])
          return
        }
        expect(updates.map(u => u.sortOrder)).toEqual(ids.map((_, i) => i))
        expect([...updates.map(u => u.id)].sort()).toEqual([...ids].sort())
        expect(updates[target]?.id).toBe(moved)
      }),
    )
  })

  it('keeps the relative order of the other items', () => {
    fc.assert(
      fc.property(idListGen, fc.nat(), fc.nat(), (ids, pick, toIndex) => {
        const moved = ids[pick % ids.length]
        if (moved === undefined) return
        const updates = planReorder(ids.map(id => ({ id })), moved, toIndex % ids.length)
        if (updates.length === 0) return
        const others = updates.map(u => u.id).filter(id => id !== moved)
        expect(others).toEqual(ids.filter(id => id !== moved))
      }),
    )
  })

  it('returns nothing for an unknown id', () => {
    fc.assert(
      fc.property(idListGen, fc.nat(), (ids, toIndex) => {
        expect(planReorder(ids.map(id => ({ id })), '\u0000missing', toIndex)).toEqual([])
      }),
    )
  })
})
