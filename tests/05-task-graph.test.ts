/**
 * Segment 05: Task Graph
 *
 * Task and subtask lifecycle, the completion snapshot, and the cascade from
 * subtasks to their parent at a viewed timeframe.
 */

import { describe, it, expect, beforeEach, vi } from 'vitest'
import { createTaskGraph, type TaskGraph } from '../src/internal/task-graph'
import { createMockTaskStore, type TaskStore } from '../src/store'
import { NotFoundError, StoreFailureError, ValidationError } from '../src/errors'
import type { Commitment, CompletionChangedEvent } from '../src/domain-types'
import { OWNER, datetime, makeClock, makeCommitment } from './helpers/fixtures'

describe('Segment 05: Task Graph', () => {
  let store: TaskStore
  let graph: TaskGraph
  let events: CompletionChangedEvent[]
  let commitmentsByTask: Map<string, Commitment[]>

  beforeEach(() => {
    store = createMockTaskStore()
    events = []
    commitmentsByTask = new Map()
    graph = createTaskGraph({
      store,
      source: 'test',
      ownerId: () => OWNER,
      clock: makeClock(),
      commitmentsForTask: (taskId) => commitmentsByTask.get(taskId) ?? [],
      emit: (event) => { events.push(event) },
    })
  })

  function commitAt(taskId: string, timeframe: Commitment['timeframe']): void {
    const list = commitmentsByTask.get(taskId) ?? []
    list.push(makeCommitment({ id: `${taskId}-${timeframe}`, taskId, timeframe }))
    commitmentsByTask.set(taskId, list)
  }

  // ============================================================================
  // Creation
  // ============================================================================

  describe('createTask', () => {
    it('trims the title and stamps owner and clock', async () => {
      const task = await graph.createTask({ title: '  Write report  ' })
      expect(task).toMatchObject({
        title: 'Write report',
        ownerId: OWNER,
        type: 'task',
        parentTaskId: null,
        isCompleted: false,
        completedAt: null,
        sortOrder: 0,
        createdAt: '2024-03-13T09:00:00',
        modifiedAt: '2024-03-13T09:00:00',
      })
      expect(await store.fetchById([task.id])).toEqual([task])
    })

    it('rejects a blank title', async () => {
      await expect(graph.createTask({ title: '   ' })).rejects.toBeInstanceOf(ValidationError)
      expect(graph.reader.topLevel()).toEqual([])
    })

    it('drops a blank description', async () => {
      const task = await graph.createTask({ title: 'a', description: '  ' })
      expect('description' in task).toBe(false)
      const described = await graph.createTask({ title: 'b', description: ' notes ' })
      expect(described.description).toBe('notes')
    })

    it('appends top-level tasks', async () => {
      const first = await graph.createTask({ title: 'a' })
      await graph.createSubtask('child', first.id)
      const second = await graph.createTask({ title: 'b', type: 'list' })
      expect(second.sortOrder).toBe(1)
      expect(second.type).toBe('list')
      expect(graph.reader.topLevel().map(t => t.id)).toEqual([first.id, second.id])
    })

    it('createSubtask requires a known parent', async () => {
      await expect(graph.createSubtask('x', 'nope')).rejects.toBeInstanceOf(NotFoundError)
    })

    it('createSubtask numbers subtasks under their parent', async () => {
      const parent = await graph.createTask({ title: 'p' })
      const a = await graph.createSubtask('a', parent.id)
      const b = await graph.createSubtask('b', parent.id)
      expect([a.sortOrder, b.sortOrder]).toEqual([0, 1])
      expect(graph.reader.subtasksOf(parent.id).map(t => t.title)).toEqual(['a', 'b'])
    })
  })

  describe('updateTitle and deleteTask', () => {
    it('updates the title and modifiedAt', async () => {
      const task = await graph.createTask({ title: 'old' })
      const updated = await graph.updateTitle(task.id, ' new ')
      expect(updated.title).toBe('new')
      expect(updated.modifiedAt).toBe('2024-03-13T09:01:00')
      expect(graph.reader.get(task.id)?.title).toBe('new')
    })

    it('deletes subtasks before the task', async () => {
      const parent = await graph.createTask({ title: 'p' })
      const a = await graph.createSubtask('a', parent.id)
      const b = await graph.createSubtask('b', parent.id)
      expect(await graph.deleteTask(parent.id)).toEqual([a.id, b.id, parent.id])
      expect(graph.reader.get(a.id)).toBeUndefined()
      expect(await store.fetchByOwner(OWNER)).toEqual([])
    })
  })

  describe('reorderSubtask', () => {
    it('moves an open subtask and renumbers', async () => {
      const parent = await graph.createTask({ title: 'p' })
      const a = await graph.createSubtask('a', parent.id)
      const b = await graph.createSubtask('b', parent.id)
      const c = await graph.createSubtask('c', parent.id)

      expect(await graph.reorderSubtask(parent.id, c.id, 0)).toBe(true)
      expect(graph.reader.subtasksOf(parent.id).map(t => t.id)).toEqual([c.id, a.id, b.id])
      expect((await store.fetchByParent(parent.id)).map(t => t.id)).toEqual([c.id, a.id, b.id])
    })

    it('returns false when nothing moves', async () => {
      const parent = await graph.createTask({ title: 'p' })
      const a = await graph.createSubtask('a', parent.id)
      await graph.createSubtask('b', parent.id)
      expect(await graph.reorderSubtask(parent.id, a.id, 0)).toBe(false)
      expect(await graph.reorderSubtask(parent.id, 'unknown', 1)).toBe(false)
    })
  })

  // ============================================================================
  // Completion Snapshot
  // ============================================================================

  describe('toggleCompletion', () => {
    it('completes every subtask and restores them on uncomplete', async () => {
      const parent = await graph.createTask({ title: 'p' })
      const a = await graph.createSubtask('a', parent.id)
      const b = await graph.createSubtask('b', parent.id)
      const c = await graph.createSubtask('c', parent.id)
      await graph.toggleSubtaskCompletion(b.id, parent.id, { viewedTimeframe: 'daily' })
      events.length = 0

      const done = await graph.toggleCompletion(parent.id)
      expect(done.isCompleted).toBe(true)
      expect(done.previousCompletionSnapshot).toEqual([false, true, false])
      expect(graph.reader.subtasksOf(parent.id).map(t => t.isCompleted)).toEqual([true, true, true])
      expect(events).toEqual([{
        taskId: parent.id,
        isCompleted: true,
        completedAt: done.completedAt,
        subtasksChanged: true,
        source: 'test',
      }])

      const undone = await graph.toggleCompletion(parent.id)
      expect(undone.isCompleted).toBe(false)
      expect(undone.completedAt).toBeNull()
      expect(undone.previousCompletionSnapshot).toEqual([false, true, false])
      expect(graph.reader.subtasksOf(parent.id).map(t => t.isCompleted)).toEqual([false, true, false])

      const persisted = await store.fetchById([a.id, b.id, c.id])
      expect(persisted.map(t => t.isCompleted)).toEqual([false, true, false])
    })

    it('reports no subtask change for a task without subtasks', async () => {
      const task = await graph.createTask({ title: 'solo' })
      await graph.toggleCompletion(task.id, 'remote')
      expect(events[0]).toMatchObject({ subtasksChanged: false, source: 'remote' })
      expect(graph.reader.get(task.id)?.previousCompletionSnapshot).toBeNull()
    })

    it('sets completedAt from the clock', async () => {
      const task = await graph.createTask({ title: 'solo' })
      const done = await graph.toggleCompletion(task.id)
      expect(done.completedAt).toBe('2024-03-13T09:01:00')
    })

    it('leaves the mirror updated and rethrows when the store fails', async () => {
      const task = await graph.createTask({ title: 'solo' })
      vi.spyOn(store, 'update').mockRejectedValueOnce(new Error('offline'))
      await expect(graph.toggleCompletion(task.id)).rejects.toBeInstanceOf(StoreFailureError)
      expect(graph.reader.isCompleted(task.id)).toBe(true)
      expect(events).toEqual([])
    })
  })

  // ============================================================================
  // Subtask Cascade
  // ============================================================================

  describe('toggleSubtaskCompletion', () => {
    it('completes the parent when the last counted subtask completes', async () => {
      const parent = await graph.createTask({ title: 'p' })
      const a = await graph.createSubtask('a', parent.id)
      const b = await graph.createSubtask('b', parent.id)

      const first = await graph.toggleSubtaskCompletion(a.id, parent.id, { viewedTimeframe: 'daily' })
      expect(first.parentChange).toBeNull()
      expect(first.subtask.isCompleted).toBe(true)

      const second = await graph.toggleSubtaskCompletion(b.id, parent.id, { viewedTimeframe: 'daily' })
      expect(second.parentChange).toBe('completed')
      expect(second.parent.isCompleted).toBe(true)
      expect(second.parent.previousCompletionSnapshot).toEqual([true, false])
      expect(events.map(e => [e.taskId, e.isCompleted])).toEqual([
        [a.id, true],
        [b.id, true],
        [parent.id, true],
      ])
    })

    it('uncompletes the parent when a counted subtask reopens', async () => {
      const parent = await graph.createTask({ title: 'p' })
      const a = await graph.createSubtask('a', parent.id)
      await graph.toggleSubtaskCompletion(a.id, parent.id, { viewedTimeframe: 'daily' })
      expect(graph.reader.isCompleted(parent.id)).toBe(true)

      const reopened = await graph.toggleSubtaskCompletion(a.id, parent.id, { viewedTimeframe: 'daily' })
      expect(reopened.parentChange).toBe('uncompleted')
      expect(reopened.parent.completedAt).toBeNull()
    })

    it('ignores subtasks committed only at another timeframe', async () => {
      const parent = await graph.createTask({ title: 'p' })
      const a = await graph.createSubtask('a', parent.id)
      const b = await graph.createSubtask('b', parent.id)
      commitAt(parent.id, 'weekly')
      commitAt(a.id, 'daily')

      const outcome = await graph.toggleSubtaskCompletion(b.id, parent.id, { viewedTimeframe: 'weekly' })
      expect(outcome.parentChange).toBe('completed')
      expect(graph.reader.isCompleted(a.id)).toBe(false)
    })

    it('counts subtasks sharing the parent timeframe', async () => {
      const parent = await graph.createTask({ title: 'p' })
      const a = await graph.createSubtask('a', parent.id)
      const b = await graph.createSubtask('b', parent.id)
      commitAt(parent.id, 'weekly')
      commitAt(a.id, 'weekly')

      const outcome = await graph.toggleSubtaskCompletion(b.id, parent.id, { viewedTimeframe: 'weekly' })
      expect(outcome.parentChange).toBeNull()
    })

    it('never flips the parent when no subtask counts', async () => {
      const parent = await graph.createTask({ title: 'p' })
      const a = await graph.createSubtask('a', parent.id)
      commitAt(a.id, 'daily')

      const done = await graph.toggleSubtaskCompletion(a.id, parent.id, { viewedTimeframe: 'weekly' })
      expect(done.parentChange).toBeNull()
      const reopened = await graph.toggleSubtaskCompletion(a.id, parent.id, { viewedTimeframe: 'weekly' })
      expect(reopened.parentChange).toBeNull()
    })

    it('rejects a task that is not a subtask of the parent', async () => {
      const parent = await graph.createTask({ title: 'p' })
      const other = await graph.createTask({ title: 'o' })
      await expect(graph.toggleSubtaskCompletion(other.id, parent.id, { viewedTimeframe: 'daily' }))
        .rejects.toBeInstanceOf(ValidationError)
    })
  })

  // ============================================================================
  // External Sync & Hydration
  // ============================================================================

  describe('applyExternalCompletion', () => {
    it('ignores its own events and unknown tasks', async () => {
      const task = await graph.createTask({ title: 't' })
      const event = { taskId: task.id, isCompleted: true, completedAt: null, subtasksChanged: false, source: 'test' }
      expect(await graph.applyExternalCompletion(event)).toBe(false)
      expect(await graph.applyExternalCompletion({ ...event, taskId: 'nope', source: 'remote' })).toBe(false)
      expect(graph.reader.isCompleted(task.id)).toBe(false)
    })

    it('applies a remote change and refetches changed subtasks', async () => {
      const parent = await graph.createTask({ title: 'p' })
      const a = await graph.createSubtask('a', parent.id)
      const [stored] = await store.fetchById([a.id])
      if (!stored) throw new Error('subtask missing')
      await store.update({ ...stored, isCompleted: true })

      const applied = await graph.applyExternalCompletion({
        taskId: parent.id,
        isCompleted: true,
        completedAt: null,
        subtasksChanged: true,
        source: 'remote',
      })
      expect(applied).toBe(true)
      expect(graph.reader.isCompleted(parent.id)).toBe(true)
      expect(graph.reader.isCompleted(a.id)).toBe(true)
    })
  })

  describe('applyExternalCompletion timestamps', () => {
    it('stamps completedAt from the clock when a completion event carries none', async () => {
      const local = createTaskGraph({
        store,
        source: 'test',
        ownerId: () => OWNER,
        clock: () => datetime('2024-03-13T12:00:00'),
        commitmentsForTask: () => [],
        emit: () => {},
      })
      const task = await local.createTask({ title: 't' })
      const event = { taskId: task.id, isCompleted: true, completedAt: null, subtasksChanged: false, source: 'remote' }

      await local.applyExternalCompletion(event)
      expect(local.reader.get(task.id)?.completedAt).toBe('2024-03-13T12:00:00')

      await local.applyExternalCompletion({ ...event, completedAt: datetime('2024-03-12T08:30:00') })
      expect(local.reader.get(task.id)?.completedAt).toBe('2024-03-12T08:30:00')

      await local.applyExternalCompletion({ ...event, isCompleted: false, completedAt: datetime('2024-03-12T08:30:00') })
      expect(local.reader.get(task.id)).toMatchObject({ isCompleted: false, completedAt: null })
    })
  })

  describe('hydrate and fetchByType', () => {
    it('loads the owner\'s tasks with their subtask index', async () => {
      const parent = await graph.createTask({ title: 'p' })
      const a = await graph.createSubtask('a', parent.id)

      const fresh = createTaskGraph({
        store,
        source: 'test',
        ownerId: () => OWNER,
        clock: makeClock(),
        commitmentsForTask: () => [],
        emit: () => {},
      })
      await fresh.hydrate()
      expect(fresh.reader.subtasksOf(parent.id).map(t => t.id)).toEqual([a.id])
    })

    it('fetches lists by type', async () => {
      const list = await graph.createTask({ title: 'groceries', type: 'list' })
      await graph.createTask({ title: 'plain' })
      expect((await graph.fetchByType('list')).map(t => t.id)).toEqual([list.id])
    })
  })
})
