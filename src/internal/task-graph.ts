/**
 * Task Graph
 *
 * Stateful task management. Owns the task mirror and the parent → subtasks
 * index, and applies the completion cascade between a task and its subtasks.
 */

import type { LocalDateTime } from '../time-date'
import type {
  Commitment, CompletionChangedEvent, Task, TaskType, Timeframe,
} from '../domain-types'
import type { TaskStore } from '../store'
import { NotFoundError, ValidationError } from '../errors'
import type { ModuleContext, TaskReader } from './types'
import { nextSortOrder, pushToIndex, removeFromIndex, uuid, withStore } from './helpers'
import { planReorder } from './reorder-engine'

export type CreateTaskInput = {
  title: string
  type?: TaskType
  description?: string
}

export type SubtaskToggleOptions = {
  /** Timeframe the parent is being viewed at; decides which subtasks count */
  viewedTimeframe: Timeframe
  source?: string
}

export type SubtaskToggleOutcome = {
  subtask: Task
  parent: Task
  /** 'completed' or 'uncompleted' when the cascade flipped the parent */
  parentChange: 'completed' | 'uncompleted' | null
}

type TaskGraphDeps = ModuleContext & {
  store: TaskStore
  source: string
  commitmentsForTask: (taskId: string) => Commitment[]
  emit: (event: CompletionChangedEvent) => void
}

function copy(t: Task): Task {
  return {
    ...t,
    previousCompletionSnapshot: t.previousCompletionSnapshot ? [...t.previousCompletionSnapshot] : null,
  }
}

function requireTitle(title: string): string {
  const trimmed = title.trim()
  if (trimmed === '') throw new ValidationError('Title must not be empty')
  return trimmed
}

export function createTaskGraph(deps: TaskGraphDeps) {
  const { store, source: ownSource, commitmentsForTask, emit, ownerId, clock } = deps

  const tasks = new Map<string, Task>()
  const subtasksByParent = new Map<string, string[]>()

  // ========== Mirror Maintenance ==========

  function put(t: Task): void {
    const existing = tasks.get(t.id)
    if (existing?.parentTaskId != null && existing.parentTaskId !== t.parentTaskId) {
      removeFromIndex(subtasksByParent, existing.parentTaskId, t.id)
    }
    if (t.parentTaskId != null && existing?.parentTaskId !== t.parentTaskId) {
      pushToIndex(subtasksByParent, t.parentTaskId, t.id)
    }
    tasks.set(t.id, t)
  }

  function evict(id: string): void {
    const t = tasks.get(id)
    if (!t) return
    if (t.parentTaskId != null) removeFromIndex(subtasksByParent, t.parentTaskId, id)
    tasks.delete(id)
  }

  function requireTask(id: string): Task {
    const t = tasks.get(id)
    if (!t) throw new NotFoundError(`Task '${id}' not found`)
    return t
  }

  function subtasks(parentId: string): Task[] {
    return (subtasksByParent.get(parentId) ?? [])
      .map(id => tasks.get(id))
      .filter((t): t is Task => t !== undefined)
      .sort((a, b) => a.sortOrder - b.sortOrder)
  }

  function withCompletion(t: Task, isCompleted: boolean, at: LocalDateTime): Task {
    return { ...t, isCompleted, completedAt: isCompleted ? at : null, modifiedAt: at }
  }

  // ========== Reader ==========

  const reader: TaskReader = {
    get(id) {
      const t = tasks.get(id)
      return t ? copy(t) : undefined
    },
    subtasksOf(parentId) {
      return subtasks(parentId).map(copy)
    },
    topLevel() {
      return [...tasks.values()]
        .filter(t => t.parentTaskId === null)
        .sort((a, b) => a.sortOrder - b.sortOrder)
        .map(copy)
    },
    isCompleted(id) {
      return tasks.get(id)?.isCompleted ?? false
    },
  }

  // ========== Create ==========

  async function createTask(input: CreateTaskInput): Promise<Task> {
    const title = requireTitle(input.title)
    const owner = ownerId()
    const now = clock()
    const description = input.description?.trim()
    const task: Task = {
      id: uuid(),
      ownerId: owner,
      title,
      ...(description ? { description } : {}),
      type: input.type ?? 'task',
      parentTaskId: null,
      isCompleted: false,
      completedAt: null,
      sortOrder: nextSortOrder([...tasks.values()].filter(t => t.parentTaskId === null)),
      previousCompletionSnapshot: null,
      createdAt: now,
      modifiedAt: now,
    }
    await withStore('create task', () => store.create(task))
    put(task)
    return copy(task)
  }

  async function createSubtask(title: string, parentId: string): Promise<Task> {
    const trimmed = requireTitle(title)
    const parent = requireTask(parentId)
    const owner = ownerId()
    const now = clock()
    const task: Task = {
      id: uuid(),
      ownerId: owner,
      title: trimmed,
      type: 'task',
      parentTaskId: parent.id,
      isCompleted: false,
      completedAt: null,
      sortOrder: nextSortOrder(subtasks(parent.id)),
      previousCompletionSnapshot: null,
      createdAt: now,
      modifiedAt: now,
    }
    await withStore('create subtask', () => store.create(task))
    put(task)
    return copy(task)
  }

  // ========== Edit ==========

  async function updateTitle(taskId: string, title: string): Promise<Task> {
    const trimmed = requireTitle(title)
    const updated: Task = { ...requireTask(taskId), title: trimmed, modifiedAt: clock() }
    put(updated)
    await withStore('update task', () => store.update(updated))
    return copy(updated)
  }

  /** Subtasks first, then the task itself. */
  async function deleteTask(taskId: string): Promise<string[]> {
    requireTask(taskId)
    const deleted: string[] = []
    for (const sub of subtasks(taskId)) {
      deleted.push(...await deleteTask(sub.id))
    }
    await withStore('delete task', () => store.delete(taskId))
    evict(taskId)
    subtasksByParent.delete(taskId)
    deleted.push(taskId)
    return deleted
  }

  async function reorderSubtask(parentId: string, subtaskId: string, toIndex: number): Promise<boolean> {
    requireTask(parentId)
    const open = subtasks(parentId).filter(t => !t.isCompleted)
    const updates = planReorder(open, subtaskId, toIndex)
    if (updates.length === 0) return false

    const now = clock()
    const changed: Task[] = []
    for (const u of updates) {
      const t = requireTask(u.id)
      if (t.sortOrder === u.sortOrder) continue
      const updated = { ...t, sortOrder: u.sortOrder, modifiedAt: now }
      put(updated)
      changed.push(updated)
    }
    for (const t of changed) {
      await withStore('update task', () => store.update(t))
    }
    return true
  }

  // ========== Completion ==========

  async function persistAll(changed: Task[]): Promise<void> {
    for (const t of changed) {
      await withStore('update task', () => store.update(t))
    }
  }

  /**
   * Completing snapshots the subtasks' states and completes them all;
   * uncompleting restores them from that snapshot.
   */
  async function toggleCompletion(taskId: string, source: string = ownSource): Promise<Task> {
    const task = requireTask(taskId)
    const subs = subtasks(taskId)
    const now = clock()
    const changedSubtasks: Task[] = []
    let updated: Task

    if (!task.isCompleted) {
      const snapshot = subs.map(s => s.isCompleted)
      for (const s of subs) {
        if (!s.isCompleted) changedSubtasks.push(withCompletion(s, true, now))
      }
      updated = {
        ...withCompletion(task, true, now),
        previousCompletionSnapshot: subs.length > 0 ? snapshot : task.previousCompletionSnapshot,
      }
    } else {
      const snapshot = task.previousCompletionSnapshot
      if (snapshot) {
        subs.forEach((s, i) => {
          const restored = snapshot[i]
          if (restored !== undefined && restored !== s.isCompleted) {
            changedSubtasks.push(withCompletion(s, restored, now))
          }
        })
      }
      updated = withCompletion(task, false, now)
    }

    for (const s of changedSubtasks) put(s)
    put(updated)
    await persistAll([...changedSubtasks, updated])

    emit({
      taskId,
      isCompleted: updated.isCompleted,
      completedAt: updated.completedAt,
      subtasksChanged: changedSubtasks.length > 0,
      source,
    })
    return copy(updated)
  }

  /**
   * A subtask counts toward its parent when it has no commitment of its own,
   * or when one of its commitments shares the timeframe of the parent's
   * commitment at the viewed timeframe.
   */
  function countsTowardParent(subtaskId: string, parentTimeframe: Timeframe | null): boolean {
    const own = commitmentsForTask(subtaskId)
    if (own.length === 0) return true
    return parentTimeframe !== null && own.some(c => c.timeframe === parentTimeframe)
  }

  async function toggleSubtaskCompletion(
    subtaskId: string,
    parentId: string,
    options: SubtaskToggleOptions,
  ): Promise<SubtaskToggleOutcome> {
    const source = options.source ?? ownSource
    const parent = requireTask(parentId)
    const subtask = requireTask(subtaskId)
    if (subtask.parentTaskId !== parentId) {
      throw new ValidationError(`Task '${subtaskId}' is not a subtask of '${parentId}'`)
    }

    const before = subtasks(parentId).map(s => s.isCompleted)
    const now = clock()

    // ========== Flip the subtask ==========
    const flipped = withCompletion(subtask, !subtask.isCompleted, now)
    put(flipped)
    await withStore('update task', () => store.update(flipped))
    emit({
      taskId: flipped.id,
      isCompleted: flipped.isCompleted,
      completedAt: flipped.completedAt,
      subtasksChanged: false,
      source,
    })

    // ========== Evaluate the parent ==========
    const parentTimeframe = commitmentsForTask(parentId)
      .some(c => c.timeframe === options.viewedTimeframe)
      ? options.viewedTimeframe
      : null
    const counted = subtasks(parentId).filter(s => countsTowardParent(s.id, parentTimeframe))
    const allDone = counted.every(s => s.isCompleted)

    let parentChange: SubtaskToggleOutcome['parentChange'] = null
    let updatedParent = parent
    if (counted.length > 0 && allDone && !parent.isCompleted) {
      updatedParent = { ...withCompletion(parent, true, now), previousCompletionSnapshot: before }
      parentChange = 'completed'
    } else if (!allDone && parent.isCompleted) {
      updatedParent = withCompletion(parent, false, now)
      parentChange = 'uncompleted'
    }

    if (parentChange !== null) {
      put(updatedParent)
      await withStore('update task', () => store.update(updatedParent))
      emit({
        taskId: parentId,
        isCompleted: updatedParent.isCompleted,
        completedAt: updatedParent.completedAt,
        subtasksChanged: false,
        source,
      })
    }

    return { subtask: copy(flipped), parent: copy(updatedParent), parentChange }
  }

  // ========== External Sync ==========

  /**
   * Bring the mirror in line with a completion change published by another
   * source. Returns false for own events and unknown tasks.
   */
  async function applyExternalCompletion(event: CompletionChangedEvent): Promise<boolean> {
    if (event.source === ownSource) return false
    const task = tasks.get(event.taskId)
    if (!task) return false

    const completedAt = event.isCompleted ? (event.completedAt ?? clock()) : null
    put({ ...task, isCompleted: event.isCompleted, completedAt })
    if (event.subtasksChanged) {
      const fresh = await withStore('fetch subtasks', () => store.fetchByParent(event.taskId))
      for (const s of fresh) put(s)
    }
    return true
  }

  // ========== Hydration ==========

  async function hydrate(): Promise<void> {
    const owner = ownerId()
    const fetched = await withStore('fetch tasks', () => store.fetchByOwner(owner))
    tasks.clear()
    subtasksByParent.clear()
    for (const t of fetched) put(t)
  }

  async function fetchByType(type: TaskType): Promise<Task[]> {
    const owner = ownerId()
    const fetched = await withStore('fetch tasks', () => store.fetchByType(owner, type))
    for (const t of fetched) put(t)
    return fetched.map(copy)
  }

  return {
    reader,
    createTask,
    createSubtask,
    updateTitle,
    deleteTask,
    reorderSubtask,
    toggleCompletion,
    toggleSubtaskCompletion,
    applyExternalCompletion,
    fetchByType,
    hydrate,
  }
}

export type TaskGraph = ReturnType<typeof createTaskGraph>
