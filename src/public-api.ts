/**
 * Public API Module
 *
 * Consumer-facing interface that ties all components together.
 * Handles initialization, validation, id resolution and event emission.
 */

import type { LocalDate, LocalDateTime } from './time-date'
import { nowLocal } from './time-date'
import type {
  Commitment, CompletionChangedEvent, CurrentUser, Section, SchedulerEvents,
  Task, TaskType, Timeframe,
} from './domain-types'
import { SECTIONS, TIMEFRAMES } from './domain-types'
import type { CommitmentStore, TaskStore } from './store'
import type { Result } from './result'
import {
  type CapacityExceededError,
  NotAuthenticatedError, NotFoundError, ValidationError,
} from './errors'
import {
  type SectionLimits, DEFAULT_SECTION_LIMITS, availableBreakdownTimeframes,
} from './timeframes'
import { createEventBus, type Unsubscribe } from './internal/event-bus'
import { createTaskGraph, type CreateTaskInput, type SubtaskToggleOutcome } from './internal/task-graph'
import { createCommitmentLedger, type Capacity } from './internal/commitment-ledger'
import { createBreakdownEngine, type BreakdownTree } from './internal/breakdown-engine'
import { createReorderEngine } from './internal/reorder-engine'
import { createRescheduleEngine } from './internal/reschedule-engine'
import { createTimelinePlanner } from './internal/timeline-planner'

// ============================================================================
// Types
// ============================================================================

export type SchedulerConfig = {
  taskStore: TaskStore
  commitmentStore: CommitmentStore
  currentUser: CurrentUser
  /** Replaces the default limits of each section it names */
  sectionLimits?: Partial<SectionLimits>
  clock?: () => LocalDateTime
  /** Stamped on every emitted event; events carrying it are ignored on apply */
  source?: string
}

export type CommitTarget = {
  timeframe: Timeframe
  section: Section
  date: LocalDate | LocalDateTime
}

export type Scheduler = {
  hydrate(): Promise<void>

  // Tasks
  createTask(input: CreateTaskInput): Promise<Task>
  createSubtask(title: string, parentId: string): Promise<Task>
  updateTitle(taskId: string, title: string): Promise<Task>
  deleteTask(taskId: string): Promise<void>
  toggleCompletion(taskId: string): Promise<Task>
  toggleSubtaskCompletion(subtaskId: string, parentId: string, viewedTimeframe: Timeframe): Promise<SubtaskToggleOutcome>
  reorderSubtask(parentId: string, subtaskId: string, toIndex: number): Promise<boolean>
  fetchTasksByType(type: TaskType): Promise<Task[]>
  getTask(taskId: string): Task | undefined
  getSubtasks(parentId: string): Task[]
  getTopLevelTasks(): Task[]

  // Commitments
  commitTask(taskId: string, target: CommitTarget): Promise<Commitment>
  createTaskWithCommitment(input: CreateTaskInput, target: CommitTarget): Promise<{ task: Task; commitment: Commitment }>
  removeCommitment(commitmentId: string): Promise<void>
  deleteCommitment(commitmentId: string): Promise<void>
  getCommitment(commitmentId: string): Commitment | undefined
  commitmentsForTask(taskId: string): Commitment[]

  // Breakdown
  availableBreakdownTimeframes(commitmentId: string): Timeframe[]
  breakDown(commitmentId: string, targetTimeframe: Timeframe, targetDate: LocalDate | LocalDateTime): Promise<Commitment>
  commitSubtask(
    subtaskId: string, parentCommitmentId: string,
    targetTimeframe: Timeframe, targetDate: LocalDate | LocalDateTime,
  ): Promise<Commitment>
  availableSlots(commitmentId: string, targetTimeframe: Timeframe): LocalDate[]
  childCommitments(commitmentId: string): Commitment[]
  fetchDescendants(commitmentId: string): Promise<BreakdownTree>
  brokenDownCount(commitmentId: string): number

  // Ordering
  reorderCommitment(commitmentId: string, toIndex: number): Promise<boolean>
  moveCommitmentToSection(commitmentId: string, section: Section, toIndex?: number): Promise<boolean>

  // Rescheduling
  reschedule(
    commitmentId: string, newDate: LocalDate | LocalDateTime, newTimeframe: Timeframe,
  ): Promise<Result<Commitment, CapacityExceededError>>
  pushToNext(commitmentId: string): Promise<Result<Commitment, CapacityExceededError>>

  // Timeline
  scheduleTime(commitmentId: string, at: LocalDateTime, durationMinutes?: number): Promise<Commitment>
  unscheduleTime(commitmentId: string): Promise<Commitment>
  createTimedCommitment(taskId: string, at: LocalDateTime): Promise<Commitment>
  getTimedCommitments(date: LocalDate): Commitment[]

  // Capacity
  commitmentsFor(section: Section, timeframe: Timeframe, date: LocalDate | LocalDateTime): Commitment[]
  capacityRemaining(section: Section, timeframe: Timeframe, date: LocalDate | LocalDateTime): Capacity
  canAdd(section: Section, timeframe: Timeframe, date: LocalDate | LocalDateTime, excludingCommitmentId?: string): boolean

  // Events
  on<K extends keyof SchedulerEvents>(event: K, handler: (payload: SchedulerEvents[K]) => void): Unsubscribe
  applyExternalCompletion(event: CompletionChangedEvent): Promise<boolean>
}

// ============================================================================
// Config Validation
// ============================================================================

function isFunction(value: unknown): value is (...args: never[]) => unknown {
  return typeof value === 'function'
}

function validateLimits(limits: Partial<SectionLimits>): void {
  for (const section of SECTIONS) {
    const perTimeframe = limits[section]
    if (perTimeframe === undefined) continue
    for (const timeframe of TIMEFRAMES) {
      const limit = perTimeframe[timeframe]
      if (limit === undefined) continue
      if (!Number.isInteger(limit) || limit < 0) {
        throw new ValidationError(`Limit for ${section}/${timeframe} must be a non-negative integer, got ${limit}`)
      }
    }
  }
}

function resolveLimits(overrides: Partial<SectionLimits> | undefined): SectionLimits {
  return {
    primary: { ...(overrides?.primary ?? DEFAULT_SECTION_LIMITS.primary) },
    overflow: { ...(overrides?.overflow ?? DEFAULT_SECTION_LIMITS.overflow) },
  }
}

// ============================================================================
// Implementation
// ============================================================================

export function createScheduler(config: SchedulerConfig): Scheduler {
  if (!config.taskStore || typeof config.taskStore !== 'object') {
    throw new ValidationError('Task store is required')
  }
  if (!config.commitmentStore || typeof config.commitmentStore !== 'object') {
    throw new ValidationError('Commitment store is required')
  }
  if (!config.currentUser || !isFunction(config.currentUser.currentUserId)) {
    throw new ValidationError('Current user accessor is required')
  }
  if (config.clock !== undefined && !isFunction(config.clock)) {
    throw new ValidationError('Clock must be a function')
  }
  if (config.source !== undefined && config.source.trim() === '') {
    throw new ValidationError('Source must not be empty')
  }
  if (config.sectionLimits) validateLimits(config.sectionLimits)

  const currentUser = config.currentUser
  const clock = config.clock ?? nowLocal
  const source = config.source ?? 'scheduler'
  const limits = resolveLimits(config.sectionLimits)

  function ownerId(): string {
    const id = currentUser.currentUserId()
    if (id === null || id === '') throw new NotAuthenticatedError()
    return id
  }

  // ========== Components ==========

  const bus = createEventBus<SchedulerEvents>()

  // The graph and the ledger read each other lazily through these lookups
  const taskGraph = createTaskGraph({
    store: config.taskStore,
    ownerId,
    clock,
    source,
    commitmentsForTask: (taskId) => ledger.reader.forTask(taskId),
    emit: (event) => { bus.emit('completionChanged', event) },
  })
  const ledger = createCommitmentLedger({
    store: config.commitmentStore,
    ownerId,
    clock,
    limits,
    isTaskCompleted: (taskId) => taskGraph.reader.isCompleted(taskId),
  })
  const breakdown = createBreakdownEngine({ ledger })
  const reorderEngine = createReorderEngine({ ledger })
  const rescheduleEngine = createRescheduleEngine({ ledger })
  const timeline = createTimelinePlanner({ ledger })

  // ========== Resolution ==========

  function requireTask(taskId: string): Task {
    const t = taskGraph.reader.get(taskId)
    if (!t) throw new NotFoundError(`Task '${taskId}' not found`)
    return t
  }

  function requireCommitment(commitmentId: string): Commitment {
    const c = ledger.reader.get(commitmentId)
    if (!c) throw new NotFoundError(`Commitment '${commitmentId}' not found`)
    return c
  }

  // ========== Hydration ==========

  async function hydrate(): Promise<void> {
    await taskGraph.hydrate()
    await ledger.hydrate()
  }

  // ========== Tasks ==========

  /** Commitments of the task and of its subtasks go first, then the tasks. */
  async function deleteTask(taskId: string): Promise<void> {
    requireTask(taskId)
    for (const sub of taskGraph.reader.subtasksOf(taskId)) {
      await ledger.deleteForTask(sub.id)
    }
    await ledger.deleteForTask(taskId)
    await taskGraph.deleteTask(taskId)
  }

  // ========== Commitments ==========

  async function commitTask(taskId: string, target: CommitTarget): Promise<Commitment> {
    requireTask(taskId)
    if (ledger.hasCommitmentInPeriod(taskId, target.timeframe, target.date)) {
      throw new ValidationError(`Task '${taskId}' is already committed to that ${target.timeframe} period`)
    }
    return ledger.create({
      taskId,
      timeframe: target.timeframe,
      section: target.section,
      date: target.date,
    })
  }

  async function createTaskWithCommitment(
    input: CreateTaskInput,
    target: CommitTarget,
  ): Promise<{ task: Task; commitment: Commitment }> {
    // Fail before the task exists rather than leave it uncommitted
    const capacityError = ledger.checkCapacity(target.section, target.timeframe, target.date)
    if (capacityError) throw capacityError
    const task = await taskGraph.createTask(input)
    const commitment = await commitTask(task.id, target)
    return { task, commitment }
  }

  async function removeCommitment(commitmentId: string): Promise<void> {
    await rescheduleEngine.removeSubtree(commitmentId)
  }

  async function deleteCommitment(commitmentId: string): Promise<void> {
    await ledger.delete(commitmentId)
  }

  // ========== Breakdown ==========

  async function breakDown(
    commitmentId: string,
    targetTimeframe: Timeframe,
    targetDate: LocalDate | LocalDateTime,
  ): Promise<Commitment> {
    return breakdown.createChild(requireCommitment(commitmentId), targetTimeframe, targetDate)
  }

  async function commitSubtask(
    subtaskId: string,
    parentCommitmentId: string,
    targetTimeframe: Timeframe,
    targetDate: LocalDate | LocalDateTime,
  ): Promise<Commitment> {
    const parent = requireCommitment(parentCommitmentId)
    const subtask = requireTask(subtaskId)
    if (subtask.parentTaskId !== parent.taskId) {
      throw new ValidationError(`Task '${subtaskId}' is not a subtask of task '${parent.taskId}'`)
    }
    return breakdown.commitSubtask(subtask.id, parent, targetTimeframe, targetDate)
  }

  // ========== Ordering ==========

  async function reorderCommitment(commitmentId: string, toIndex: number): Promise<boolean> {
    const updates = await reorderEngine.reorder(commitmentId, toIndex)
    return updates.length > 0
  }

  return {
    hydrate,

    createTask: (input) => taskGraph.createTask(input),
    createSubtask: (title, parentId) => taskGraph.createSubtask(title, parentId),
    updateTitle: (taskId, title) => taskGraph.updateTitle(taskId, title),
    deleteTask,
    toggleCompletion: (taskId) => taskGraph.toggleCompletion(taskId),
    toggleSubtaskCompletion: (subtaskId, parentId, viewedTimeframe) =>
      taskGraph.toggleSubtaskCompletion(subtaskId, parentId, { viewedTimeframe }),
    reorderSubtask: (parentId, subtaskId, toIndex) => taskGraph.reorderSubtask(parentId, subtaskId, toIndex),
    fetchTasksByType: (type) => taskGraph.fetchByType(type),
    getTask: (taskId) => taskGraph.reader.get(taskId),
    getSubtasks: (parentId) => taskGraph.reader.subtasksOf(parentId),
    getTopLevelTasks: () => taskGraph.reader.topLevel(),

    commitTask,
    createTaskWithCommitment,
    removeCommitment,
    deleteCommitment,
    getCommitment: (commitmentId) => ledger.reader.get(commitmentId),
    commitmentsForTask: (taskId) => ledger.reader.forTask(taskId),

    availableBreakdownTimeframes: (commitmentId) =>
      availableBreakdownTimeframes(requireCommitment(commitmentId).timeframe),
    breakDown,
    commitSubtask,
    availableSlots: (commitmentId, targetTimeframe) =>
      breakdown.availableSlots(requireCommitment(commitmentId), targetTimeframe),
    childCommitments: (commitmentId) => ledger.reader.childrenOf(commitmentId),
    fetchDescendants: async (commitmentId) =>
      breakdown.fetchDescendantsRecursively(requireCommitment(commitmentId)),
    brokenDownCount: (commitmentId) => breakdown.brokenDownCount(commitmentId),

    reorderCommitment,
    moveCommitmentToSection: (commitmentId, section, toIndex) => reorderEngine.move(commitmentId, section, toIndex),

    reschedule: (commitmentId, newDate, newTimeframe) =>
      rescheduleEngine.reschedule(commitmentId, newDate, newTimeframe),
    pushToNext: (commitmentId) => rescheduleEngine.pushToNext(commitmentId),

    scheduleTime: (commitmentId, at, durationMinutes) => timeline.scheduleTime(commitmentId, at, durationMinutes),
    unscheduleTime: (commitmentId) => timeline.unscheduleTime(commitmentId),
    createTimedCommitment: async (taskId, at) => {
      requireTask(taskId)
      return timeline.createTimedCommitment(taskId, at)
    },
    getTimedCommitments: (date) => timeline.timedCommitments(date),

    commitmentsFor: (section, timeframe, date) => ledger.commitmentsFor(section, timeframe, date),
    capacityRemaining: (section, timeframe, date) => ledger.capacityRemaining(section, timeframe, date),
    canAdd: (section, timeframe, date, excludingCommitmentId) =>
      ledger.canAdd(section, timeframe, date, excludingCommitmentId),

    on: <K extends keyof SchedulerEvents>(event: K, handler: (payload: SchedulerEvents[K]) => void) =>
      bus.on(event, handler),
    applyExternalCompletion: (event) => taskGraph.applyExternalCompletion(event),
  }
}
