/**
 * SQLite Stores
 *
 * Production implementation of the task and commitment stores using
 * better-sqlite3. Both stores share one database connection.
 */
import Database from 'better-sqlite3'
import type { LocalDate, LocalDateTime } from './time-date'
import type {
  Task, TaskType, Commitment, CommitmentFilter, Section, Timeframe,
} from './domain-types'
import type { TaskStore, CommitmentStore } from './store'
import { DuplicateKeyError, NotFoundError, StoreFailureError } from './errors'
import { isSection, isTimeframe } from './timeframes'

export type SqliteStores = {
  taskStore: TaskStore
  commitmentStore: CommitmentStore
  close(): void
}

// ============================================================================
// Schema DDL
// ============================================================================

const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS task (
    id TEXT PRIMARY KEY,
    owner_id TEXT NOT NULL,
    title TEXT NOT NULL,
    description TEXT,
    type TEXT NOT NULL CHECK (type IN ('task', 'project', 'list')),
    parent_task_id TEXT REFERENCES task(id) ON DELETE CASCADE,
    is_completed INTEGER NOT NULL DEFAULT 0,
    completed_at TEXT,
    sort_order INTEGER NOT NULL DEFAULT 0,
    previous_completion_snapshot TEXT,
    created_at TEXT NOT NULL,
    modified_at TEXT NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_task_owner ON task(owner_id);
  CREATE INDEX IF NOT EXISTS idx_task_parent ON task(parent_task_id);

  CREATE TABLE IF NOT EXISTS commitment (
    id TEXT PRIMARY KEY,
    owner_id TEXT NOT NULL,
    task_id TEXT NOT NULL REFERENCES task(id) ON DELETE CASCADE,
    timeframe TEXT NOT NULL CHECK (timeframe IN ('daily', 'weekly', 'monthly', 'yearly')),
    section TEXT NOT NULL CHECK (section IN ('primary', 'overflow')),
    period_anchor_date TEXT NOT NULL,
    sort_order INTEGER NOT NULL DEFAULT 0,
    parent_commitment_id TEXT REFERENCES commitment(id) ON DELETE CASCADE,
    scheduled_time TEXT,
    duration_minutes INTEGER,
    created_at TEXT NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_commitment_bucket
    ON commitment(owner_id, section, timeframe, period_anchor_date);
  CREATE INDEX IF NOT EXISTS idx_commitment_task ON commitment(task_id);
  CREATE INDEX IF NOT EXISTS idx_commitment_parent ON commitment(parent_commitment_id);
`

// ============================================================================
// Error Mapping
// ============================================================================

function mapError(e: unknown): never {
  const msg = e instanceof Error ? e.message : String(e)
  if (/UNIQUE constraint/i.test(msg)) throw new DuplicateKeyError(msg)
  if (/FOREIGN KEY constraint/i.test(msg)) throw new NotFoundError(msg)
  throw e
}

function safe<T>(fn: () => T): T {
  try { return fn() }
  catch (e) { mapError(e) }
}

// ============================================================================
// SQL Row Types
// ============================================================================

type TaskRow = {
  id: string
  owner_id: string
  title: string
  description: string | null
  type: string
  parent_task_id: string | null
  is_completed: number
  completed_at: string | null
  sort_order: number
  previous_completion_snapshot: string | null
  created_at: string
  modified_at: string
}

type CommitmentRow = {
  id: string
  owner_id: string
  task_id: string
  timeframe: string
  section: string
  period_anchor_date: string
  sort_order: number
  parent_commitment_id: string | null
  scheduled_time: string | null
  duration_minutes: number | null
  created_at: string
}

type SqlParam = string | number | null

// ============================================================================
// Row → Domain Mappers
// ============================================================================

function toTaskType(value: string): TaskType {
  if (value === 'task' || value === 'project' || value === 'list') return value
  throw new StoreFailureError(`Unknown task type '${value}'`)
}

function toTimeframe(value: string): Timeframe {
  if (isTimeframe(value)) return value
  throw new StoreFailureError(`Unknown timeframe '${value}'`)
}

function toSection(value: string): Section {
  if (isSection(value)) return value
  throw new StoreFailureError(`Unknown section '${value}'`)
}

function toSnapshot(json: string | null): boolean[] | null {
  if (json == null) return null
  const value: unknown = JSON.parse(json)
  if (Array.isArray(value) && value.every((v): v is boolean => typeof v === 'boolean')) {
    return value
  }
  throw new StoreFailureError(`Malformed completion snapshot '${json}'`)
}

function toTask(row: TaskRow): Task {
  return {
    id: row.id,
    ownerId: row.owner_id,
    title: row.title,
    ...(row.description != null ? { description: row.description } : {}),
    type: toTaskType(row.type),
    parentTaskId: row.parent_task_id,
    isCompleted: row.is_completed === 1,
    completedAt: row.completed_at as LocalDateTime | null,
    sortOrder: row.sort_order,
    previousCompletionSnapshot: toSnapshot(row.previous_completion_snapshot),
    createdAt: row.created_at as LocalDateTime,
    modifiedAt: row.modified_at as LocalDateTime,
  }
}

function toCommitment(row: CommitmentRow): Commitment {
  return {
    id: row.id,
    ownerId: row.owner_id,
    taskId: row.task_id,
    timeframe: toTimeframe(row.timeframe),
    section: toSection(row.section),
    periodAnchorDate: row.period_anchor_date as LocalDate,
    sortOrder: row.sort_order,
    parentCommitmentId: row.parent_commitment_id,
    scheduledTime: row.scheduled_time as LocalDateTime | null,
    durationMinutes: row.duration_minutes,
    createdAt: row.created_at as LocalDateTime,
  }
}

function taskParams(task: Task): SqlParam[] {
  return [
    task.ownerId,
    task.title,
    task.description ?? null,
    task.type,
    task.parentTaskId,
    task.isCompleted ? 1 : 0,
    task.completedAt,
    task.sortOrder,
    task.previousCompletionSnapshot ? JSON.stringify(task.previousCompletionSnapshot) : null,
    task.createdAt,
    task.modifiedAt,
  ]
}

function commitmentParams(c: Commitment): SqlParam[] {
  return [
    c.ownerId,
    c.taskId,
    c.timeframe,
    c.section,
    c.periodAnchorDate,
    c.sortOrder,
    c.parentCommitmentId,
    c.scheduledTime,
    c.durationMinutes,
    c.createdAt,
  ]
}

// ============================================================================
// Filter → SQL
// ============================================================================

export function filterToSql(filter: CommitmentFilter): { where: string; params: SqlParam[] } {
  const clauses: string[] = []
  const params: SqlParam[] = []

  if (filter.ownerId !== undefined) {
    clauses.push('owner_id = ?')
    params.push(filter.ownerId)
  }
  if (filter.timeframe !== undefined) {
    clauses.push('timeframe = ?')
    params.push(filter.timeframe)
  }
  if (filter.section !== undefined) {
    clauses.push('section = ?')
    params.push(filter.section)
  }
  if (filter.taskId !== undefined) {
    clauses.push('task_id = ?')
    params.push(filter.taskId)
  }
  if (filter.parentCommitmentId === null) {
    clauses.push('parent_commitment_id IS NULL')
  } else if (filter.parentCommitmentId !== undefined) {
    clauses.push('parent_commitment_id = ?')
    params.push(filter.parentCommitmentId)
  }
  if (filter.dateRange !== undefined) {
    clauses.push('period_anchor_date >= ? AND period_anchor_date < ?')
    params.push(filter.dateRange.start, filter.dateRange.end)
  }

  return { where: clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : '', params }
}

// ============================================================================
// Factory
// ============================================================================

export async function createSqliteStores(path: string): Promise<SqliteStores> {
  const db = new Database(path)
  db.pragma('foreign_keys = ON')
  db.exec(SCHEMA_SQL)

  const taskStore: TaskStore = {
    async create(task) {
      safe(() =>
        db.prepare<SqlParam[]>(
          `INSERT INTO task (owner_id, title, description, type, parent_task_id, is_completed,
             completed_at, sort_order, previous_completion_snapshot, created_at, modified_at, id)
           VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
        ).run(...taskParams(task), task.id),
      )
    },

    async update(task) {
      const info = safe(() =>
        db.prepare<SqlParam[]>(
          `UPDATE task SET owner_id = ?, title = ?, description = ?, type = ?, parent_task_id = ?,
             is_completed = ?, completed_at = ?, sort_order = ?, previous_completion_snapshot = ?,
             created_at = ?, modified_at = ?
           WHERE id = ?`,
        ).run(...taskParams(task), task.id),
      )
      if (info.changes === 0) throw new NotFoundError(`Task '${task.id}' not found`)
    },

    async delete(id) {
      safe(() => db.prepare<[string]>('DELETE FROM task WHERE id = ?').run(id))
    },

    async fetchById(ids) {
      if (ids.length === 0) return []
      const placeholders = ids.map(() => '?').join(', ')
      const rows = db.prepare<string[], TaskRow>(
        `SELECT * FROM task WHERE id IN (${placeholders})`,
      ).all(...ids)
      const byId = new Map(rows.map(r => [r.id, toTask(r)]))
      const result: Task[] = []
      for (const id of ids) {
        const t = byId.get(id)
        if (t) result.push(t)
      }
      return result
    },

    async fetchByParent(parentId) {
      const rows = db.prepare<[string], TaskRow>(
        'SELECT * FROM task WHERE parent_task_id = ? ORDER BY sort_order, created_at, id',
      ).all(parentId)
      return rows.map(toTask)
    },

    async fetchByType(ownerId, type) {
      const rows = db.prepare<[string, string], TaskRow>(
        'SELECT * FROM task WHERE owner_id = ? AND type = ? ORDER BY sort_order, created_at, id',
      ).all(ownerId, type)
      return rows.map(toTask)
    },

    async fetchByOwner(ownerId) {
      const rows = db.prepare<[string], TaskRow>(
        'SELECT * FROM task WHERE owner_id = ? ORDER BY sort_order, created_at, id',
      ).all(ownerId)
      return rows.map(toTask)
    },
  }

  const updateSortOrder = db.prepare<[number, string]>(
    'UPDATE commitment SET sort_order = ? WHERE id = ?',
  )
  const updateSortOrderAndSection = db.prepare<[number, string, string]>(
    'UPDATE commitment SET sort_order = ?, section = ? WHERE id = ?',
  )

  const applySortOrders = db.transaction((updates: { id: string; sortOrder: number }[]) => {
    for (const u of updates) {
      const info = updateSortOrder.run(u.sortOrder, u.id)
      if (info.changes === 0) throw new NotFoundError(`Commitment '${u.id}' not found`)
    }
  })

  const applySortOrdersAndSections = db.transaction(
    (updates: { id: string; sortOrder: number; section: Section }[]) => {
      for (const u of updates) {
        const info = updateSortOrderAndSection.run(u.sortOrder, u.section, u.id)
        if (info.changes === 0) throw new NotFoundError(`Commitment '${u.id}' not found`)
      }
    },
  )

  const commitmentStore: CommitmentStore = {
    async create(commitment) {
      safe(() =>
        db.prepare<SqlParam[]>(
          `INSERT INTO commitment (owner_id, task_id, timeframe, section, period_anchor_date,
             sort_order, parent_commitment_id, scheduled_time, duration_minutes, created_at, id)
           VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
        ).run(...commitmentParams(commitment), commitment.id),
      )
    },

    async update(commitment) {
      const info = safe(() =>
        db.prepare<SqlParam[]>(
          `UPDATE commitment SET owner_id = ?, task_id = ?, timeframe = ?, section = ?,
             period_anchor_date = ?, sort_order = ?, parent_commitment_id = ?,
             scheduled_time = ?, duration_minutes = ?, created_at = ?
           WHERE id = ?`,
        ).run(...commitmentParams(commitment), commitment.id),
      )
      if (info.changes === 0) throw new NotFoundError(`Commitment '${commitment.id}' not found`)
    },

    async delete(id) {
      safe(() => db.prepare<[string]>('DELETE FROM commitment WHERE id = ?').run(id))
    },

    async fetchByFilter(filter) {
      const { where, params } = filterToSql(filter)
      const rows = db.prepare<SqlParam[], CommitmentRow>(
        `SELECT * FROM commitment ${where} ORDER BY sort_order, created_at, id`,
      ).all(...params)
      return rows.map(toCommitment)
    },

    async batchUpdateSortOrders(updates) {
      safe(() => applySortOrders(updates))
    },

    async batchUpdateSortOrdersAndSections(updates) {
      safe(() => applySortOrdersAndSections(updates))
    },
  }

  return {
    taskStore,
    commitmentStore,
    close() {
      db.close()
    },
  }
}
