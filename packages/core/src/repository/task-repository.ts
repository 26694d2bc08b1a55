/**
 * Task persistence using Drizzle ORM over better-sqlite3.
 *
 * The repository owns the stored representation of tasks. Missing ids are
 * reported as null/false; any failure of the underlying store is raised as
 * StorageError.
 */

import { eq, and, asc, max, count, type SQL } from 'drizzle-orm';
import type { TaskboardDb } from '../db.js';
import { getRawDb } from '../db.js';
import { tasks, type TaskRow } from '../schema/tasks.js';
import type { Task, TaskId, TaskPatch, TaskFilter } from '../types/task.js';
import { StorageError, isTaskboardError } from '../errors.js';
import { createSilentLogger, type Logger } from '../logging/logger.js';

export interface TaskRepository {
  add(task: Task): Task;
  get(id: TaskId): Task | null;
  /** Case-insensitive exact title match */
  findByTitle(title: string): Task | null;
  /** Tasks in insertion order, optionally filtered by status and/or priority */
  list(filter?: TaskFilter): Task[];
  update(id: TaskId, patch: TaskPatch): Task | null;
  delete(id: TaskId): boolean;
  count(): number;
  /** Run `fn` atomically; nested calls join the outer transaction */
  transaction<T>(fn: () => T): T;
}

/** Lookup key that makes titles unique regardless of case */
export function titleKey(title: string): string {
  return title.trim().toLowerCase();
}

/** Map a Drizzle row to a Task object */
function toTask(row: TaskRow): Task {
  return {
    id: row.id,
    title: row.title,
    description: row.description,
    status: row.status,
    priority: row.priority,
    dueDate: row.dueDate,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

export class SqliteTaskRepository implements TaskRepository {
  private db: TaskboardDb;
  private log: Logger;

  constructor(db: TaskboardDb, logger: Logger = createSilentLogger()) {
    this.db = db;
    this.log = logger.child({ component: 'repository' });
  }

  add(task: Task): Task {
    return this.guard('add', () => {
      const row = this.db.insert(tasks).values({
        id: task.id,
        title: task.title,
        titleKey: titleKey(task.title),
        description: task.description,
        status: task.status,
        priority: task.priority,
        dueDate: task.dueDate,
        createdAt: task.createdAt,
        updatedAt: task.updatedAt,
        position: this.nextPosition(),
      }).returning().get();
      this.log.debug({ taskId: row.id }, 'Task stored');
      return toTask(row);
    });
  }

  get(id: TaskId): Task | null {
    return this.guard('get', () => {
      const row = this.db.select().from(tasks).where(eq(tasks.id, id)).get();
      return row ? toTask(row) : null;
    });
  }

  findByTitle(title: string): Task | null {
    return this.guard('findByTitle', () => {
      const row = this.db.select().from(tasks).where(eq(tasks.titleKey, titleKey(title))).get();
      return row ? toTask(row) : null;
    });
  }

  list(filter: TaskFilter = {}): Task[] {
    return this.guard('list', () => {
      const conditions: SQL[] = [];
      if (filter.status != null) conditions.push(eq(tasks.status, filter.status));
      if (filter.priority != null) conditions.push(eq(tasks.priority, filter.priority));

      const rows = this.db.select().from(tasks)
        .where(and(...conditions))
        .orderBy(asc(tasks.position))
        .all();
      this.log.debug({ filter, count: rows.length }, 'Tasks listed');
      return rows.map(toTask);
    });
  }

  update(id: TaskId, patch: TaskPatch): Task | null {
    return this.guard('update', () => {
      if (Object.keys(patch).length === 0) return this.get(id);
      const row = this.db.update(tasks).set({
        ...patch,
        ...(patch.title !== undefined ? { titleKey: titleKey(patch.title) } : {}),
      }).where(eq(tasks.id, id)).returning().get();
      if (!row) {
        this.log.debug({ taskId: id }, 'Update skipped, task not found');
        return null;
      }
      return toTask(row);
    });
  }

  delete(id: TaskId): boolean {
    return this.guard('delete', () => {
      const result = this.db.delete(tasks).where(eq(tasks.id, id)).run();
      return result.changes > 0;
    });
  }

  count(): number {
    return this.guard('count', () => {
      const row = this.db.select({ total: count() }).from(tasks).get();
      return row?.total ?? 0;
    });
  }

  transaction<T>(fn: () => T): T {
    const raw = getRawDb(this.db);
    if (raw.inTransaction) return fn();

    // Errors raised by `fn` propagate as they are; BEGIN/COMMIT failures are storage errors
    const callback = { threw: false };
    const run = (): T => {
      try {
        return fn();
      } catch (err: unknown) {
        callback.threw = true;
        throw err;
      }
    };

    try {
      // IMMEDIATE: take the write lock at BEGIN
      return raw.transaction(run).immediate();
    } catch (err: unknown) {
      if (callback.threw || isTaskboardError(err)) throw err;
      this.log.error({ err, operation: 'transaction' }, 'Storage operation failed');
      throw new StorageError('transaction', err);
    }
  }

  /** Next position for appending a task at the end of the insertion order */
  private nextPosition(): number {
    const row = this.db.select({ maxPosition: max(tasks.position) }).from(tasks).get();
    return (row?.maxPosition ?? -1) + 1;
  }

  /** Re-raise store failures as StorageError; domain errors pass through */
  private guard<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (err: unknown) {
      if (isTaskboardError(err)) throw err;
      this.log.error({ err, operation }, 'Storage operation failed');
      throw new StorageError(operation, err);
    }
  }
}
