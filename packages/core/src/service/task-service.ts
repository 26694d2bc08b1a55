/**
 * Business rules for tasks: validation, title uniqueness, timestamps and
 * status transitions. Storage is delegated to a TaskRepository; the service
 * keeps no state between calls.
 *
 * Status transitions are unrestricted: any status may be set from any other
 * through update(). complete() is shorthand for the move to `completed`.
 */

import { randomUUID } from 'node:crypto';
import type { Task, TaskId, TaskPatch, TaskStatistics } from '../types/task.js';
import { TaskStatus } from '../types/task-status.js';
import { Priority } from '../types/priority.js';
import type { TaskRepository } from '../repository/task-repository.js';
import { NotFoundError, ConflictError, ValidationError } from '../errors.js';
import {
  createTaskSchema, updateTaskSchema, taskFilterSchema, taskRecordSchema,
  parseInput,
  type CreateTaskInput, type UpdateTaskInput, type TaskFilterInput,
} from '../validation/task-input.js';
import { createSilentLogger, type Logger } from '../logging/logger.js';

export interface TaskServiceOptions {
  /** Clock used for timestamps and due-date checks */
  now?: () => Date;
  generateId?: () => TaskId;
  logger?: Logger;
}

export class TaskService {
  private repository: TaskRepository;
  private now: () => Date;
  private generateId: () => TaskId;
  private log: Logger;

  constructor(repository: TaskRepository, options: TaskServiceOptions = {}) {
    this.repository = repository;
    this.now = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? randomUUID;
    this.log = (options.logger ?? createSilentLogger()).child({ component: 'service' });
  }

  create(data: CreateTaskInput): Task {
    const input = parseInput(createTaskSchema, data);
    this.log.info({ title: input.title }, 'Creating task');
    this.assertDueDateNotPast(input.due_date ?? null);

    return this.repository.transaction(() => {
      if (this.repository.findByTitle(input.title)) {
        this.log.warn({ title: input.title }, 'Duplicate task title rejected');
        throw new ConflictError(input.title);
      }

      const timestamp = this.stamp();
      const task = this.repository.add({
        id: this.generateId(),
        title: input.title,
        description: input.description ?? null,
        status: input.status ?? TaskStatus.Pending,
        priority: input.priority ?? Priority.Medium,
        dueDate: input.due_date ?? null,
        createdAt: timestamp,
        updatedAt: timestamp,
      });
      this.log.info({ taskId: task.id }, 'Task created');
      return task;
    });
  }

  get(id: TaskId): Task {
    const task = this.repository.get(id);
    if (!task) {
      this.log.warn({ taskId: id }, 'Task not found');
      throw new NotFoundError(id);
    }
    return task;
  }

  update(id: TaskId, patch: UpdateTaskInput): Task {
    const input = parseInput(updateTaskSchema, patch);
    this.log.info({ taskId: id, fields: Object.keys(input) }, 'Updating task');
    if (input.due_date != null) this.assertDueDateNotPast(input.due_date);

    return this.repository.transaction(() => {
      const existing = this.get(id);

      if (input.title !== undefined) {
        const other = this.repository.findByTitle(input.title);
        if (other && other.id !== id) {
          this.log.warn({ taskId: id, title: input.title }, 'Duplicate task title rejected');
          throw new ConflictError(input.title);
        }
      }

      const changes: TaskPatch = { updatedAt: this.stamp(existing.updatedAt) };
      if (input.title !== undefined) changes.title = input.title;
      if (input.description !== undefined) changes.description = input.description;
      if (input.status !== undefined) changes.status = input.status;
      if (input.priority !== undefined) changes.priority = input.priority;
      if (input.due_date !== undefined) changes.dueDate = input.due_date;

      return this.persist(existing, changes);
    });
  }

  /** Mark a task completed. Already-completed tasks are returned unchanged */
  complete(id: TaskId): Task {
    this.log.info({ taskId: id }, 'Completing task');
    return this.repository.transaction(() => {
      const existing = this.get(id);
      if (existing.status === TaskStatus.Completed) {
        this.log.debug({ taskId: id }, 'Task already completed');
        return existing;
      }
      return this.persist(existing, {
        status: TaskStatus.Completed,
        updatedAt: this.stamp(existing.updatedAt),
      });
    });
  }

  delete(id: TaskId): void {
    this.log.info({ taskId: id }, 'Deleting task');
    if (!this.repository.delete(id)) {
      this.log.warn({ taskId: id }, 'Task not found');
      throw new NotFoundError(id);
    }
    this.log.info({ taskId: id }, 'Task deleted');
  }

  /** Tasks in creation order, optionally filtered by status and/or priority */
  list(filter: TaskFilterInput = {}): Task[] {
    const parsed = parseInput(taskFilterSchema, filter, 'query');
    return this.repository.list(parsed);
  }

  listByStatus(status: string): Task[] {
    return this.list({ status });
  }

  statistics(): TaskStatistics {
    const all = this.repository.list();
    const now = this.now().toISOString();

    const byStatus: Record<TaskStatus, number> = {
      [TaskStatus.Pending]: 0,
      [TaskStatus.InProgress]: 0,
      [TaskStatus.Completed]: 0,
    };
    const byPriority: Record<Priority, number> = {
      [Priority.Low]: 0,
      [Priority.Medium]: 0,
      [Priority.High]: 0,
    };
    let overdue = 0;

    for (const task of all) {
      byStatus[task.status] += 1;
      byPriority[task.priority] += 1;
      if (task.dueDate != null && task.dueDate < now && task.status !== TaskStatus.Completed) {
        overdue += 1;
      }
    }

    return { total: all.length, byStatus, byPriority, overdue };
  }

  /** Re-check the resulting record, then write the changes */
  private persist(existing: Task, changes: TaskPatch): Task {
    const next = { ...existing, ...changes };
    parseInput(taskRecordSchema, next, 'task');

    const updated = this.repository.update(existing.id, changes);
    if (!updated) throw new NotFoundError(existing.id);
    this.log.info({ taskId: updated.id }, 'Task updated');
    return updated;
  }

  private assertDueDateNotPast(dueDate: string | null): void {
    if (dueDate == null) return;
    if (Date.parse(dueDate) < this.now().getTime()) {
      throw new ValidationError('due_date: must not be in the past', [
        { path: 'due_date', message: 'must not be in the past', code: 'custom' },
      ]);
    }
  }

  /**
   * Current time as an ISO string, strictly later than `previous` when given,
   * so every mutation moves updatedAt forward.
   */
  private stamp(previous?: string): string {
    const now = this.now().getTime();
    if (previous === undefined) return new Date(now).toISOString();
    return new Date(Math.max(now, Date.parse(previous) + 1)).toISOString();
  }
}
