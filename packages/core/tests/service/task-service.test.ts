import { describe, it, expect, beforeEach } from 'vitest';
import { createTestDb, closeDb, type TaskboardDb } from '../../src/db.js';
import { SqliteTaskRepository } from '../../src/repository/task-repository.js';
import { TaskService } from '../../src/service/task-service.js';
import { ValidationError, NotFoundError, ConflictError, StorageError } from '../../src/errors.js';
import { TaskStatus } from '../../src/types/task-status.js';
import { Priority } from '../../src/types/priority.js';
import { steppingClock, sequentialIds } from '../helpers.js';

let db: TaskboardDb;
let repo: SqliteTaskRepository;
let service: TaskService;

beforeEach(() => {
  db = createTestDb();
  repo = new SqliteTaskRepository(db);
  service = new TaskService(repo, {
    now: steppingClock('2026-03-01T09:00:00.000Z'),
    generateId: sequentialIds(),
  });
});

describe('create', () => {
  it('creates a task with defaults and a retrievable record', () => {
    const task = service.create({ title: 'Implement login', priority: 'high' });
    expect(task).toEqual({
      id: 'task-1',
      title: 'Implement login',
      description: null,
      status: TaskStatus.Pending,
      priority: Priority.High,
      dueDate: null,
      createdAt: '2026-03-01T09:00:00.000Z',
      updatedAt: '2026-03-01T09:00:00.000Z',
    });
    expect(service.get('task-1')).toEqual(task);
  });

  it('keeps every provided field', () => {
    const task = service.create({
      title: 'Plan sprint',
      description: 'Pick stories for next sprint',
      status: 'in_progress',
      priority: 'low',
      due_date: '2026-04-10T12:00:00Z',
    });
    expect(task.description).toBe('Pick stories for next sprint');
    expect(task.status).toBe(TaskStatus.InProgress);
    expect(task.priority).toBe(Priority.Low);
    expect(task.dueDate).toBe('2026-04-10T12:00:00.000Z');
  });

  it('trims the title', () => {
    expect(service.create({ title: '  Tidy desk  ' }).title).toBe('Tidy desk');
  });

  it('gives a new task equal created and updated timestamps', () => {
    const task = service.create({ title: 'Water plants' });
    const stored = service.get(task.id);
    expect(stored.createdAt).toBe(stored.updatedAt);
  });

  it('rejects an empty title without persisting anything', () => {
    expect(() => service.create({ title: '' })).toThrow(ValidationError);
    expect(() => service.create({ title: '   ' })).toThrow('title: must not be empty');
    expect(repo.count()).toBe(0);
  });

  it('rejects a duplicate title, ignoring case', () => {
    service.create({ title: 'Book flights' });
    expect(() => service.create({ title: 'book FLIGHTS' })).toThrow(ConflictError);
    expect(repo.count()).toBe(1);
  });

  it('rejects unknown status and priority values', () => {
    expect(() => service.create({ title: 'x', status: 'done' }))
      .toThrow('status: must be one of: pending, in_progress, completed');
    expect(() => service.create({ title: 'x', priority: 'urgent' }))
      .toThrow('priority: must be one of: low, medium, high');
  });

  it('rejects a due date in the past', () => {
    expect(() => service.create({ title: 'Late', due_date: '2026-02-28T00:00:00Z' }))
      .toThrow('due_date: must not be in the past');
    expect(repo.count()).toBe(0);
  });

  it('rejects a malformed due date', () => {
    expect(() => service.create({ title: 'Odd', due_date: 'next tuesday' }))
      .toThrow('due_date: must be an ISO-8601 timestamp');
  });

  it('rejects a due date on a day that does not exist', () => {
    expect(() => service.create({ title: 'Odd month', due_date: '2030-02-30' }))
      .toThrow('due_date: must be an ISO-8601 timestamp');
    expect(repo.count()).toBe(0);
  });

  it('lists every issue in the error details', () => {
    let caught: unknown = null;
    try {
      service.create({ title: '', priority: 'urgent' });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ValidationError);
    if (caught instanceof ValidationError) {
      expect(caught.details).toEqual({
        issues: [
          { path: 'title', message: 'must not be empty', code: 'too_small' },
          { path: 'priority', message: 'must be one of: low, medium, high', code: 'invalid_enum_value' },
        ],
      });
    }
  });
});

describe('get', () => {
  it('throws NotFoundError for an unknown id', () => {
    expect(() => service.get('nope')).toThrow(NotFoundError);
    expect(() => service.get('nope')).toThrow("Task with id 'nope' not found");
  });
});

describe('update', () => {
  it('applies the change and moves updatedAt forward', () => {
    const task = service.create({ title: 'Draft memo' });
    const updated = service.update(task.id, { title: 'Final memo', priority: 'high' });

    const stored = service.get(task.id);
    expect(stored).toEqual(updated);
    expect(stored.title).toBe('Final memo');
    expect(stored.priority).toBe(Priority.High);
    expect(stored.createdAt).toBe('2026-03-01T09:00:00.000Z');
    expect(stored.updatedAt).toBe('2026-03-01T09:00:01.000Z');
    expect(stored.updatedAt > stored.createdAt).toBe(true);
  });

  it('leaves absent fields unchanged and clears nulled ones', () => {
    const task = service.create({ title: 'Fix bug', description: 'stack trace in #12' });
    const updated = service.update(task.id, { description: null });
    expect(updated.title).toBe('Fix bug');
    expect(updated.description).toBeNull();
  });

  it('allows any status transition', () => {
    const task = service.create({ title: 'Loop', status: 'completed' });
    expect(service.update(task.id, { status: 'pending' }).status).toBe(TaskStatus.Pending);
    expect(service.update(task.id, { status: 'in_progress' }).status).toBe(TaskStatus.InProgress);
  });

  it('moves updatedAt forward even when the clock stands still', () => {
    const frozen = new TaskService(repo, { now: () => new Date('2026-03-01T09:00:00.000Z') });
    const task = frozen.create({ title: 'Frozen' });
    const once = frozen.update(task.id, { priority: 'low' });
    const twice = frozen.update(task.id, { priority: 'high' });
    expect(once.updatedAt).toBe('2026-03-01T09:00:00.001Z');
    expect(twice.updatedAt).toBe('2026-03-01T09:00:00.002Z');
  });

  it('throws NotFoundError for an unknown id', () => {
    expect(() => service.update('nope', { title: 'x' })).toThrow(NotFoundError);
  });

  it('validates the patch before looking the task up', () => {
    expect(() => service.update('nope', { title: '' })).toThrow(ValidationError);
  });

  it('rejects a title owned by another task', () => {
    service.create({ title: 'Alpha' });
    const beta = service.create({ title: 'Beta' });
    expect(() => service.update(beta.id, { title: 'ALPHA' })).toThrow(ConflictError);
    expect(service.get(beta.id).title).toBe('Beta');
  });

  it('allows re-casing a task\'s own title', () => {
    const task = service.create({ title: 'alpha' });
    expect(service.update(task.id, { title: 'Alpha' }).title).toBe('Alpha');
  });
});

describe('complete', () => {
  it('sets the status to completed', () => {
    const task = service.create({ title: 'Implement login', priority: 'high' });
    const done = service.complete(task.id);
    expect(done.status).toBe(TaskStatus.Completed);
    expect(service.get(task.id).status).toBe(TaskStatus.Completed);
    expect(done.updatedAt > done.createdAt).toBe(true);
  });

  it('returns an already completed task unchanged', () => {
    const task = service.create({ title: 'Done already', status: 'completed' });
    expect(service.complete(task.id)).toEqual(task);
  });

  it('throws NotFoundError for an unknown id', () => {
    expect(() => service.complete('nope')).toThrow(NotFoundError);
  });
});

describe('delete', () => {
  it('removes the task; a second delete reports NotFound', () => {
    const task = service.create({ title: 'Temporary' });
    service.delete(task.id);
    expect(() => service.get(task.id)).toThrow(NotFoundError);
    expect(() => service.delete(task.id)).toThrow(NotFoundError);
  });
});

describe('list', () => {
  beforeEach(() => {
    service.create({ title: 'A', priority: 'high' });
    service.create({ title: 'B', status: 'completed' });
    service.create({ title: 'C', priority: 'high' });
    service.create({ title: 'D', status: 'in_progress', priority: 'low' });
  });

  it('returns every task in creation order', () => {
    expect(service.list().map(t => t.title)).toEqual(['A', 'B', 'C', 'D']);
  });

  it('returns exactly the pending subset in creation order', () => {
    expect(service.list({ status: 'pending' }).map(t => t.title)).toEqual(['A', 'C']);
  });

  it('filters by priority', () => {
    expect(service.list({ priority: 'high' }).map(t => t.title)).toEqual(['A', 'C']);
  });

  it('rejects an unknown filter value', () => {
    expect(() => service.list({ status: 'archived' }))
      .toThrow('status: must be one of: pending, in_progress, completed');
  });

  it('lists by status', () => {
    expect(service.listByStatus('in_progress').map(t => t.title)).toEqual(['D']);
  });
});

describe('statistics', () => {
  it('reports zero counts for an empty store', () => {
    expect(service.statistics()).toEqual({
      total: 0,
      byStatus: { pending: 0, in_progress: 0, completed: 0 },
      byPriority: { low: 0, medium: 0, high: 0 },
      overdue: 0,
    });
  });

  it('counts tasks per status and priority, and overdue ones', () => {
    const clock = steppingClock('2026-03-01T09:00:00.000Z', 24 * 60 * 60 * 1000);
    const daily = new TaskService(repo, { now: clock });
    // Each clock read advances one day; due dates are checked at creation.
    daily.create({ title: 'Overdue soon', due_date: '2026-03-05T00:00:00Z' });
    daily.create({ title: 'Finished', status: 'completed', priority: 'high', due_date: '2026-03-05T00:00:00Z' });
    daily.create({ title: 'Later', priority: 'low', due_date: '2026-12-01T00:00:00Z' });
    daily.create({ title: 'No date', status: 'in_progress' });

    // Seven reads so far (three due-date checks, four timestamps): now is March 8th.
    const stats = daily.statistics();
    expect(stats.total).toBe(4);
    expect(stats.byStatus).toEqual({ pending: 2, in_progress: 1, completed: 1 });
    expect(stats.byPriority).toEqual({ low: 1, medium: 2, high: 1 });
    expect(stats.overdue).toBe(1);
  });
});

describe('storage failures', () => {
  it('reports StorageError from every write path', () => {
    const task = service.create({ title: 'Before the outage' });
    closeDb(db);

    expect(() => service.create({ title: 'After the outage' })).toThrow(StorageError);
    expect(() => service.update(task.id, { priority: 'high' })).toThrow('Storage failure during transaction');
    expect(() => service.complete(task.id)).toThrow(StorageError);
    expect(() => service.delete(task.id)).toThrow('Storage failure during delete');
  });
});
