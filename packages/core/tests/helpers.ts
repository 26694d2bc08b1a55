import type { Task } from '../src/types/task.js';
import { TaskStatus } from '../src/types/task-status.js';
import { Priority } from '../src/types/priority.js';

/** A clock that starts at `start` and advances `stepMs` on every call */
export function steppingClock(start = '2026-03-01T09:00:00.000Z', stepMs = 1000): () => Date {
  let t = Date.parse(start);
  return () => {
    const d = new Date(t);
    t += stepMs;
    return d;
  };
}

/** Sequential ids: task-1, task-2, ... */
export function sequentialIds(prefix = 'task'): () => string {
  let n = 0;
  return () => `${prefix}-${++n}`;
}

export function makeTask(overrides: Partial<Task> = {}): Task {
  return {
    id: 'abc',
    title: 'Write report',
    description: null,
    status: TaskStatus.Pending,
    priority: Priority.Medium,
    dueDate: null,
    createdAt: '2026-03-01T09:00:00.000Z',
    updatedAt: '2026-03-01T09:00:00.000Z',
    ...overrides,
  };
}
