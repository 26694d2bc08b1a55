import type { TaskStatus } from './task-status.js';
import type { Priority } from './priority.js';

export type TaskId = string;

export interface Task {
  readonly id: TaskId;
  readonly title: string;
  readonly description: string | null;
  readonly status: TaskStatus;
  readonly priority: Priority;
  readonly dueDate: string | null; // ISO string
  readonly createdAt: string; // ISO string
  readonly updatedAt: string; // ISO string
}

/** Fields a repository update may change; id and createdAt are fixed at creation */
export interface TaskPatch {
  title?: string;
  description?: string | null;
  status?: TaskStatus;
  priority?: Priority;
  dueDate?: string | null;
  updatedAt?: string;
}

export interface TaskFilter {
  status?: TaskStatus;
  priority?: Priority;
}

export interface TaskStatistics {
  total: number;
  byStatus: Record<TaskStatus, number>;
  byPriority: Record<Priority, number>;
  /** Tasks past their due date that are not completed */
  overdue: number;
}
