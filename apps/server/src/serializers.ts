import type { Task, TaskStatistics, TaskStatus, Priority } from '@taskboard/core';

/** Task as it appears in HTTP responses */
export interface WireTask {
  id: string;
  title: string;
  description: string | null;
  status: TaskStatus;
  priority: Priority;
  due_date: string | null;
  created_at: string;
  updated_at: string;
}

export interface WireStatistics {
  total: number;
  by_status: Record<TaskStatus, number>;
  by_priority: Record<Priority, number>;
  overdue: number;
}

export function toWireTask(task: Task): WireTask {
  return {
    id: task.id,
    title: task.title,
    description: task.description,
    status: task.status,
    priority: task.priority,
    due_date: task.dueDate,
    created_at: task.createdAt,
    updated_at: task.updatedAt,
  };
}

export function toWireStatistics(stats: TaskStatistics): WireStatistics {
  return {
    total: stats.total,
    by_status: stats.byStatus,
    by_priority: stats.byPriority,
    overdue: stats.overdue,
  };
}
