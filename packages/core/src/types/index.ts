export { TaskStatus, TaskStatusName, TASK_STATUSES } from './task-status.js';
export { Priority, PriorityName, PRIORITIES } from './priority.js';
export type { TaskId, Task, TaskPatch, TaskFilter, TaskStatistics } from './task.js';
