/**
 * CLI helpers: argument parsing and error handling.
 */

import { TaskStatus, Priority, isTaskboardError } from '@taskboard/core';
import * as out from './output.js';

/**
 * Parse a status argument into a TaskStatus value.
 */
export function parseStatus(status: string): TaskStatus | null {
  switch (status.toLowerCase()) {
    case 'pending': case 'todo': return TaskStatus.Pending;
    case 'in_progress': case 'in-progress': case 'inprogress': case 'wip': return TaskStatus.InProgress;
    case 'completed': case 'complete': case 'done': return TaskStatus.Completed;
    default: return null;
  }
}

/**
 * Parse a priority argument into a Priority value.
 */
export function parsePriorityArg(level: string): Priority | null {
  switch (level.toLowerCase()) {
    case 'high': case '1': case 'p1': return Priority.High;
    case 'medium': case '2': case 'p2': return Priority.Medium;
    case 'low': case '3': case 'p3': return Priority.Low;
    default: return null;
  }
}

/**
 * Run a command action, printing failures and setting a non-zero exit code.
 * Errors that are not part of the task domain are re-thrown after printing.
 */
export function $try(fn: () => void): void {
  try {
    fn();
  } catch (err: unknown) {
    process.exitCode = 1;
    if (isTaskboardError(err)) {
      out.error(err.message);
      return;
    }
    out.error(err instanceof Error ? err.message : String(err));
    throw err;
  }
}
