import { Command } from 'commander';
import type { TaskService, UpdateTaskInput } from '@taskboard/core';
import * as out from '../output.js';
import { parseStatus, parsePriorityArg, $try } from '../helpers.js';

interface UpdateOptions {
  title?: string;
  description?: string;
  priority?: string;
  status?: string;
  due?: string;
  clearDue?: boolean;
}

export function createUpdateCommand(service: TaskService): Command {
  return new Command('update')
    .description('Change fields of a task')
    .argument('<taskId>', 'The id of the task')
    .option('-t, --title <title>', 'New title')
    .option('-d, --description <text>', 'New description')
    .option('-p, --priority <level>', 'New priority (high, medium, low)')
    .option('-s, --status <status>', 'New status (pending, in-progress, completed)')
    .option('--due <date>', 'New due date as an ISO-8601 timestamp')
    .option('--clear-due', 'Remove the due date')
    .action((taskId: string, opts: UpdateOptions) => $try(() => {
      const patch: UpdateTaskInput = {};
      if (opts.title !== undefined) patch.title = opts.title;
      if (opts.description !== undefined) patch.description = opts.description;
      if (opts.priority !== undefined) patch.priority = parsePriorityArg(opts.priority) ?? opts.priority;
      if (opts.status !== undefined) patch.status = parseStatus(opts.status) ?? opts.status;
      if (opts.clearDue) patch.due_date = null;
      else if (opts.due !== undefined) patch.due_date = opts.due;

      if (Object.keys(patch).length === 0) {
        out.warning('Nothing to update');
        return;
      }
      const task = service.update(taskId, patch);
      out.success(`Task '${task.title}' updated`);
    }));
}
