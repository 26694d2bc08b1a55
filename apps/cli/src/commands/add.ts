import { Command } from 'commander';
import type { TaskService } from '@taskboard/core';
import * as out from '../output.js';
import { parseStatus, parsePriorityArg, $try } from '../helpers.js';

interface AddOptions {
  description?: string;
  priority?: string;
  status?: string;
  due?: string;
}

export function createAddCommand(service: TaskService): Command {
  return new Command('add')
    .description('Add a new task')
    .argument('<title>', 'Task title (unique, case-insensitive)')
    .option('-d, --description <text>', 'Longer description')
    .option('-p, --priority <level>', 'Priority (high, medium, low)')
    .option('-s, --status <status>', 'Initial status (pending, in-progress, completed)')
    .option('--due <date>', 'Due date as an ISO-8601 timestamp')
    .action((title: string, opts: AddOptions) => $try(() => {
      // Unrecognized values go through as typed so validation can name them
      const task = service.create({
        title,
        description: opts.description,
        priority: opts.priority === undefined ? undefined : parsePriorityArg(opts.priority) ?? opts.priority,
        status: opts.status === undefined ? undefined : parseStatus(opts.status) ?? opts.status,
        due_date: opts.due,
      });
      out.success(`Task created (${task.id})`);
    }));
}
