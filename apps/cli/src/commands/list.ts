import { Command } from 'commander';
import type { TaskService } from '@taskboard/core';
import * as out from '../output.js';
import { parseStatus, parsePriorityArg, $try } from '../helpers.js';

interface ListOptions {
  status?: string;
  priority?: string;
}

export function createListCommand(service: TaskService): Command {
  return new Command('list')
    .description('List tasks in creation order')
    .option('-s, --status <status>', 'Filter by status (pending, in-progress, completed)')
    .option('-p, --priority <level>', 'Filter by priority (high, medium, low)')
    .action((opts: ListOptions) => $try(() => {
      const tasks = service.list({
        status: opts.status === undefined ? undefined : parseStatus(opts.status) ?? opts.status,
        priority: opts.priority === undefined ? undefined : parsePriorityArg(opts.priority) ?? opts.priority,
      });
      const filtered = opts.status !== undefined || opts.priority !== undefined;
      out.printTasks(tasks, filtered
        ? 'No tasks match the filter'
        : 'No tasks saved yet... use the add command to create one');
    }));
}
