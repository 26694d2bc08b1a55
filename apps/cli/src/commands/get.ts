import { Command } from 'commander';
import type { TaskService } from '@taskboard/core';
import * as out from '../output.js';
import { $try } from '../helpers.js';

export function createGetCommand(service: TaskService): Command {
  return new Command('get')
    .description('Show the details of a task')
    .argument('<taskId>', 'The id of the task')
    .action((taskId: string) => $try(() => {
      out.printTaskDetails(service.get(taskId));
    }));
}
