import { Command } from 'commander';
import type { TaskService } from '@taskboard/core';
import * as out from '../output.js';
import { $try } from '../helpers.js';

export function createDeleteCommand(service: TaskService): Command {
  return new Command('delete')
    .description('Delete one or more tasks')
    .argument('<taskIds...>', 'The id(s) of the task(s) to delete')
    .action((taskIds: string[]) => {
      for (const id of taskIds) {
        $try(() => {
          service.delete(id);
          out.success(`Deleted task '${id}'`);
        });
      }
    });
}
