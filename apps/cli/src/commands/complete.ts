import { Command } from 'commander';
import { TaskStatus, type TaskService } from '@taskboard/core';
import * as out from '../output.js';
import { $try } from '../helpers.js';

export function createCompleteCommand(service: TaskService): Command {
  return new Command('complete')
    .description('Mark one or more tasks as completed')
    .argument('<taskIds...>', 'The id(s) of the task(s) to complete')
    .action((taskIds: string[]) => {
      for (const id of taskIds) {
        $try(() => {
          if (service.get(id).status === TaskStatus.Completed) {
            out.info(`Task '${id}' is already completed`);
            return;
          }
          const task = service.complete(id);
          out.success(`Completed '${task.title}'`);
        });
      }
    });
}
