import { Command } from 'commander';
import type { TaskService } from '@taskboard/core';
import * as out from '../output.js';
import { $try } from '../helpers.js';

export function createStatsCommand(service: TaskService): Command {
  return new Command('stats')
    .description('Show task counts by status and priority')
    .action(() => $try(() => {
      out.printStatistics(service.statistics());
    }));
}
