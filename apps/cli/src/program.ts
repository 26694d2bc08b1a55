import { Command } from 'commander';
import type { TaskService } from '@taskboard/core';
import type { ServerConfig } from '@taskboard/server';

import { createAddCommand } from './commands/add.js';
import { createListCommand } from './commands/list.js';
import { createGetCommand } from './commands/get.js';
import { createUpdateCommand } from './commands/update.js';
import { createCompleteCommand } from './commands/complete.js';
import { createDeleteCommand } from './commands/delete.js';
import { createStatsCommand } from './commands/stats.js';
import { createServeCommand, type StartServer } from './commands/serve.js';

export interface CliContext {
  service: TaskService;
  config: ServerConfig;
  /** Replaces startServer for the serve command */
  startServer?: StartServer;
}

export function createProgram(ctx: CliContext): Command {
  const program = new Command()
    .name('taskboard')
    .description('Manage tasks from the terminal or serve them over HTTP')
    .version(ctx.config.appVersion);

  program.addCommand(createAddCommand(ctx.service));
  program.addCommand(createListCommand(ctx.service));
  program.addCommand(createGetCommand(ctx.service));
  program.addCommand(createUpdateCommand(ctx.service));
  program.addCommand(createCompleteCommand(ctx.service));
  program.addCommand(createDeleteCommand(ctx.service));
  program.addCommand(createStatsCommand(ctx.service));
  program.addCommand(createServeCommand(ctx.config, ctx.startServer));

  return program;
}
