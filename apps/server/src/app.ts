import express, { type Express } from 'express';
import type { TaskService, Logger } from '@taskboard/core';
import { API_PREFIX, type ServerConfig } from './config.js';
import { createTaskRouter } from './routes/tasks.js';
import { createSystemRouter } from './routes/system.js';
import { requestLogger } from './middleware/request-logger.js';
import { errorHandler, notFoundHandler } from './middleware/error-handler.js';

export interface AppDeps {
  service: TaskService;
  config: ServerConfig;
  logger: Logger;
}

export function createApp({ service, config, logger }: AppDeps): Express {
  const app = express();
  app.disable('x-powered-by');

  app.use(requestLogger(logger));
  app.use(express.json());

  app.use(createSystemRouter(config));
  app.use(`${API_PREFIX}/tasks`, createTaskRouter(service));

  app.use(notFoundHandler);
  app.use(errorHandler(logger));

  return app;
}
