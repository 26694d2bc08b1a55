/**
 * Wires config, database, repository and service into a listening HTTP server.
 */

import type { Server } from 'node:http';
import {
  createDb, closeDb, createLogger, SqliteTaskRepository, TaskService,
  type TaskboardDb, type Logger,
} from '@taskboard/core';
import type { ServerConfig } from './config.js';
import { createApp } from './app.js';

export interface RunningServer {
  server: Server;
  db: TaskboardDb;
  logger: Logger;
  /** Actual port, useful when the configured port is 0 */
  port: number;
  close(): Promise<void>;
}

export async function startServer(config: ServerConfig, logger?: Logger): Promise<RunningServer> {
  const log = logger ?? createLogger({
    level: config.logLevel,
    name: config.appName.toLowerCase(),
    pretty: config.nodeEnv === 'development',
  });

  const db = createDb(config.databasePath);
  const repository = new SqliteTaskRepository(db, log);
  const service = new TaskService(repository, { logger: log });
  const app = createApp({ service, config, logger: log });

  let server: Server;
  try {
    server = await new Promise<Server>((resolve, reject) => {
      const s = app.listen(config.port, config.host, () => resolve(s));
      s.once('error', reject);
    });
  } catch (err: unknown) {
    closeDb(db);
    log.error({ err, host: config.host, port: config.port }, 'Failed to start server');
    throw err;
  }

  const address = server.address();
  const port = address !== null && typeof address === 'object' ? address.port : config.port;
  log.info({ host: config.host, port, database: config.databasePath }, `${config.appName} v${config.appVersion} listening`);

  return {
    server,
    db,
    logger: log,
    port,
    close: () => new Promise<void>((resolve, reject) => {
      server.close((err) => {
        closeDb(db);
        log.info(`Shutting down ${config.appName}`);
        if (err) reject(err);
        else resolve();
      });
    }),
  };
}
