#!/usr/bin/env node

import { loadConfig } from './config.js';
import { startServer } from './server.js';

const config = loadConfig();
const running = await startServer(config);

function shutdown(signal: string): void {
  running.logger.info({ signal }, 'Received shutdown signal');
  running.close().then(
    () => process.exit(0),
    (err: unknown) => {
      running.logger.error({ err }, 'Error during shutdown');
      process.exit(1);
    },
  );
}

process.once('SIGINT', () => shutdown('SIGINT'));
process.once('SIGTERM', () => shutdown('SIGTERM'));
