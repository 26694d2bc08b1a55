import { Command } from 'commander';
import { startServer, type ServerConfig, type RunningServer } from '@taskboard/server';
import type { Logger } from '@taskboard/core';

interface ServeOptions {
  host?: string;
  port?: string;
}

export type StartServer = (config: ServerConfig, logger?: Logger) => Promise<RunningServer>;

export function createServeCommand(config: ServerConfig, start: StartServer = startServer): Command {
  return new Command('serve')
    .description('Start the REST API server')
    .option('-H, --host <host>', 'Interface to bind', config.host)
    .option('-P, --port <port>', 'Port to listen on', String(config.port))
    .action(async (opts: ServeOptions) => {
      const port = Number(opts.port ?? config.port);
      if (!Number.isInteger(port) || port < 0 || port > 65535) {
        throw new Error(`Invalid port '${opts.port}'`);
      }
      const running = await start({ ...config, host: opts.host ?? config.host, port });

      const shutdown = (signal: string): void => {
        running.logger.info({ signal }, 'Received shutdown signal');
        running.close().catch((err: unknown) => {
          running.logger.error({ err }, 'Error during shutdown');
          process.exitCode = 1;
        });
      };
      process.once('SIGINT', () => shutdown('SIGINT'));
      process.once('SIGTERM', () => shutdown('SIGTERM'));
    });
}
