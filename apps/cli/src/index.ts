#!/usr/bin/env node

import {
  createDb, createLogger, createSilentLogger, SqliteTaskRepository, TaskService,
} from '@taskboard/core';
import { loadConfig } from '@taskboard/server';
import { createProgram } from './program.js';

const config = loadConfig();

// Terminal output stays clean unless a log level is asked for explicitly
const logger = process.env['LOG_LEVEL']
  ? createLogger({ level: config.logLevel, name: 'taskboard-cli', pretty: true })
  : createSilentLogger();

const db = createDb(config.databasePath);
const service = new TaskService(new SqliteTaskRepository(db, logger), { logger });

await createProgram({ service, config }).parseAsync();
