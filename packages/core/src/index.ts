// Types
export * from './types/index.js';

// Errors
export {
  TaskboardError, ValidationError, NotFoundError, ConflictError, StorageError,
  isTaskboardError,
} from './errors.js';
export type { ErrorKind, ErrorDetails, FieldIssue } from './errors.js';

// Schema
export * from './schema/index.js';

// Database
export { createDb, createTestDb, getDefaultDbPath, getRawDb, closeDb, CREATE_SCHEMA_SQL } from './db.js';
export type { TaskboardDb } from './db.js';

// Validation
export {
  createTaskSchema, updateTaskSchema, taskFilterSchema,
  parseInput, zodErrorToIssues, formatIssues, isIsoTimestamp,
  TITLE_MAX_LENGTH, DESCRIPTION_MAX_LENGTH,
} from './validation/task-input.js';
export type { CreateTaskInput, UpdateTaskInput, TaskFilterInput } from './validation/task-input.js';

// Repository & service
export { SqliteTaskRepository, titleKey } from './repository/task-repository.js';
export type { TaskRepository } from './repository/task-repository.js';
export { TaskService } from './service/task-service.js';
export type { TaskServiceOptions } from './service/task-service.js';

// Logging
export { createLogger, createSilentLogger, LOG_LEVELS } from './logging/logger.js';
export type { Logger, LogLevel, LoggerOptions } from './logging/logger.js';
