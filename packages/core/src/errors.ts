/**
 * Error taxonomy shared by the service, the HTTP layer and the CLI.
 *
 * Every error carries a machine-readable `kind` and a `details` record that
 * is safe to show to API clients.
 */

export type ErrorKind = 'validation_error' | 'not_found' | 'conflict' | 'storage_error';

export type ErrorDetails = Record<string, unknown>;

export abstract class TaskboardError extends Error {
  abstract readonly kind: ErrorKind;
  readonly details: ErrorDetails;

  constructor(message: string, details: ErrorDetails = {}, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.details = details;
  }
}

/** Issue reported for a single invalid field */
export interface FieldIssue {
  path: string;
  message: string;
  code: string;
}

export class ValidationError extends TaskboardError {
  readonly kind = 'validation_error' as const;

  constructor(message: string, issues: FieldIssue[] = []) {
    super(message, issues.length > 0 ? { issues } : {});
  }
}

export class NotFoundError extends TaskboardError {
  readonly kind = 'not_found' as const;
  readonly taskId: string;

  constructor(taskId: string) {
    super(`Task with id '${taskId}' not found`, { task_id: taskId });
    this.taskId = taskId;
  }
}

export class ConflictError extends TaskboardError {
  readonly kind = 'conflict' as const;

  constructor(title: string) {
    super(`A task titled '${title}' already exists`, { title });
  }
}

/** The backing store failed; the original error is kept as `cause` */
export class StorageError extends TaskboardError {
  readonly kind = 'storage_error' as const;

  constructor(operation: string, cause: unknown) {
    super(`Storage failure during ${operation}`, { operation }, { cause });
  }
}

export function isTaskboardError(err: unknown): err is TaskboardError {
  return err instanceof TaskboardError;
}
