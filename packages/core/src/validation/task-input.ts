/**
 * Zod schemas for caller-provided task data.
 *
 * Inputs use the wire (snake_case) field names so HTTP bodies, query strings
 * and CLI options can be validated as they arrive.
 */

import { z, type ZodError, type ZodTypeAny } from 'zod';
import { TASK_STATUSES } from '../types/task-status.js';
import { PRIORITIES } from '../types/priority.js';
import { ValidationError, type FieldIssue } from '../errors.js';

export const TITLE_MAX_LENGTH = 200;
export const DESCRIPTION_MAX_LENGTH = 1000;

const ISO_8601_RE = /^(\d{4})-(\d{2})-(\d{2})(T\d{2}:\d{2}(:\d{2}(\.\d{1,9})?)?(Z|[+-]\d{2}:\d{2})?)?$/;

/** ISO-8601 date or date-time naming a real calendar day (no 02-30 rolling into March) */
export function isIsoTimestamp(value: string): boolean {
  const match = ISO_8601_RE.exec(value);
  if (!match || Number.isNaN(Date.parse(value))) return false;

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const calendar = new Date(Date.UTC(year, month - 1, day));
  return calendar.getUTCFullYear() === year
    && calendar.getUTCMonth() === month - 1
    && calendar.getUTCDate() === day;
}

const title = z
  .string({ required_error: 'is required', invalid_type_error: 'must be a string' })
  .trim()
  .min(1, 'must not be empty')
  .max(TITLE_MAX_LENGTH, `must be at most ${TITLE_MAX_LENGTH} characters`);

const description = z
  .string({ invalid_type_error: 'must be a string' })
  .max(DESCRIPTION_MAX_LENGTH, `must be at most ${DESCRIPTION_MAX_LENGTH} characters`)
  .nullable();

const status = z.enum(TASK_STATUSES, {
  errorMap: () => ({ message: `must be one of: ${TASK_STATUSES.join(', ')}` }),
});

const priority = z.enum(PRIORITIES, {
  errorMap: () => ({ message: `must be one of: ${PRIORITIES.join(', ')}` }),
});

/** Normalized to a UTC ISO string */
const dueDate = z
  .string({ invalid_type_error: 'must be an ISO-8601 timestamp' })
  .refine(isIsoTimestamp, 'must be an ISO-8601 timestamp')
  .transform(value => new Date(value).toISOString())
  .nullable();

export const createTaskSchema = z.object({
  title,
  description: description.optional(),
  status: status.optional(),
  priority: priority.optional(),
  due_date: dueDate.optional(),
});

export const updateTaskSchema = z.object({
  title: title.optional(),
  description: description.optional(),
  status: status.optional(),
  priority: priority.optional(),
  due_date: dueDate.optional(),
});

export const taskFilterSchema = z.object({
  status: status.optional(),
  priority: priority.optional(),
});

/** Shape of a stored task; used to re-check state before it is persisted */
export const taskRecordSchema = z.object({
  id: z.string().min(1),
  title,
  description,
  status,
  priority,
  dueDate: z.string().refine(isIsoTimestamp, 'must be an ISO-8601 timestamp').nullable(),
  createdAt: z.string().refine(isIsoTimestamp, 'must be an ISO-8601 timestamp'),
  updatedAt: z.string().refine(isIsoTimestamp, 'must be an ISO-8601 timestamp'),
}).refine(task => task.updatedAt >= task.createdAt, {
  message: 'must not be earlier than createdAt',
  path: ['updatedAt'],
});

/** Raw create payload, before validation */
export interface CreateTaskInput {
  title: string;
  description?: string | null;
  status?: string;
  priority?: string;
  due_date?: string | null;
}

/** Raw update payload, before validation. Absent fields are left unchanged */
export type UpdateTaskInput = Partial<CreateTaskInput>;

export interface TaskFilterInput {
  status?: string;
  priority?: string;
}

export type ValidCreateTask = z.output<typeof createTaskSchema>;
export type ValidUpdateTask = z.output<typeof updateTaskSchema>;

/**
 * Convert Zod error to FieldIssue array
 */
export function zodErrorToIssues(error: ZodError, root = 'body'): FieldIssue[] {
  return error.errors.map((issue) => ({
    path: issue.path.join('.') || root,
    message: issue.message,
    code: issue.code,
  }));
}

/**
 * Format issues into a human-readable message
 */
export function formatIssues(issues: FieldIssue[]): string {
  return issues.map((i) => `${i.path}: ${i.message}`).join('; ');
}

/** Parse `data` with `schema`, throwing ValidationError on failure */
export function parseInput<T extends ZodTypeAny>(schema: T, data: unknown, root = 'body'): z.output<T> {
  const result = schema.safeParse(data);
  if (!result.success) {
    const issues = zodErrorToIssues(result.error, root);
    throw new ValidationError(formatIssues(issues), issues);
  }
  return result.data;
}
