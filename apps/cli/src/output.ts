/**
 * chalk-based output formatting.
 */

import chalk from 'chalk';
import {
  TaskStatus, Priority, TaskStatusName, PriorityName,
  type Task, type TaskStatistics,
} from '@taskboard/core';

// --- Formatting functions ---

export function formatCheckbox(status: TaskStatus): string {
  switch (status) {
    case TaskStatus.Completed: return chalk.green('[x]');
    case TaskStatus.InProgress: return chalk.yellow('[-]');
    default: return chalk.gray('[ ]');
  }
}

export function formatPriority(priority: Priority): string {
  switch (priority) {
    case Priority.High: return chalk.red.bold('>>>');
    case Priority.Medium: return chalk.yellow('>> ');
    default: return chalk.blue('>  ');
  }
}

/** Date part of the due date; overdue open tasks are flagged */
export function formatDueDate(task: Task, now: Date = new Date()): string {
  if (!task.dueDate) return '';
  const day = task.dueDate.slice(0, 10);
  if (task.status !== TaskStatus.Completed && task.dueDate < now.toISOString()) {
    return chalk.red(`  OVERDUE (${day})`);
  }
  return chalk.dim(`  Due: ${day}`);
}

export function formatTaskLine(task: Task, now?: Date): string {
  const id = chalk.dim(`(${task.id})`);
  return `${id} ${formatPriority(task.priority)} ${formatCheckbox(task.status)} ${chalk.bold(task.title)}${formatDueDate(task, now)}`;
}

// --- Task output ---

export function printTasks(tasks: Task[], emptyMessage: string): void {
  if (tasks.length === 0) {
    info(emptyMessage);
    return;
  }
  for (const task of tasks) console.log(formatTaskLine(task));
}

export function printTaskDetails(task: Task): void {
  console.log(chalk.bold.underline(task.title));
  console.log(`  Id:          ${task.id}`);
  console.log(`  Status:      ${TaskStatusName[task.status]}`);
  console.log(`  Priority:    ${PriorityName[task.priority]}`);
  if (task.description) console.log(`  Description: ${task.description}`);
  if (task.dueDate) console.log(`  Due:         ${task.dueDate}`);
  console.log(`  Created:     ${task.createdAt}`);
  console.log(`  Updated:     ${task.updatedAt}`);
}

export function printStatistics(stats: TaskStatistics): void {
  console.log(chalk.bold.underline('Tasks'));
  console.log();
  console.log(`  Total: ${chalk.bold(String(stats.total))}`);
  for (const status of [TaskStatus.Pending, TaskStatus.InProgress, TaskStatus.Completed]) {
    console.log(`  ${TaskStatusName[status]}: ${stats.byStatus[status]}`);
  }
  console.log();
  console.log(chalk.bold.underline('Priority'));
  console.log();
  for (const priority of [Priority.High, Priority.Medium, Priority.Low]) {
    console.log(`  ${PriorityName[priority]}: ${stats.byPriority[priority]}`);
  }
  console.log();
  const overdue = stats.overdue > 0 ? chalk.red(String(stats.overdue)) : chalk.dim('0');
  console.log(`  Overdue: ${overdue}`);
}

// --- Basic output ---

export function success(message: string): void {
  console.log(chalk.green(message));
}

export function error(message: string): void {
  console.log(chalk.red(message));
}

export function warning(message: string): void {
  console.log(chalk.yellow(message));
}

export function info(message: string): void {
  console.log(message);
}
