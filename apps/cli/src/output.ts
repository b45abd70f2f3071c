/**
 * chalk-based output formatting for the console menu.
 */

import chalk from 'chalk';
import type { Task, TaskStatistics } from '@todo-console/core';

const SYMBOL_COMPLETE = '✓';
const SYMBOL_INCOMPLETE = '○';
const RULE_WIDTH = 70;
const DESCRIPTION_WIDTH = 30;

// --- Formatting functions ---

export function statusSymbol(task: Task): string {
  return task.isComplete() ? SYMBOL_COMPLETE : SYMBOL_INCOMPLETE;
}

export function statusLabel(task: Task): string {
  return task.isComplete()
    ? `${SYMBOL_COMPLETE} complete`
    : `${SYMBOL_INCOMPLETE} incomplete`;
}

/** `"title" (description)`, or `"title" (no description)` */
export function formatTaskSummary(task: Task): string {
  const description = task.description ? task.description : 'no description';
  return `"${task.title}" (${description})`;
}

export function formatTableHeader(): string {
  return `${'ID'.padEnd(4)} ${'Status'.padEnd(8)} ${'Title'.padEnd(25)} ${'Description'.padEnd(DESCRIPTION_WIDTH)}`.trimEnd();
}

export function formatTaskRow(task: Task): string {
  const description = truncate(task.description || '(no description)', DESCRIPTION_WIDTH);
  const status = task.isComplete() ? chalk.green(statusSymbol(task)) : chalk.gray(statusSymbol(task));
  // pad before colouring so escape codes don't count towards the width
  const statusCell = status + ' '.repeat(8 - statusSymbol(task).length);
  return `${String(task.id).padEnd(4)} ${statusCell} ${pad(task.title, 25)} ${description}`.trimEnd();
}

export function formatStatistics(stats: TaskStatistics): string {
  return `Total: ${stats.total} tasks | Completed: ${stats.completed} | Remaining: ${stats.remaining}`;
}

export function rule(): string {
  return '-'.repeat(RULE_WIDTH);
}

// --- Blocks ---

export function printTaskTable(tasks: readonly Task[], stats: TaskStatistics): void {
  console.log();
  console.log(chalk.bold(formatTableHeader()));
  console.log(rule());
  for (const task of tasks) {
    console.log(formatTaskRow(task));
  }
  console.log(rule());
  console.log(formatStatistics(stats));
}

export function heading(title: string): void {
  console.log();
  console.log(chalk.bold(`--- ${title} ---`));
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

export function blank(): void {
  console.log();
}

// --- Utilities ---

// Widths count code points so a surrogate pair is never split

export function truncate(s: string, maxLen: number): string {
  const chars = [...s];
  if (chars.length <= maxLen) return s;
  return chars.slice(0, maxLen - 3).join('') + '...';
}

export function pad(s: string, width: number): string {
  return s + ' '.repeat(Math.max(0, width - [...s].length));
}
