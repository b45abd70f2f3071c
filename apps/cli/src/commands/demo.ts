/**
 * Non-interactive walkthrough of every feature against a fresh store.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { TaskService, TaskStore, set, isTodoError } from '@todo-console/core';
import * as out from '../output.js';
import { $try } from '../helpers.js';

function section(title: string): void {
  out.blank();
  console.log(chalk.bold(`== ${title} ==`));
}

/** Run fn, expecting a domain error, and print what was caught */
function expectRejection(label: string, fn: () => unknown): void {
  try {
    fn();
    out.warning(`${label}: accepted`);
  } catch (err: unknown) {
    if (!isTodoError(err)) throw err;
    out.success(`${label}: ${err.message}`);
  }
}

export function runDemo(createService: () => TaskService = () => new TaskService(new TaskStore())): void {
  section('Add and view tasks');
  const service = createService();
  for (const [title, description] of [
    ['Buy groceries', 'Milk, eggs, bread'],
    ['Call dentist', ''],
    ['Finish project', 'Due Friday'],
  ] as const) {
    const task = service.addTask(title, description);
    out.success(`Created task ${task.id}: ${task.title}`);
  }
  out.printTaskTable(service.getAllTasks(), service.getStatistics());

  section('Update a task');
  const { task: updated, changed } = service.updateTask(1, { title: set('Get groceries') });
  out.info(`${updated.toString()} (changed: ${changed})`);

  section('Mark complete and incomplete');
  out.info(service.markComplete(1).toString());
  out.info(service.markIncomplete(1).toString());
  service.markComplete(1);
  service.markComplete(3);
  out.info(out.formatStatistics(service.getStatistics()));

  section('Delete a task');
  const deleted = service.deleteTask(2);
  out.success(`Deleted: ${deleted.title}`);
  for (const task of service.getAllTasks()) {
    out.info(`  ${task.toString()}`);
  }

  section('Rejected input');
  const fresh = createService();
  expectRejection('Empty title', () => fresh.addTask(''));
  expectRejection('Title over 200 characters', () => fresh.addTask('x'.repeat(201)));
  expectRejection('Description over 500 characters', () => fresh.addTask('Task', 'y'.repeat(501)));
  const probe = fresh.addTask('Test Task');
  expectRejection('Unknown id', () => fresh.getTask(999));
  fresh.markComplete(probe.id);
  expectRejection('Complete twice', () => fresh.markComplete(probe.id));
  fresh.markIncomplete(probe.id);
  expectRejection('Incomplete twice', () => fresh.markIncomplete(probe.id));

  section('Ids are never reused');
  const ids = createService();
  for (let i = 1; i <= 5; i++) ids.addTask(`Task ${i}`);
  ids.deleteTask(2);
  const next = ids.addTask('Task 6');
  out.info(`After deleting 2, the next task got id ${next.id}`);
  out.info(`Ids: ${ids.getAllTasks().map(t => t.id).join(', ')}`);
}

export function createDemoCommand(): Command {
  return new Command('demo')
    .description('Walk through every feature without prompting')
    .action(() => $try(() => runDemo()));
}
