/**
 * Interactive menu loop over a TaskService.
 *
 * Raw input goes to the service unmodified; the service owns trimming and
 * validation. Domain errors are reported and the loop returns to the menu.
 */

import chalk from 'chalk';
import { set, keep, getLogger } from '@todo-console/core';
import type { TaskService, TaskId } from '@todo-console/core';
import type { Prompter } from './prompter.js';
import * as out from './output.js';
import { parseInteger, parseMenuChoice, parseConfirmation, reportError } from './helpers.js';

export const MenuChoice = {
  Add: 1,
  View: 2,
  Update: 3,
  Delete: 4,
  Toggle: 5,
  Exit: 6,
} as const;

export type MenuChoice = (typeof MenuChoice)[keyof typeof MenuChoice];

const MENU_ITEMS: ReadonlyArray<[MenuChoice, string]> = [
  [MenuChoice.Add, 'Add Task'],
  [MenuChoice.View, 'View Tasks'],
  [MenuChoice.Update, 'Update Task'],
  [MenuChoice.Delete, 'Delete Task'],
  [MenuChoice.Toggle, 'Mark Task Complete/Incomplete'],
  [MenuChoice.Exit, 'Exit'],
];

const BANNER = '========== TODO APPLICATION ==========';

/** Thrown when input ends mid-prompt; unwinds the current action */
export class InputClosedError extends Error {
  constructor() {
    super('Input closed');
    this.name = 'InputClosedError';
  }
}

interface TextInputOptions {
  required?: boolean;
}

export class TodoApp {
  private readonly log = getLogger('cli');

  constructor(
    private readonly service: TaskService,
    private readonly prompter: Prompter,
  ) {}

  async run(): Promise<void> {
    console.log();
    console.log(chalk.bold(BANNER));
    out.info('Welcome to your Todo application!');
    out.blank();

    try {
      for (;;) {
        this.showMenu();
        const choice = await this.readMenuChoice();
        if (choice === MenuChoice.Exit) break;

        try {
          await this.execute(choice);
        } catch (err: unknown) {
          if (err instanceof InputClosedError) throw err;
          this.log.debug({ err, choice }, 'action failed');
          out.blank();
          reportError(err);
        }
        out.blank();
      }
    } catch (err: unknown) {
      if (!(err instanceof InputClosedError)) throw err;
    }

    out.blank();
    out.info('Goodbye!');
  }

  // --- Menu ---

  showMenu(): void {
    console.log(chalk.bold(BANNER));
    for (const [choice, label] of MENU_ITEMS) {
      out.info(`${choice}. ${label}`);
    }
    out.blank();
  }

  async execute(choice: MenuChoice): Promise<void> {
    switch (choice) {
      case MenuChoice.Add: return this.addTask();
      case MenuChoice.View: return this.viewTasks();
      case MenuChoice.Update: return this.updateTask();
      case MenuChoice.Delete: return this.deleteTask();
      case MenuChoice.Toggle: return this.toggleStatus();
      case MenuChoice.Exit: return;
    }
  }

  // --- Actions ---

  async addTask(): Promise<void> {
    out.heading('Add Task');
    const title = await this.readText('Enter task title: ', { required: true });
    const description = await this.readText('Enter task description (press Enter to skip): ');

    const task = this.service.addTask(title, description);

    out.success(`✓ Task created with ID: ${task.id}`);
    out.info(`Task: "${task.title}" [${task.status}]`);
  }

  viewTasks(): void {
    out.heading('Your Tasks');
    const tasks = this.service.getAllTasks();

    if (tasks.length === 0) {
      out.info('No tasks yet');
      return;
    }

    out.printTaskTable(tasks, this.service.getStatistics());
  }

  async updateTask(): Promise<void> {
    out.heading('Update Task');
    const taskId = await this.readTaskId('Enter task ID to update: ');

    const task = this.service.getTask(taskId);
    out.info(`Current task: ${out.formatTaskSummary(task)}`);
    out.blank();

    // Empty input keeps the current value
    const newTitle = await this.readText('Enter new title (press Enter to keep current): ');
    const newDescription = await this.readText('Enter new description (press Enter to keep current): ');

    const { task: updated, changed } = this.service.updateTask(taskId, {
      title: newTitle ? set(newTitle) : keep(),
      description: newDescription ? set(newDescription) : keep(),
    });

    if (!changed) {
      out.info('No changes made. Task remains unchanged');
      return;
    }
    out.success(`✓ Task ${taskId} updated successfully`);
    out.info(`Updated task: ${out.formatTaskSummary(updated)}`);
  }

  async deleteTask(): Promise<void> {
    out.heading('Delete Task');
    const taskId = await this.readTaskId('Enter task ID to delete: ');

    const task = this.service.getTask(taskId);
    const suffix = task.description ? ` (${task.description})` : '';
    out.info(`Delete task? "${task.title}"${suffix}`);

    if (await this.readConfirmation()) {
      this.service.deleteTask(taskId);
      out.success(`✓ Task ${taskId} deleted successfully`);
    } else {
      out.info('Deletion cancelled. Task remains');
    }
  }

  async toggleStatus(): Promise<void> {
    out.heading('Mark Task Complete/Incomplete');
    const taskId = await this.readTaskId('Enter task ID: ');

    const task = this.service.getTask(taskId);
    out.info(`Current status: ${out.statusLabel(task)}`);
    out.blank();
    out.info('1. Mark Complete');
    out.info('2. Mark Incomplete');
    out.blank();

    const choice = await this.readUntil('Choose (1-2): ', raw => parseMenuChoice(raw, 2), 'Error: Please enter 1 or 2');
    const updated = choice === 1
      ? this.service.markComplete(taskId)
      : this.service.markIncomplete(taskId);

    out.success(`✓ Task ${taskId} marked as ${updated.status}`);
    out.info(`New status: ${out.statusLabel(updated)}`);
  }

  // --- Input ---

  private async read(question: string): Promise<string> {
    const line = await this.prompter.ask(question);
    if (line === null) throw new InputClosedError();
    return line;
  }

  /** Ask until parse() accepts the answer, printing errorMessage on each miss */
  private async readUntil<T>(
    question: string,
    parse: (raw: string) => T | null,
    errorMessage: string,
  ): Promise<T> {
    for (;;) {
      const value = parse(await this.read(question));
      if (value !== null) return value;
      out.error(errorMessage);
    }
  }

  private readMenuChoice(): Promise<MenuChoice> {
    return this.readUntil(
      `Choose an option (1-${MENU_ITEMS.length}): `,
      raw => toMenuChoice(parseMenuChoice(raw, MENU_ITEMS.length)),
      `Error: Please enter a number between 1 and ${MENU_ITEMS.length}`,
    );
  }

  private readTaskId(question: string): Promise<TaskId> {
    return this.readUntil(question, parseInteger, 'Error: Task ID must be a number');
  }

  private readConfirmation(): Promise<boolean> {
    return this.readUntil('Confirm? (y/n): ', parseConfirmation, "Error: Please enter 'y' or 'n'");
  }

  private async readText(question: string, opts: TextInputOptions = {}): Promise<string> {
    for (;;) {
      const value = await this.read(question);
      if (opts.required && !value.trim()) {
        out.error('Error: Input cannot be empty');
        continue;
      }
      return value;
    }
  }
}

function toMenuChoice(value: number | null): MenuChoice | null {
  for (const [choice] of MENU_ITEMS) {
    if (choice === value) return choice;
  }
  return null;
}
