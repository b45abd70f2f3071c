import { Command } from 'commander';
import { TaskService, TaskStore } from '@todo-console/core';
import { TodoApp } from '../app.js';
import { ReadlinePrompter } from '../prompter.js';
import type { Prompter } from '../prompter.js';
import { $try } from '../helpers.js';

/** Run the menu against a fresh in-memory store until Exit or end of input */
export async function runMenu(prompter: Prompter = new ReadlinePrompter()): Promise<void> {
  const service = new TaskService(new TaskStore());
  try {
    await new TodoApp(service, prompter).run();
  } finally {
    prompter.close();
  }
}

export function createMenuCommand(): Command {
  return new Command('menu')
    .description('Run the interactive todo menu (default)')
    .action(() => $try(() => runMenu()));
}
