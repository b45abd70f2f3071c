import { Command, Option } from 'commander';
import chalk from 'chalk';
import { initLogger, LOG_LEVELS } from '@todo-console/core';
import { resolveConfig, parseLogLevel } from './config.js';
import type { CliOptions } from './config.js';
import { createMenuCommand, runMenu } from './commands/menu.js';
import { createDemoCommand } from './commands/demo.js';
import { $try } from './helpers.js';

export const VERSION = '1.0.0';

export function createProgram(): Command {
  const program = new Command()
    .name('todo')
    .description('In-memory console todo manager')
    .version(VERSION)
    .addOption(
      new Option('--log-level <level>', `Diagnostic log level (${LOG_LEVELS.join(', ')})`)
        .argParser(parseLogLevel),
    )
    .option('--no-color', 'Disable coloured output');

  // Apply configuration before any command runs
  program.hook('preAction', (thisCommand: Command) => {
    const config = resolveConfig(thisCommand.opts<CliOptions>());
    if (!config.color) chalk.level = 0;
    initLogger({ level: config.logLevel }).debug({ config }, 'configuration resolved');
  });

  program.addCommand(createMenuCommand());
  program.addCommand(createDemoCommand());

  // Default action (no command): interactive menu
  program.action(() => $try(() => runMenu()));

  return program;
}
