#!/usr/bin/env node

import { closeLogger } from '@todo-console/core';
import { createProgram } from './program.js';
import { reportError } from './helpers.js';

try {
  await createProgram().parseAsync(process.argv);
} catch (err: unknown) {
  reportError(err);
  process.exitCode = 1;
} finally {
  closeLogger();
}
