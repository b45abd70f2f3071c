/**
 * Typed errors raised by the task service and caught by the console front end.
 */

import type { TaskId } from './types/task.js';

export type TodoErrorCode = 'validation' | 'not-found';

export class TodoError extends Error {
  constructor(
    public readonly code: TodoErrorCode,
    message: string,
  ) {
    super(message);
    this.name = 'TodoError';
  }
}

/** Input broke a business rule (field constraints or an illegal status transition). */
export class ValidationError extends TodoError {
  constructor(message: string) {
    super('validation', message);
    this.name = 'ValidationError';
  }
}

export class TaskNotFoundError extends TodoError {
  constructor(public readonly taskId: TaskId) {
    super('not-found', `Task ID ${taskId} not found`);
    this.name = 'TaskNotFoundError';
  }
}

export function isTodoError(err: unknown): err is TodoError {
  return err instanceof TodoError;
}
