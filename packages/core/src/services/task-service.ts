/**
 * Task service: validation and orchestration over a TaskStore.
 *
 * The only entry point the console front end calls. Typed errors
 * (ValidationError, TaskNotFoundError) originate here and nowhere else;
 * messages are plain text, formatting is left to the caller.
 */

import type { Logger } from 'pino';
import { Task } from '../types/task.js';
import type { TaskId } from '../types/task.js';
import { isSet } from '../types/field-update.js';
import type { FieldUpdate } from '../types/field-update.js';
import type { TaskStatistics } from '../types/statistics.js';
import type { TaskStore } from '../store/task-store.js';
import { TaskNotFoundError, ValidationError } from '../errors.js';
import { getLogger } from '../logger.js';

export const TITLE_MAX_LENGTH = 200;
export const DESCRIPTION_MAX_LENGTH = 500;

/** Length in code points, so an emoji counts as one character */
function charLength(s: string): number {
  return [...s].length;
}

export interface TaskServiceOptions {
  logger?: Logger;
  /** Clock used for createdAt on new tasks */
  now?: () => Date;
}

export interface TaskChanges {
  title?: FieldUpdate;
  description?: FieldUpdate;
}

export interface UpdateResult {
  readonly task: Task;
  readonly changed: boolean;
}

export class TaskService {
  private readonly log: Logger;
  private readonly now: () => Date;

  constructor(
    private readonly store: TaskStore,
    options: TaskServiceOptions = {},
  ) {
    this.log = options.logger ?? getLogger('service');
    this.now = options.now ?? (() => new Date());
  }

  // ---------------------------------------------------------------------------
  // Validation
  // ---------------------------------------------------------------------------

  /** Returns the trimmed title */
  validateTitle(raw: string): string {
    const trimmed = raw.trim();
    if (trimmed.length === 0) {
      this.rejected('title', 'empty');
      throw new ValidationError('Task title cannot be empty');
    }
    if (charLength(trimmed) > TITLE_MAX_LENGTH) {
      this.rejected('title', 'too long');
      throw new ValidationError(`Task title exceeds ${TITLE_MAX_LENGTH} characters`);
    }
    return trimmed;
  }

  /** Returns the trimmed description; absent or empty input becomes '' */
  validateDescription(raw?: string): string {
    if (!raw) return '';

    const trimmed = raw.trim();
    if (charLength(trimmed) > DESCRIPTION_MAX_LENGTH) {
      this.rejected('description', 'too long');
      throw new ValidationError(`Description exceeds ${DESCRIPTION_MAX_LENGTH} characters`);
    }
    return trimmed;
  }

  validateTaskId(id: TaskId): void {
    if (!this.store.exists(id)) {
      throw new TaskNotFoundError(id);
    }
  }

  // ---------------------------------------------------------------------------
  // CRUD
  // ---------------------------------------------------------------------------

  addTask(title: string, description = ''): Task {
    const validTitle = this.validateTitle(title);
    const validDescription = this.validateDescription(description);

    const task = new Task(this.store.reserveNextId(), validTitle, validDescription, undefined, this.now());
    this.store.add(task);
    this.log.debug({ taskId: task.id }, 'task added');
    return task;
  }

  /** All tasks, ascending by id */
  getAllTasks(): Task[] {
    return this.store.listAll();
  }

  getTask(id: TaskId): Task {
    const task = this.store.get(id);
    if (!task) throw new TaskNotFoundError(id);
    return task;
  }

  /**
   * Apply the requested field changes. Both fields are validated before
   * either is applied; a value equal to the current one (after trimming)
   * does not count as a change.
   */
  updateTask(id: TaskId, changes: TaskChanges = {}): UpdateResult {
    const task = this.getTask(id);

    const title = changes.title && isSet(changes.title)
      ? this.validateTitle(changes.title.value)
      : null;
    const description = changes.description && isSet(changes.description)
      ? this.validateDescription(changes.description.value)
      : null;

    let changed = false;
    if (title !== null && title !== task.title) {
      task.updateTitle(title);
      changed = true;
    }
    if (description !== null && description !== task.description) {
      task.updateDescription(description);
      changed = true;
    }

    if (changed) this.log.debug({ taskId: id }, 'task updated');
    return { task, changed };
  }

  /** Remove the task for good and hand it back for confirmation display */
  deleteTask(id: TaskId): Task {
    const task = this.getTask(id);
    this.store.remove(id);
    this.log.debug({ taskId: id }, 'task deleted');
    return task;
  }

  // ---------------------------------------------------------------------------
  // Status
  // ---------------------------------------------------------------------------

  markComplete(id: TaskId): Task {
    const task = this.getTask(id);
    if (task.isComplete()) {
      throw new ValidationError('Task is already complete');
    }
    task.markComplete();
    this.log.debug({ taskId: id, status: task.status }, 'task status changed');
    return task;
  }

  markIncomplete(id: TaskId): Task {
    const task = this.getTask(id);
    if (!task.isComplete()) {
      throw new ValidationError('Task is already incomplete');
    }
    task.markIncomplete();
    this.log.debug({ taskId: id, status: task.status }, 'task status changed');
    return task;
  }

  getStatistics(): TaskStatistics {
    const tasks = this.store.listAll();
    const completed = tasks.filter(t => t.isComplete()).length;
    return { total: tasks.length, completed, remaining: tasks.length - completed };
  }

  private rejected(field: string, reason: string): void {
    this.log.debug({ field, reason }, 'validation failed');
  }
}
