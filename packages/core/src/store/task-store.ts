/**
 * In-memory task repository.
 *
 * Owns the id → Task map and the next-id counter. Ids start at 1, only ever
 * increase, and are never reused: removing a task leaves a permanent gap.
 * Nothing here throws; absence is reported through return values.
 */

import type { Task, TaskId } from '../types/task.js';

const FIRST_ID: TaskId = 1;

export class TaskStore {
  private readonly tasks = new Map<TaskId, Task>();
  private counter: TaskId = FIRST_ID;

  /**
   * Insert a task under its own id. A task built elsewhere with an id at or
   * past the counter moves the counter past it.
   */
  add(task: Task): Task {
    this.tasks.set(task.id, task);
    if (task.id + 1 > this.counter) {
      this.counter = task.id + 1;
    }
    return task;
  }

  get(id: TaskId): Task | null {
    return this.tasks.get(id) ?? null;
  }

  /** All tasks, ascending by id */
  listAll(): Task[] {
    return [...this.tasks.values()].sort((a, b) => a.id - b.id);
  }

  /** Returns false when there was nothing to remove */
  remove(id: TaskId): boolean {
    return this.tasks.delete(id);
  }

  exists(id: TaskId): boolean {
    return this.tasks.has(id);
  }

  nextId(): TaskId {
    return this.counter;
  }

  reserveNextId(): TaskId {
    const id = this.counter;
    this.counter += 1;
    return id;
  }

  clear(): void {
    this.tasks.clear();
    this.counter = FIRST_ID;
  }
}
