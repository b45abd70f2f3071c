import { TaskStatus } from './task-status.js';

export type TaskId = number;

/**
 * A single todo item.
 *
 * The entity trusts its inputs: titles and descriptions are validated by
 * TaskService before they reach the constructor or the update methods.
 */
export class Task {
  readonly id: TaskId;
  readonly createdAt: Date;
  private _title: string;
  private _description: string;
  private _status: TaskStatus;

  constructor(
    id: TaskId,
    title: string,
    description = '',
    status: TaskStatus = TaskStatus.Incomplete,
    createdAt: Date = new Date(),
  ) {
    this.id = id;
    this._title = title;
    this._description = description;
    this._status = status;
    this.createdAt = createdAt;
  }

  get title(): string {
    return this._title;
  }

  get description(): string {
    return this._description;
  }

  get status(): TaskStatus {
    return this._status;
  }

  updateTitle(newTitle: string): void {
    this._title = newTitle;
  }

  updateDescription(newDescription: string): void {
    this._description = newDescription;
  }

  markComplete(): void {
    this._status = TaskStatus.Complete;
  }

  markIncomplete(): void {
    this._status = TaskStatus.Incomplete;
  }

  isComplete(): boolean {
    return this._status === TaskStatus.Complete;
  }

  toString(): string {
    const symbol = this.isComplete() ? '✓' : '○';
    return `[${this.id}] ${symbol} ${this._title}`;
  }
}
