export { TaskStatus } from './task-status.js';
export { Task } from './task.js';
export type { TaskId } from './task.js';
export { keep, set, isSet } from './field-update.js';
export type { FieldUpdate } from './field-update.js';
export type { TaskStatistics } from './statistics.js';
