// Types
export { TaskStatus, Task, keep, set, isSet } from './types/index.js';
export type { TaskId, FieldUpdate, TaskStatistics } from './types/index.js';

// Errors
export { TodoError, ValidationError, TaskNotFoundError, isTodoError } from './errors.js';
export type { TodoErrorCode } from './errors.js';

// Store
export { TaskStore } from './store/task-store.js';

// Service
export { TaskService, TITLE_MAX_LENGTH, DESCRIPTION_MAX_LENGTH } from './services/task-service.js';
export type { TaskServiceOptions, TaskChanges, UpdateResult } from './services/task-service.js';

// Logging
export { createLogger, initLogger, getLogger, closeLogger, isLogLevel, LOG_LEVELS } from './logger.js';
export type { LogLevel, LoggerConfig } from './logger.js';
