import { describe, it, expect, beforeEach } from 'vitest';
import { TaskStore } from '../../src/store/task-store.js';
import { TaskService, TITLE_MAX_LENGTH, DESCRIPTION_MAX_LENGTH } from '../../src/services/task-service.js';
import { TaskStatus } from '../../src/types/task-status.js';
import { Task } from '../../src/types/task.js';
import { keep, set } from '../../src/types/field-update.js';
import { ValidationError, TaskNotFoundError } from '../../src/errors.js';
import { createLogger } from '../../src/logger.js';

let store: TaskStore;
let service: TaskService;

beforeEach(() => {
  store = new TaskStore();
  service = new TaskService(store);
});

describe('validateTitle', () => {
  it('trims surrounding whitespace', () => {
    expect(service.validateTitle('  Buy milk  ')).toBe('Buy milk');
  });

  it('rejects empty and whitespace-only titles', () => {
    expect(() => service.validateTitle('')).toThrow(ValidationError);
    expect(() => service.validateTitle(' \t ')).toThrow('Task title cannot be empty');
  });

  it('accepts exactly the maximum length', () => {
    const title = 'x'.repeat(TITLE_MAX_LENGTH);
    expect(service.validateTitle(title)).toBe(title);
  });

  it('rejects one character past the maximum', () => {
    expect(() => service.validateTitle('x'.repeat(201))).toThrow('Task title exceeds 200 characters');
  });

  it('measures length after trimming', () => {
    const title = `  ${'x'.repeat(200)}  `;
    expect(service.validateTitle(title)).toHaveLength(200);
  });

  it('counts characters outside the BMP once each', () => {
    const title = '😀'.repeat(200);
    expect(service.validateTitle(title)).toBe(title);
    expect(() => service.validateTitle('😀'.repeat(201))).toThrow('Task title exceeds 200 characters');
  });
});

describe('validateDescription', () => {
  it('normalizes absent or empty input to empty string', () => {
    expect(service.validateDescription()).toBe('');
    expect(service.validateDescription('')).toBe('');
  });

  it('trims, and whitespace-only becomes empty', () => {
    expect(service.validateDescription('  notes ')).toBe('notes');
    expect(service.validateDescription('   ')).toBe('');
  });

  it('accepts exactly the maximum length', () => {
    expect(service.validateDescription('y'.repeat(DESCRIPTION_MAX_LENGTH))).toHaveLength(500);
  });

  it('rejects one character past the maximum', () => {
    expect(() => service.validateDescription('y'.repeat(501))).toThrow('Description exceeds 500 characters');
  });

  it('counts characters outside the BMP once each', () => {
    const description = '🎉'.repeat(500);
    expect(service.validateDescription(description)).toBe(description);
    expect(() => service.validateDescription('🎉'.repeat(501))).toThrow('Description exceeds 500 characters');
  });
});

describe('validateTaskId', () => {
  it('passes for an existing id', () => {
    service.addTask('Exists');
    expect(() => service.validateTaskId(1)).not.toThrow();
  });

  it('throws TaskNotFoundError naming the id', () => {
    expect(() => service.validateTaskId(999)).toThrow(TaskNotFoundError);
    expect(() => service.validateTaskId(999)).toThrow('Task ID 999 not found');
  });
});

describe('addTask', () => {
  it('creates an incomplete task with a trimmed title', () => {
    const task = service.addTask('  Buy milk  ');
    expect(task.id).toBe(1);
    expect(task.title).toBe('Buy milk');
    expect(task.description).toBe('');
    expect(task.status).toBe(TaskStatus.Incomplete);
    expect(store.get(1)).toBe(task);
  });

  it('stamps createdAt from the configured clock', () => {
    const fixed = new Date('2026-03-01T12:00:00.000Z');
    const clocked = new TaskService(store, { now: () => fixed });
    expect(clocked.addTask('Stamped').createdAt).toBe(fixed);
  });

  it('rejects invalid titles without consuming an id', () => {
    expect(() => service.addTask('')).toThrow(ValidationError);
    expect(() => service.addTask('   ')).toThrow(ValidationError);
    expect(() => service.addTask('x'.repeat(201))).toThrow(ValidationError);
    expect(store.nextId()).toBe(1);
    expect(service.getAllTasks()).toEqual([]);
  });

  it('validates description length', () => {
    expect(service.addTask('T', '').description).toBe('');
    expect(service.addTask('T', 'd'.repeat(500)).description).toHaveLength(500);
    expect(() => service.addTask('T', 'd'.repeat(501))).toThrow(ValidationError);
  });

  it('accepts emoji titles and descriptions within the limits', () => {
    const task = service.addTask('😀'.repeat(150), '🎉'.repeat(300));
    expect([...task.title]).toHaveLength(150);
    expect([...task.description]).toHaveLength(300);
  });

  it('issues strictly increasing ids that are never reused', () => {
    expect(service.addTask('one').id).toBe(1);
    expect(service.addTask('two').id).toBe(2);
    expect(service.addTask('three').id).toBe(3);
    service.deleteTask(2);
    expect(service.addTask('four').id).toBe(4);
    service.deleteTask(4);
    expect(service.addTask('five').id).toBe(5);
    expect(service.getAllTasks().map(t => t.id)).toEqual([1, 3, 5]);
  });

  it('continues after a pre-built task placed directly in the store', () => {
    store.add(new Task(7, 'Imported'));
    expect(service.addTask('Next').id).toBe(8);
  });
});

describe('getTask / getAllTasks', () => {
  it('returns an empty list for an empty store', () => {
    expect(service.getAllTasks()).toEqual([]);
  });

  it('returns tasks ascending by id', () => {
    service.addTask('a');
    service.addTask('b');
    service.addTask('c');
    service.deleteTask(1);
    store.add(new Task(1, 'a again'));
    expect(service.getAllTasks().map(t => t.id)).toEqual([1, 2, 3]);
  });

  it('getTask throws for a missing id', () => {
    expect(() => service.getTask(5)).toThrow(TaskNotFoundError);
  });
});

describe('updateTask', () => {
  beforeEach(() => {
    service.addTask('SameTitle', 'Original');
  });

  it('reports no change when nothing is supplied', () => {
    const { task, changed } = service.updateTask(1);
    expect(changed).toBe(false);
    expect(task.title).toBe('SameTitle');
    expect(task.description).toBe('Original');
  });

  it('reports no change when both fields are kept explicitly', () => {
    expect(service.updateTask(1, { title: keep(), description: keep() }).changed).toBe(false);
  });

  it('reports no change when the normalized title equals the current one', () => {
    expect(service.updateTask(1, { title: set('  SameTitle ') }).changed).toBe(false);
  });

  it('applies a new title and leaves the description alone', () => {
    const { task, changed } = service.updateTask(1, { title: set('  New Title ') });
    expect(changed).toBe(true);
    expect(task.title).toBe('New Title');
    expect(task.description).toBe('Original');
  });

  it('clears the description with an explicit empty string', () => {
    const { task, changed } = service.updateTask(1, { description: set('') });
    expect(changed).toBe(true);
    expect(task.description).toBe('');
  });

  it('never touches id or status', () => {
    service.markComplete(1);
    const { task } = service.updateTask(1, { title: set('Renamed'), description: set('New') });
    expect(task.id).toBe(1);
    expect(task.status).toBe(TaskStatus.Complete);
  });

  it('rejects an invalid title', () => {
    expect(() => service.updateTask(1, { title: set('   ') })).toThrow('Task title cannot be empty');
    expect(service.getTask(1).title).toBe('SameTitle');
  });

  it('applies nothing when the description is invalid', () => {
    expect(() => service.updateTask(1, { title: set('Other'), description: set('z'.repeat(501)) }))
      .toThrow(ValidationError);
    expect(service.getTask(1).title).toBe('SameTitle');
  });

  it('throws TaskNotFoundError for a missing id', () => {
    expect(() => service.updateTask(42, { title: set('x') })).toThrow(TaskNotFoundError);
  });
});

describe('deleteTask', () => {
  it('returns the removed task and makes it unreachable', () => {
    service.addTask('Keep');
    service.addTask('Drop', 'bye');
    const removed = service.deleteTask(2);
    expect(removed.title).toBe('Drop');
    expect(() => service.getTask(2)).toThrow(TaskNotFoundError);
    expect(service.getAllTasks().map(t => t.id)).toEqual([1]);
    expect(service.getTask(1).title).toBe('Keep');
  });

  it('throws TaskNotFoundError for a missing or already deleted id', () => {
    service.addTask('Once');
    service.deleteTask(1);
    expect(() => service.deleteTask(1)).toThrow(TaskNotFoundError);
  });
});

describe('status transitions', () => {
  beforeEach(() => {
    service.addTask('Toggle');
  });

  it('rejects marking a fresh task incomplete', () => {
    expect(() => service.markIncomplete(1)).toThrow('Task is already incomplete');
  });

  it('moves Incomplete → Complete → Incomplete and rejects self-transitions', () => {
    expect(service.markComplete(1).isComplete()).toBe(true);
    expect(() => service.markComplete(1)).toThrow('Task is already complete');
    expect(service.markIncomplete(1).status).toBe(TaskStatus.Incomplete);
    expect(() => service.markIncomplete(1)).toThrow(ValidationError);
  });

  it('throws TaskNotFoundError before checking status', () => {
    expect(() => service.markComplete(9)).toThrow(TaskNotFoundError);
    expect(() => service.markIncomplete(9)).toThrow(TaskNotFoundError);
  });
});

describe('getStatistics', () => {
  it('is all zeros for an empty store', () => {
    expect(service.getStatistics()).toEqual({ total: 0, completed: 0, remaining: 0 });
  });

  it('stays consistent across a sequence of operations', () => {
    service.addTask('a');
    service.addTask('b');
    service.addTask('c');
    service.markComplete(1);
    service.markComplete(3);
    service.deleteTask(2);
    service.addTask('d');

    const stats = service.getStatistics();
    expect(stats).toEqual({ total: 3, completed: 2, remaining: 1 });
    expect(stats.total).toBe(stats.completed + stats.remaining);
    expect(stats.total).toBe(service.getAllTasks().length);
  });
});

describe('logging', () => {
  it('logs mutations at debug through the injected logger', () => {
    const lines: Array<Record<string, unknown>> = [];
    const logger = createLogger({
      level: 'debug',
      destination: { write: (msg: string) => { lines.push(JSON.parse(msg) as Record<string, unknown>); } },
    });
    const logged = new TaskService(store, { logger });

    logged.addTask('Logged');
    logged.markComplete(1);
    logged.deleteTask(1);

    expect(lines.map(l => l['msg'])).toEqual(['task added', 'task status changed', 'task deleted']);
    expect(lines[1]).toMatchObject({ level: 'DEBUG', taskId: 1, status: 'complete' });
  });
});

describe('end-to-end scenario', () => {
  it('adds, updates, completes and deletes', () => {
    service.addTask('Task 1');
    service.addTask('Task 2', 'Desc');

    const all = service.getAllTasks();
    expect(all).toHaveLength(2);
    expect(all.map(t => t.id)).toEqual([1, 2]);
    expect(all[1]?.description).toBe('Desc');

    service.updateTask(1, { title: set('New Title') });
    expect(service.getTask(1).title).toBe('New Title');
    expect(service.getTask(1).status).toBe(TaskStatus.Incomplete);

    service.markComplete(1);
    expect(service.getTask(1).isComplete()).toBe(true);

    service.deleteTask(2);
    const remaining = service.getAllTasks();
    expect(remaining).toHaveLength(1);
    expect(remaining[0]?.id).toBe(1);
  });
});
