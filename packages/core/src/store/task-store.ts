/**
 * @fileoverview In-memory task store
 */

import { z } from 'zod';
import type { StructuredLogger } from '../types/common';
import { ErrorFactory } from '../types/errors';
import {
  DEFAULT_TASK_PRIORITY,
  TaskCompletedSchema,
  TaskPriority,
  TaskPrioritySchema,
  TaskTitleSchema
} from '../types/task';
import type { Task, TaskListFilters, TaskStats, UpdateTaskInput } from '../types/task';

/**
 * Task store construction options
 */
export interface TaskStoreOptions {
  readonly logger?: StructuredLogger;
  readonly clock?: () => Date;
  readonly defaultPriority?: TaskPriority;
}

const UPDATE_KEYS = ['title', 'priority', 'completed'] as const;

interface TaskRecord {
  readonly id: number;
  title: string;
  priority: TaskPriority;
  completed: boolean;
  readonly createdAt: Date;
}

/**
 * Owns an insertion-ordered collection of tasks. Every task handed out is a
 * copy, so callers can only change stored state through the store methods.
 *
 * The store is synchronous and keeps no locks; hosts that share one instance
 * between threads must serialise access themselves.
 */
export class TaskStore {
  private tasks: TaskRecord[] = [];
  private nextId = 1;
  private readonly logger?: StructuredLogger;
  private readonly clock: () => Date;
  private readonly defaultPriority: TaskPriority;

  constructor(options: TaskStoreOptions = {}) {
    this.logger = options.logger;
    this.clock = options.clock ?? (() => new Date());
    this.defaultPriority = parseField(
      TaskPrioritySchema,
      'defaultPriority',
      options.defaultPriority ?? DEFAULT_TASK_PRIORITY
    );
  }

  /**
   * Number of tasks currently stored
   */
  get size(): number {
    return this.tasks.length;
  }

  /**
   * Create a task and append it to the store.
   *
   * @throws ValidationError when the title is not a non-blank string or the
   * priority is not one of low, medium, high
   */
  create(title: unknown, priority: unknown = this.defaultPriority): Task {
    const parsedTitle = parseField(TaskTitleSchema, 'title', title);
    const parsedPriority = parseField(TaskPrioritySchema, 'priority', priority);
    const task: TaskRecord = {
      id: this.nextId++,
      title: parsedTitle,
      priority: parsedPriority,
      completed: false,
      createdAt: new Date(this.clock().getTime())
    };

    this.tasks.push(task);
    this.logger?.debug('Task created', { taskId: task.id, priority: task.priority });
    return snapshot(task);
  }

  get(id: number): Task | null {
    const task = this.find(id);
    return task ? snapshot(task) : null;
  }

  /**
   * List tasks in insertion order, optionally narrowed by completion state
   * and priority
   */
  list(filters: TaskListFilters = {}): Task[] {
    return this.tasks
      .filter(task => filters.completed === undefined || task.completed === filters.completed)
      .filter(task => filters.priority === undefined || task.priority === filters.priority)
      .map(snapshot);
  }

  /**
   * Apply a partial update. Every supplied field is validated before any of
   * them is written, so a rejected update leaves the task as it was.
   *
   * @returns the updated task, or null when no task has this id
   * @throws ValidationError for a blank title or an unknown priority
   */
  update(id: number, updates: UpdateTaskInput): Task | null {
    const task = this.find(id);
    if (!task) {
      return null;
    }

    const title = updates.title !== undefined
      ? parseField(TaskTitleSchema, 'title', updates.title)
      : undefined;
    const priority = updates.priority !== undefined
      ? parseField(TaskPrioritySchema, 'priority', updates.priority)
      : undefined;
    const completed = updates.completed !== undefined
      ? parseField(TaskCompletedSchema, 'completed', updates.completed)
      : undefined;

    if (title !== undefined) {
      task.title = title;
    }
    if (priority !== undefined) {
      task.priority = priority;
    }
    if (completed !== undefined) {
      task.completed = completed;
    }

    this.logger?.debug('Task updated', {
      taskId: id,
      fields: UPDATE_KEYS.filter(key => updates[key] !== undefined)
    });
    return snapshot(task);
  }

  complete(id: number): Task | null {
    return this.update(id, { completed: true });
  }

  /**
   * Remove a task. Its id is never handed out again until `clear()`.
   */
  delete(id: number): boolean {
    const index = this.tasks.findIndex(task => task.id === id);
    if (index === -1) {
      return false;
    }

    this.tasks.splice(index, 1);
    this.logger?.debug('Task deleted', { taskId: id });
    return true;
  }

  stats(): TaskStats {
    const byPriority: Record<TaskPriority, number> = {
      [TaskPriority.LOW]: 0,
      [TaskPriority.MEDIUM]: 0,
      [TaskPriority.HIGH]: 0
    };
    let completed = 0;

    for (const task of this.tasks) {
      byPriority[task.priority] += 1;
      if (task.completed) {
        completed += 1;
      }
    }

    return {
      total: this.tasks.length,
      completed,
      pending: this.tasks.length - completed,
      byPriority
    };
  }

  /**
   * Remove every task and restart ids at 1
   */
  clear(): void {
    const removed = this.tasks.length;
    this.tasks = [];
    this.nextId = 1;
    this.logger?.debug('Task store cleared', { removed });
  }

  private find(id: number): TaskRecord | undefined {
    return this.tasks.find(task => task.id === id);
  }
}

function parseField<S extends z.ZodTypeAny>(schema: S, field: string, value: unknown): z.output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw ErrorFactory.fromZodError(field, value, result.error);
  }
  return result.data;
}

function snapshot(task: TaskRecord): Task {
  return {
    id: task.id,
    title: task.title,
    priority: task.priority,
    completed: task.completed,
    createdAt: new Date(task.createdAt.getTime())
  };
}
