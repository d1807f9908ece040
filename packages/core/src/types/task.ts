/**
 * @fileoverview Task record types and schemas for TaskDesk
 */

import { z } from 'zod';

/**
 * Task priority levels
 */
export enum TaskPriority {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high'
}

export const TASK_PRIORITIES: readonly TaskPriority[] = [
  TaskPriority.LOW,
  TaskPriority.MEDIUM,
  TaskPriority.HIGH
];

export const DEFAULT_TASK_PRIORITY = TaskPriority.MEDIUM;

/**
 * Core task interface. Instances handed out by the store are snapshots.
 */
export interface Task {
  readonly id: number;
  readonly title: string;
  readonly priority: TaskPriority;
  readonly completed: boolean;
  readonly createdAt: Date;
}

/**
 * Task update input. Values are untrusted and validated by the store;
 * a key set to `undefined` is treated as absent.
 */
export interface UpdateTaskInput {
  readonly title?: unknown;
  readonly priority?: unknown;
  readonly completed?: unknown;
}

/**
 * Task filter criteria; keys combine with AND
 */
export interface TaskListFilters {
  readonly completed?: boolean;
  readonly priority?: TaskPriority;
}

/**
 * Aggregate counts over every task in a store
 */
export interface TaskStats {
  readonly total: number;
  readonly completed: number;
  readonly pending: number;
  readonly byPriority: Readonly<Record<TaskPriority, number>>;
}

/**
 * Zod schemas for runtime validation
 */
export const TaskPrioritySchema = z.nativeEnum(TaskPriority, {
  errorMap: () => ({ message: `Priority must be one of: ${TASK_PRIORITIES.join(', ')}` })
});

export const TaskTitleSchema = z
  .string({
    required_error: 'Task title is required',
    invalid_type_error: 'Task title must be a string'
  })
  .trim()
  .min(1, 'Task title must not be empty');

export const TaskCompletedSchema = z.unknown().transform(value => Boolean(value));

export const TaskSchema = z.object({
  id: z.number().int().positive(),
  title: TaskTitleSchema,
  priority: TaskPrioritySchema,
  completed: z.boolean(),
  createdAt: z.date()
});

/**
 * JSON-safe task representation
 */
export interface SerializedTask {
  readonly id: number;
  readonly title: string;
  readonly priority: TaskPriority;
  readonly completed: boolean;
  readonly createdAt: string;
}

/**
 * Serialization/Deserialization utilities for Task model
 */
export namespace TaskSerialization {
  /**
   * Serialize a Task to JSON-safe format
   */
  export function serializeTask(task: Task): SerializedTask {
    return {
      id: task.id,
      title: task.title,
      priority: task.priority,
      completed: task.completed,
      createdAt: task.createdAt.toISOString()
    };
  }

  /**
   * Batch serialize multiple tasks
   */
  export function serializeTasks(tasks: readonly Task[]): SerializedTask[] {
    return tasks.map(serializeTask);
  }

  /**
   * Deserialize a Task from JSON format with validation
   */
  export function deserializeTask(data: unknown): Task {
    const processedData = isRecord(data) && typeof data['createdAt'] === 'string'
      ? { ...data, createdAt: new Date(data['createdAt']) }
      : data;

    return TaskSchema.parse(processedData);
  }

  function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
  }
}
