/**
 * @fileoverview Tests for task types and validation
 */

import { describe, expect, test } from '@jest/globals';
import { z } from 'zod';
import {
  TaskPriority,
  TaskPrioritySchema,
  TaskTitleSchema,
  TaskSchema,
  Task,
  TaskSerialization,
  TASK_PRIORITIES
} from './task';
import { ErrorCategory, ErrorFactory, ValidationError } from './errors';

describe('Task Types', () => {
  test('TaskPriority enum should contain expected values', () => {
    expect(Object.values(TaskPriority)).toEqual(['low', 'medium', 'high']);
    expect(TASK_PRIORITIES).toEqual([TaskPriority.LOW, TaskPriority.MEDIUM, TaskPriority.HIGH]);
  });

  test('TaskPrioritySchema should reject unknown priorities with a readable message', () => {
    const result = TaskPrioritySchema.safeParse('urgent');

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.message).toBe('Priority must be one of: low, medium, high');
    }
  });

  test('TaskTitleSchema should trim and reject blank titles', () => {
    expect(TaskTitleSchema.parse('  Write docs  ')).toBe('Write docs');
    expect(TaskTitleSchema.safeParse('   ').success).toBe(false);
    expect(TaskTitleSchema.safeParse(42).success).toBe(false);
  });

  test('TaskSchema should validate valid task object', () => {
    const validTask: Task = {
      id: 1,
      title: 'Test Task',
      priority: TaskPriority.MEDIUM,
      completed: false,
      createdAt: new Date('2024-01-01T00:00:00Z')
    };

    expect(TaskSchema.parse(validTask)).toEqual(validTask);
  });

  test('TaskSchema should reject non-positive ids', () => {
    const result = TaskSchema.safeParse({
      id: 0,
      title: 'Test Task',
      priority: TaskPriority.LOW,
      completed: false,
      createdAt: new Date()
    });

    expect(result.success).toBe(false);
  });
});

describe('TaskSerialization', () => {
  const task: Task = {
    id: 7,
    title: 'Ship release',
    priority: TaskPriority.HIGH,
    completed: true,
    createdAt: new Date('2024-03-15T10:30:00.000Z')
  };

  test('serializeTask should render createdAt as ISO string', () => {
    expect(TaskSerialization.serializeTask(task)).toEqual({
      id: 7,
      title: 'Ship release',
      priority: 'high',
      completed: true,
      createdAt: '2024-03-15T10:30:00.000Z'
    });
  });

  test('deserializeTask should restore Date instances', () => {
    const restored = TaskSerialization.deserializeTask({
      id: 7,
      title: 'Ship release',
      priority: 'high',
      completed: true,
      createdAt: '2024-03-15T10:30:00.000Z'
    });

    expect(restored.createdAt).toBeInstanceOf(Date);
    expect(restored.createdAt.getTime()).toBe(task.createdAt.getTime());
    expect(restored.priority).toBe(TaskPriority.HIGH);
  });

  test('deserializeTask should reject malformed input', () => {
    expect(() => TaskSerialization.deserializeTask(null)).toThrow(z.ZodError);
    expect(() => TaskSerialization.deserializeTask({
      id: 1,
      title: 'Bad date',
      priority: 'low',
      completed: false,
      createdAt: 'not-a-date'
    })).toThrow(z.ZodError);
  });

  test('serializeTasks should keep order', () => {
    const second: Task = { ...task, id: 8, title: 'Announce release' };

    expect(TaskSerialization.serializeTasks([task, second]).map(t => t.id)).toEqual([7, 8]);
  });
});

describe('Errors', () => {
  test('ValidationError should carry field, code and category', () => {
    const error = new ValidationError('title', '', 'Task title must not be empty');

    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('ValidationError');
    expect(error.code).toBe('VALIDATION_ERROR');
    expect(error.category).toBe(ErrorCategory.VALIDATION_ERROR);
    expect(error.field).toBe('title');
    expect(error.message).toBe("Validation failed for field 'title': Task title must not be empty");
    expect(error.toJSON().context).toEqual({
      field: 'title',
      value: '',
      constraint: 'Task title must not be empty'
    });
  });

  test('ErrorFactory.fromZodError should use the first issue message', () => {
    const result = TaskPrioritySchema.safeParse('urgent');
    if (result.success) {
      throw new Error('expected parse failure');
    }

    const error = ErrorFactory.fromZodError('priority', 'urgent', result.error);
    expect(error.message).toBe("Validation failed for field 'priority': Priority must be one of: low, medium, high");
  });

  test('ErrorFactory.describeZodIssues should prefix issue paths', () => {
    const result = z.object({ logLevel: z.enum(['info', 'debug']) }).safeParse({ logLevel: 'loud' });
    if (result.success) {
      throw new Error('expected parse failure');
    }

    const [issue] = ErrorFactory.describeZodIssues(result.error);
    expect(issue?.startsWith('logLevel: ')).toBe(true);
  });
});
