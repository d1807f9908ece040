/**
 * @fileoverview CLI utility functions
 */

import chalk from 'chalk';
import boxen from 'boxen';
import { getBorderCharacters, table } from 'table';
import yaml from 'yaml';
import { TaskPriority, TaskSerialization } from '@taskdesk/core';
import type { Task, TaskStats } from '@taskdesk/core';
import type { CommandResult, OutputFormat } from '../types/index';

const TABLE_CONFIG = { border: getBorderCharacters('norc') };

type Palette = chalk.Chalk;

/**
 * Colour palette; level 0 leaves strings untouched
 */
export function createPalette(colors: boolean): Palette {
  return new chalk.Instance({ level: colors ? 1 : 0 });
}

/**
 * One listing line, e.g. `  ⬜ [HIGH  ] Write docs (ID: 1)`
 */
export function formatTaskLine(task: Task, palette: Palette = createPalette(false)): string {
  const status = task.completed ? '✅' : '⬜';
  const priority = task.priority.toUpperCase().padEnd(6);
  return `  ${status} [${colorPriority(palette, task.priority, priority)}] ${task.title} (ID: ${task.id})`;
}

export function formatTaskList(tasks: readonly Task[], palette: Palette = createPalette(false)): string {
  if (tasks.length === 0) {
    return '  No tasks found';
  }
  return tasks.map(task => formatTaskLine(task, palette)).join('\n');
}

function colorPriority(palette: Palette, priority: TaskPriority, text: string): string {
  switch (priority) {
    case TaskPriority.HIGH:
      return palette.red(text);
    case TaskPriority.MEDIUM:
      return palette.yellow(text);
    case TaskPriority.LOW:
      return palette.gray(text);
  }
}

/**
 * Render tasks in the requested format
 */
export function renderTasks(tasks: readonly Task[], format: OutputFormat, colors = false): string {
  switch (format) {
    case 'json':
      return JSON.stringify(TaskSerialization.serializeTasks(tasks), null, 2);

    case 'yaml':
      return yaml.stringify(TaskSerialization.serializeTasks(tasks));

    case 'table':
      if (tasks.length === 0) return 'No data available';
      return table([
        ['ID', 'Title', 'Priority', 'Completed', 'Created'],
        ...tasks.map(task => [
          String(task.id),
          task.title,
          task.priority,
          task.completed ? 'yes' : 'no',
          task.createdAt.toISOString()
        ])
      ], TABLE_CONFIG);

    case 'text':
      return formatTaskList(tasks, createPalette(colors));
  }
}

/**
 * Render a stats summary in the requested format
 */
export function renderStats(stats: TaskStats, format: OutputFormat): string {
  switch (format) {
    case 'json':
      return JSON.stringify(stats, null, 2);

    case 'yaml':
      return yaml.stringify(stats);

    case 'table':
      return table([['Property', 'Value'], ...statsRows(stats)], TABLE_CONFIG);

    case 'text':
      return statsRows(stats).map(([key, value]) => `${key}: ${value}`).join('\n');
  }
}

function statsRows(stats: TaskStats): [string, string][] {
  return [
    ['total', String(stats.total)],
    ['completed', String(stats.completed)],
    ['pending', String(stats.pending)],
    ['byPriority.high', String(stats.byPriority[TaskPriority.HIGH])],
    ['byPriority.medium', String(stats.byPriority[TaskPriority.MEDIUM])],
    ['byPriority.low', String(stats.byPriority[TaskPriority.LOW])]
  ];
}

/**
 * Boxed error banner
 */
export function formatError(message: string, details?: string, colors = false): string {
  const content = details ? `${message}\n\n${details}` : message;
  return boxen(createPalette(colors).red(content), {
    padding: 1,
    margin: 1,
    borderStyle: 'round',
    borderColor: 'red'
  });
}

/**
 * Create a command result
 */
export function createResult<T>(success: boolean, data?: T, output?: string, error?: string): CommandResult<T> {
  return { success, data, output, error };
}
