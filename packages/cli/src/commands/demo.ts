/**
 * @fileoverview Demo scenario commands
 */

import { Command } from 'commander';
import { TaskPriority } from '@taskdesk/core';
import type { Task, TaskStats, TaskStore } from '@taskdesk/core';
import { BaseCommand, addCommonOptions, createContext } from './base';
import type { ContextDependencies } from './base';
import { CommandOptionsSchema } from '../types/index';
import type { CommandContext, CommandResult } from '../types/index';
import { createResult, renderStats, renderTasks } from '../utils/index';

export const DEMO_TASKS: ReadonlyArray<{ readonly title: string; readonly priority: TaskPriority }> = [
  { title: 'Learn GitHub Actions basics', priority: TaskPriority.HIGH },
  { title: 'Create first workflow', priority: TaskPriority.HIGH },
  { title: 'Deploy to production', priority: TaskPriority.MEDIUM }
];

/**
 * Add the demo tasks to a store, in order
 */
export function seedDemoTasks(store: TaskStore): Task[] {
  return DEMO_TASKS.map(({ title, priority }) => store.create(title, priority));
}

/**
 * Seeds the demo tasks, completes the first one and prints the listing
 * before and after
 */
export class DemoCommand extends BaseCommand<Task[]> {
  execute(): CommandResult<Task[]> {
    const { store, logger, outputFormat, colors } = this.context;
    const timer = logger.timer();

    try {
      const [first] = seedDemoTasks(store);
      const added = store.list();
      store.complete(first.id);
      const current = store.list();

      logger.info('Demo completed', { operation: 'demo', duration: timer.stop(), tasks: current.length });

      if (outputFormat === 'json' || outputFormat === 'yaml') {
        return createResult(true, current, renderTasks(current, outputFormat));
      }

      const output = [
        '🚀 TaskDesk Demo',
        '================',
        '',
        'Added tasks:',
        renderTasks(added, outputFormat, colors),
        '',
        `📝 Completing task: ${first.title}`,
        '',
        'Current tasks:',
        renderTasks(current, outputFormat, colors),
        '',
        '✅ Demo completed successfully!'
      ].join('\n');

      return createResult(true, current, output);
    } catch (error) {
      return failed(this.context, 'demo', error);
    }
  }
}

/**
 * Runs the demo scenario silently and prints the resulting statistics
 */
export class StatsCommand extends BaseCommand<TaskStats> {
  execute(): CommandResult<TaskStats> {
    const { store, logger, outputFormat } = this.context;

    try {
      const [first] = seedDemoTasks(store);
      store.complete(first.id);
      const stats = store.stats();

      logger.info('Stats computed', { operation: 'stats', total: stats.total });
      return createResult(true, stats, renderStats(stats, outputFormat));
    } catch (error) {
      return failed(this.context, 'stats', error);
    }
  }
}

function failed<T>(context: CommandContext, operation: string, error: unknown): CommandResult<T> {
  const message = error instanceof Error ? error.message : String(error);
  if (error instanceof Error) {
    context.logger.error(error, `Command ${operation} failed`, { operation });
  } else {
    context.logger.error(`Command ${operation} failed: ${message}`, { operation });
  }
  return createResult<T>(false, undefined, undefined, message);
}

export function createDemoCommand(deps: ContextDependencies = {}): Command {
  return addCommonOptions(new Command('demo'))
    .description('Run the demo scenario and print the task listing')
    .action((_options: unknown, command: Command) => {
      const options = CommandOptionsSchema.parse(command.optsWithGlobals());
      const code = new DemoCommand(createContext(options, deps)).run();
      if (code !== 0) {
        process.exitCode = code;
      }
    });
}

export function createStatsCommand(deps: ContextDependencies = {}): Command {
  return addCommonOptions(new Command('stats'))
    .description('Run the demo scenario and print task statistics')
    .action((_options: unknown, command: Command) => {
      const options = CommandOptionsSchema.parse(command.optsWithGlobals());
      const code = new StatsCommand(createContext(options, deps)).run();
      if (code !== 0) {
        process.exitCode = code;
      }
    });
}
