/**
 * @fileoverview CLI commands export
 */

export { BaseCommand, createContext, addCommonOptions } from './base';
export type { ContextDependencies } from './base';
export {
  DEMO_TASKS,
  DemoCommand,
  StatsCommand,
  seedDemoTasks,
  createDemoCommand,
  createStatsCommand
} from './demo';
