/**
 * @fileoverview Command-line driver for TaskDesk
 */

export * from './types/index';
export * from './utils/index';
export * from './commands/index';
export { createProgram, main } from './cli';
