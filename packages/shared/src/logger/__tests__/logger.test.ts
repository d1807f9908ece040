/**
 * @fileoverview Tests for the pino-backed logger
 */

import { beforeEach, describe, expect, test } from '@jest/globals';
import { LogLevel } from '@taskdesk/core';
import { Environment, loadConfig } from '../../config';
import { Logger, createLogger } from '../index';

describe('Logger', () => {
  let lines: string[];
  const sink = { write: (chunk: string) => { lines.push(chunk); } };

  const entries = () => lines.map(line => JSON.parse(line));

  const makeLogger = (level: LogLevel = LogLevel.DEBUG) => new Logger({
    level,
    environment: Environment.TEST,
    serviceName: 'taskdesk-test',
    serviceVersion: '0.0.1',
    destination: sink
  });

  beforeEach(() => {
    lines = [];
  });

  test('writes structured entries with service metadata', () => {
    makeLogger().info('Task created', { taskId: 3 });

    const [entry] = entries();
    expect(entry.level).toBe('info');
    expect(entry.msg).toBe('Task created');
    expect(entry.taskId).toBe(3);
    expect(entry.service).toBe('taskdesk-test');
    expect(entry.environment).toBe('test');
  });

  test('drops entries below the configured level', () => {
    const logger = makeLogger(LogLevel.WARN);

    logger.info('hidden');
    logger.warn('shown');

    expect(entries().map(entry => entry.msg)).toEqual(['shown']);
  });

  test('attaches error details', () => {
    makeLogger().error(new Error('boom'), 'Command failed', { operation: 'demo' });

    const [entry] = entries();
    expect(entry.msg).toBe('Command failed');
    expect(entry.operation).toBe('demo');
    expect(entry.error.name).toBe('Error');
    expect(entry.error.message).toBe('boom');
  });

  test('falls back to the error message', () => {
    makeLogger().warn(new Error('quota exceeded'), 'disk full');
    makeLogger().fatal(new Error('gone'));

    expect(entries().map(entry => entry.msg)).toEqual(['disk full', 'gone']);
  });

  test('child loggers merge context', () => {
    const child = makeLogger().child({ component: 'cli' });

    child.debug('Starting', { operation: 'demo' });

    const [entry] = entries();
    expect(entry.component).toBe('cli');
    expect(entry.operation).toBe('demo');
  });

  test('createLogger uses configuration values', () => {
    const config = loadConfig({
      loadDotenv: false,
      env: { NODE_ENV: 'test', TASKDESK_LOG_LEVEL: 'error', TASKDESK_SERVICE_NAME: 'configured' }
    });
    const logger = createLogger(config, { destination: sink, baseContext: { component: 'store' } });

    logger.warn('ignored');
    logger.error('kept');

    const result = entries();
    expect(result).toHaveLength(1);
    expect(result[0].service).toBe('configured');
    expect(result[0].component).toBe('store');
  });

  test('flush resolves', async () => {
    await expect(makeLogger().flush()).resolves.toBeUndefined();
  });
});
