import { describe, expect, jest, test } from '@jest/globals';
import chalk from 'chalk';

import { createLogger, type LogSink } from '../logger.js';

function createSink() {
  const sink = { log: jest.fn(), warn: jest.fn(), error: jest.fn() } satisfies LogSink;
  return sink;
}

describe('createLogger', () => {
  test('routes levels to the matching sink method with a scope prefix', () => {
    const sink = createSink();
    const logger = createLogger('session', { sink, isDebugEnabled: () => false });

    logger.info('ready');
    logger.warn('slow');
    logger.error('broken', 42);

    expect(sink.log).toHaveBeenCalledWith(chalk.cyan('[session]'), 'ready');
    expect(sink.warn).toHaveBeenCalledWith(chalk.yellow('[session]'), 'slow');
    expect(sink.error).toHaveBeenCalledWith(chalk.red('[session]'), 'broken', 42);
  });

  test('writes debug lines only while debug is enabled', () => {
    const sink = createSink();
    let enabled = false;
    const logger = createLogger('decision', { sink, isDebugEnabled: () => enabled });

    logger.debug('hidden');
    enabled = true;
    logger.debug('shown');

    expect(sink.log).toHaveBeenCalledTimes(1);
    expect(sink.log).toHaveBeenCalledWith(chalk.gray('[decision]'), chalk.gray('shown'));
  });

  test('child loggers extend the scope', () => {
    const sink = createSink();
    const logger = createLogger('cli', { sink }).child('chat');

    logger.warn('careful');

    expect(sink.warn).toHaveBeenCalledWith(chalk.yellow('[cli:chat]'), 'careful');
  });
});
