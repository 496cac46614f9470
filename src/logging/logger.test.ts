/**
 * Tests for the console logger
 */

import { jest, describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import chalk from 'chalk';
import { createConsoleLogger, withScope, silentLogger, type Logger } from './logger.js';

describe('createConsoleLogger', () => {
  const originalLevel = chalk.level;

  beforeEach(() => {
    chalk.level = 0;
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    chalk.level = originalLevel;
    jest.restoreAllMocks();
  });

  it('hides debug output unless verbose', () => {
    createConsoleLogger().debug('hidden');
    expect(console.log).not.toHaveBeenCalled();

    createConsoleLogger({ verbose: true }).debug('shown');
    expect(console.log).toHaveBeenCalledWith('[debug] shown');
  });

  it('prefixes the scope', () => {
    createConsoleLogger({ scope: 'Orchestrator' }).info('started');
    expect(console.log).toHaveBeenCalledWith('[Orchestrator] started');
  });

  it('suppresses info when quiet but still reports warnings', () => {
    const logger = createConsoleLogger({ quiet: true, verbose: true });
    logger.info('progress');
    logger.debug('details');
    logger.warn('registry slow');
    expect(console.log).not.toHaveBeenCalled();
    expect(console.error).toHaveBeenCalledWith('Warning: registry slow');
  });

  it('writes errors to stderr with extra arguments', () => {
    const cause = new Error('boom');
    createConsoleLogger().error('run failed', cause);
    expect(console.error).toHaveBeenCalledWith('Error: run failed', cause);
  });
});

describe('withScope', () => {
  it('tags each message', () => {
    const messages: string[] = [];
    const base: Logger = {
      ...silentLogger,
      info: (message) => {
        messages.push(message);
      },
    };
    withScope(base, 'Verifier').info('accepted');
    expect(messages).toEqual(['[Verifier] accepted']);
  });
});
