import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { createConsoleLogger, silentLogger } from '../logger.js';

describe('createConsoleLogger', () => {
  let logSpy: jest.SpiedFunction<typeof console.log>;
  let warnSpy: jest.SpiedFunction<typeof console.warn>;

  beforeEach(() => {
    logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    logSpy.mockRestore();
    warnSpy.mockRestore();
  });

  it('should prefix lines with the scope', () => {
    const logger = createConsoleLogger('Dispatch');

    logger.info('started');
    logger.warn('slow');

    expect(logSpy).toHaveBeenCalledWith('[Dispatch] started');
    expect(warnSpy).toHaveBeenCalledWith('[Dispatch] slow');
  });

  it('should only print debug lines when verbose', () => {
    createConsoleLogger('Batch').debug('hidden');
    createConsoleLogger('Batch', { verbose: true }).debug('shown');

    expect(logSpy).toHaveBeenCalledTimes(1);
    expect(logSpy).toHaveBeenCalledWith('[Batch] shown');
  });

  it('should keep verbosity in child loggers', () => {
    createConsoleLogger('Dispatch', { verbose: true }).child('Recorder').debug('opened');

    expect(logSpy).toHaveBeenCalledWith('[Recorder] opened');
  });
});

describe('silentLogger', () => {
  it('should return itself as a child', () => {
    expect(silentLogger.child('Batch')).toBe(silentLogger);
  });
});
