import { describe, it, expect, vi, afterEach } from 'vitest';
import { createStderrLogger, consoleLogger, silentLogger } from './logger.js';

describe('createStderrLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('writes levels to stderr with a prefix', () => {
    const writeSpy = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    const logger = createStderrLogger();

    logger.warning('Visit failed');
    logger.error('Parse failed');

    expect(writeSpy).toHaveBeenNthCalledWith(1, '[warning] Visit failed\n');
    expect(writeSpy).toHaveBeenNthCalledWith(2, '[error] Parse failed\n');
  });

  it('drops debug output unless verbose', () => {
    const writeSpy = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);

    createStderrLogger().debug('hidden');
    expect(writeSpy).not.toHaveBeenCalled();

    createStderrLogger({ verbose: true }).debug('shown');
    expect(writeSpy).toHaveBeenCalledWith('[debug] shown\n');
  });
});

describe('consoleLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prefixes info lines', () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    consoleLogger.info('hello');
    expect(logSpy).toHaveBeenCalledWith('[info] hello');
  });
});

describe('silentLogger', () => {
  it('accepts every level without output', () => {
    expect(() => {
      silentLogger.info('a');
      silentLogger.warning('b');
      silentLogger.error('c');
      silentLogger.debug('d');
    }).not.toThrow();
  });
});
