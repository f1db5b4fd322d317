import { describe, it, expect, vi, afterEach } from 'vitest';
import * as logger from '../src/output/logger';

function spyConsole() {
  return {
    logSpy: vi.spyOn(console, 'log').mockImplementation(() => {}),
    warnSpy: vi.spyOn(console, 'warn').mockImplementation(() => {}),
    errorSpy: vi.spyOn(console, 'error').mockImplementation(() => {}),
  };
}

describe('logger', () => {
  afterEach(() => {
    logger.setSilentMode(false);
    logger.setVerboseMode(false);
    vi.restoreAllMocks();
  });

  it('writes log and warn with the prefix', () => {
    const { logSpy, warnSpy } = spyConsole();
    logger.log('ready');
    logger.warn('careful');

    expect(logSpy).toHaveBeenCalledWith(expect.stringContaining('[emergency-desk]'), 'ready');
    expect(warnSpy).toHaveBeenCalledWith(expect.stringContaining('Warning:'), 'careful');
  });

  it('prints debug only in verbose mode', () => {
    const { errorSpy } = spyConsole();
    logger.debug('hidden');
    logger.setVerboseMode(true);
    logger.debug('shown');

    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(errorSpy).toHaveBeenCalledWith(expect.any(String), 'shown');
  });

  it('silences everything but errors in silent mode', () => {
    const { logSpy, warnSpy, errorSpy } = spyConsole();
    logger.setSilentMode(true);
    logger.setVerboseMode(true);

    logger.log('a');
    logger.warn('b');
    logger.debug('c');
    logger.error('d');

    expect(logSpy).not.toHaveBeenCalled();
    expect(warnSpy).not.toHaveBeenCalled();
    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(errorSpy).toHaveBeenCalledWith(expect.stringContaining('Error:'), 'd');
  });
});
