import { describe, expect, it, vi } from 'vitest';
import { logger } from '../../src/ndplot/utils/logger.ts';

describe('logger', () => {
  it('writes plain output to stdout unchanged', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    logger.log('<svg/>');
    expect(log).toHaveBeenCalledWith('<svg/>');
  });

  it('sends errors and warnings to stderr', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    logger.error('boom');
    logger.warn('careful');

    expect(error).toHaveBeenCalledWith(expect.stringContaining('✗ boom'));
    expect(warn).toHaveBeenCalledWith(expect.stringContaining('⚠ careful'));
  });

  it('prints debug lines only when DEBUG is set', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    vi.stubEnv('DEBUG', '');
    logger.debug('hidden');
    expect(error).not.toHaveBeenCalled();

    vi.stubEnv('DEBUG', '1');
    logger.debug('shown');
    expect(error).toHaveBeenCalledWith(expect.stringContaining('shown'));

    vi.unstubAllEnvs();
  });
});
