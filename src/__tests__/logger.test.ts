import { afterEach, describe, expect, it, vi } from 'vitest';
import { createLogger } from '../logger';

describe('createLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('drops debug messages unless verbose', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    createLogger(false).debug('Origin: x3000');
    createLogger(true).debug('Origin: x4000');

    expect(error).toHaveBeenCalledTimes(1);
    expect(error).toHaveBeenCalledWith('Origin: x4000');
  });

  it('keeps diagnostics off stdout', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    createLogger().info('Interrupted.');

    expect(log).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledWith('Interrupted.');
  });
});
