import { describe, it, expect, vi, afterEach } from 'vitest';
import { Logger } from '../../../src/utils/logger';

describe('Logger', () => {
  afterEach(() => {
    Logger.setQuiet(false);
    vi.restoreAllMocks();
  });

  it('keeps stdout to JSON when quiet', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    Logger.setQuiet(true);

    Logger.info('listing');
    Logger.warning('careful');
    Logger.json({ key: 'spi' });

    expect(warn).not.toHaveBeenCalled();
    expect(log).toHaveBeenCalledTimes(1);
    expect(log).toHaveBeenCalledWith('{\n  "key": "spi"\n}');
  });

  it('still reports errors when quiet', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    Logger.setQuiet(true);

    Logger.error('broken');

    expect(error).toHaveBeenCalledTimes(1);
    expect(error.mock.calls[0][1]).toBe('broken');
  });
});
