import { afterEach, describe, expect, it, vi } from 'vitest';
import { debugLog, debugWarn, isDebugEnabled, logError } from './log.ts';

describe('log', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('always prints errors with the thrown value', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const failure = new Error('boom');

    logError('frame failed', failure);
    logError('no canvas');

    expect(error).toHaveBeenNthCalledWith(1, '[drift-field]', 'frame failed', failure);
    expect(error).toHaveBeenNthCalledWith(2, '[drift-field]', 'no canvas');
  });

  it('prints debug output only when enabled', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    debugLog('session', 1);
    debugWarn('clamped');

    if (isDebugEnabled()) {
      expect(log).toHaveBeenCalledWith('[drift-field]', 'session', 1);
      expect(warn).toHaveBeenCalledWith('[drift-field]', 'clamped');
    } else {
      expect(log).not.toHaveBeenCalled();
      expect(warn).not.toHaveBeenCalled();
    }
  });
});
