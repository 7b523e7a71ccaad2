import { describe, it, expect } from 'vitest';
import { loadConfig } from '../config.js';

describe('loadConfig()', () => {
  it('should use the defaults when nothing is set', () => {
    expect(loadConfig({})).toEqual({
      timeoutMs: 2000,
      commandDelayMs: 50,
      settleMs: 500,
      dummyLogging: true,
    });
  });

  it('should read the environment', () => {
    expect(
      loadConfig({
        LABDEV_TIMEOUT_MS: '5000',
        LABDEV_COMMAND_DELAY_MS: '0',
        LABDEV_SETTLE_MS: '250',
        LABDEV_DUMMY_LOG: '0',
      })
    ).toEqual({ timeoutMs: 5000, commandDelayMs: 0, settleMs: 250, dummyLogging: false });
  });

  it('should fall back on malformed or negative values', () => {
    const config = loadConfig({ LABDEV_TIMEOUT_MS: 'soon', LABDEV_SETTLE_MS: '-1' });
    expect(config.timeoutMs).toBe(2000);
    expect(config.settleMs).toBe(500);
  });
});
