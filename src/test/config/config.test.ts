import { describe, it, expect } from 'vitest';
import { LoaderConfig, positiveIntFromEnv } from '../../config/constants.js';
import { batchLinesOnly } from '../../config/logger.js';

describe('positiveIntFromEnv', () => {
  it('reads a positive whole number', () => {
    expect(positiveIntFromEnv('1500', 30000)).toBe(1500);
    expect(positiveIntFromEnv(' 42 ', 30000)).toBe(42);
  });

  it('falls back when the value is unset or not a positive whole number', () => {
    expect(positiveIntFromEnv(undefined, 30000)).toBe(30000);
    expect(positiveIntFromEnv('thirty seconds', 30000)).toBe(30000);
    expect(positiveIntFromEnv('15s', 30000)).toBe(30000);
    expect(positiveIntFromEnv('0', 30000)).toBe(30000);
    expect(positiveIntFromEnv('-5', 30000)).toBe(30000);
    expect(positiveIntFromEnv('2.5', 30000)).toBe(30000);
  });

  it('keeps the default load timeout within the allowed range', () => {
    expect(LoaderConfig.DEFAULT_TIMEOUT_MS).toBeGreaterThan(0);
    expect(LoaderConfig.DEFAULT_TIMEOUT_MS).toBeLessThanOrEqual(LoaderConfig.MAX_TIMEOUT_MS);
  });
});

describe('batchLinesOnly', () => {
  it('drops lines without a batch id', () => {
    expect(batchLinesOnly().transform({ level: 'info', message: 'GET /health' })).toBe(false);
  });

  it('keeps lines written through a batch logger', () => {
    const line = { level: 'info', message: 'Batch committed', batchId: 'batch-1' };

    expect(batchLinesOnly().transform(line)).toEqual(line);
  });
});
