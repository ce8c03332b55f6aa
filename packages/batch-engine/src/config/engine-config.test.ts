import { describe, expect, test } from 'vitest';

import { ConfigurationError } from '../errors';
import { parseEngineConfig } from './engine-config';

describe('parseEngineConfig', () => {
  test('fills nested defaults and keeps given values', () => {
    expect(
      parseEngineConfig({
        concurrencyLimit: 8,
        batchTimeoutMs: 60000,
        retry: { maxAttempts: 5 },
        resolver: { recursive: true },
      }),
    ).toEqual({
      concurrencyLimit: 8,
      callTimeoutMs: 120000,
      batchTimeoutMs: 60000,
      retry: { maxAttempts: 5, baseDelayMs: 1000, maxDelayMs: 30000 },
      resolver: { recursive: true, allowEmpty: false, caseCollision: 'allow' },
    });
  });

  test('lists every invalid field', () => {
    let caught: unknown;
    try {
      parseEngineConfig({ concurrencyLimit: 64, callTimeoutMs: -1 });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigurationError);
    expect(caught).toMatchObject({
      details: [
        'concurrencyLimit: Number must be less than or equal to 32',
        'callTimeoutMs: Number must be greater than 0',
      ],
    });
  });

  test('rejects delays a timer cannot hold', () => {
    let caught: unknown;
    try {
      parseEngineConfig({
        callTimeoutMs: 3_000_000_000,
        batchTimeoutMs: 2_147_483_648,
        retry: { maxDelayMs: 2_147_483_648 },
      });
    } catch (error) {
      caught = error;
    }

    expect(caught).toMatchObject({
      details: [
        'callTimeoutMs: Number must be less than or equal to 2147483647',
        'batchTimeoutMs: Number must be less than or equal to 2147483647',
        'retry.maxDelayMs: Number must be less than or equal to 2147483647',
      ],
    });
    expect(
      parseEngineConfig({ callTimeoutMs: 2_147_483_647 }).callTimeoutMs,
    ).toBe(2_147_483_647);
  });

  test('rejects a max delay below the base delay', () => {
    expect(() =>
      parseEngineConfig({ retry: { baseDelayMs: 5000, maxDelayMs: 1000 } }),
    ).toThrow(
      'retry.maxDelayMs: maxDelayMs must be greater than or equal to baseDelayMs',
    );
  });
});
