/**
 * Configuration Tests
 */

import { describe, it, expect } from 'vitest';
import { resolveIdentityConfig } from '../src/config.js';
import { SchemaIdentityError } from '../src/errors.js';
import type { IdentityConfig } from '../src/types.js';

function codeOf(config: IdentityConfig): string | undefined {
  try {
    resolveIdentityConfig(config);
  } catch (err) {
    return err instanceof SchemaIdentityError ? err.code : 'not-an-identity-error';
  }
  return undefined;
}

describe('resolveIdentityConfig', () => {
  it('fills in defaults', () => {
    expect(resolveIdentityConfig()).toEqual({
      settings: {
        algorithm: 'v1',
        digestLength: 64,
        trackDescriptions: false,
        trackFieldOrder: false,
        trackTypeOrder: false,
        trackDefaultValues: false,
        maxNodes: 10_000,
      },
      extraData: undefined,
      logger: { enabled: true, verbose: false, slowFingerprintMs: 50 },
      stamp: { enabled: true, field: 'schemaHash' },
    });
  });

  it('maps logging modes', () => {
    expect(resolveIdentityConfig({ logging: false }).logger.enabled).toBe(false);
    expect(resolveIdentityConfig({ logging: 'verbose' }).logger).toEqual({ enabled: true, verbose: true, slowFingerprintMs: 50 });
  });

  it('canonicalizes tracked extra data', () => {
    expect(resolveIdentityConfig({ trackedExtraData: { version: 2n } }).extraData).toEqual({ version: { $bigint: '2' } });
  });

  it('rejects invalid values with INVALID_CONFIG', () => {
    expect(codeOf({ digestLength: 7 })).toBe('INVALID_CONFIG');
    expect(codeOf({ digestLength: 12.5 })).toBe('INVALID_CONFIG');
    expect(codeOf({ maxNodes: 0 })).toBe('INVALID_CONFIG');
    expect(codeOf({ slowFingerprintMs: -1 })).toBe('INVALID_CONFIG');
    expect(codeOf({ trackedExtraData: { fn: () => 1 } })).toBe('INVALID_CONFIG');
    expect(codeOf({ stamp: { field: '' } })).toBe('INVALID_CONFIG');
  });

  it('accepts valid edge values', () => {
    expect(codeOf({ digestLength: 8, maxNodes: 1, slowFingerprintMs: 0, algorithm: 'v2' })).toBeUndefined();
  });
});
