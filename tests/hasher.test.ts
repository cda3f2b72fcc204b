/**
 * Hasher Tests — Versioned identifiers
 */

import { describe, it, expect } from 'vitest';
import { utf8ToBytes } from '@noble/hashes/utils.js';
import {
  compareIdentifiers,
  formatIdentifier,
  hashCanonicalForm,
  identifiersEqual,
  isKnownAlgorithmVersion,
  parseIdentifier,
  sha256Hex,
} from '../src/hasher.js';
import { SchemaIdentityError } from '../src/errors.js';

const ABC_SHA256 = 'ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad';

describe('sha256Hex', () => {
  it('hashes strings and bytes alike', () => {
    expect(sha256Hex('abc')).toBe(ABC_SHA256);
    expect(sha256Hex(utf8ToBytes('abc'))).toBe(ABC_SHA256);
  });
});

describe('hashCanonicalForm', () => {
  it('uses sha256 for v1', () => {
    const id = hashCanonicalForm(utf8ToBytes('abc'), 'v1');
    expect(id).toEqual({ algorithmVersion: 'v1', digest: ABC_SHA256 });
    expect(Object.isFrozen(id)).toBe(true);
  });

  it('uses a different digest for v2', () => {
    const id = hashCanonicalForm(utf8ToBytes('abc'), 'v2');
    expect(id.algorithmVersion).toBe('v2');
    expect(id.digest).toMatch(/^[0-9a-f]{64}$/);
    expect(id.digest).not.toBe(ABC_SHA256);
  });

  it('truncates to the requested digest length', () => {
    expect(hashCanonicalForm(utf8ToBytes('abc'), 'v1', 16).digest).toBe('ba7816bf8f01cfea');
  });

  it('rejects digest lengths outside 8..64', () => {
    expect(() => hashCanonicalForm(utf8ToBytes('abc'), 'v1', 4)).toThrow(SchemaIdentityError);
    expect(() => hashCanonicalForm(utf8ToBytes('abc'), 'v1', 65)).toThrow('Invalid "digestLength" option');
  });
});

describe('formatIdentifier / parseIdentifier', () => {
  it('formats as version:digest', () => {
    expect(formatIdentifier({ algorithmVersion: 'v1', digest: 'abcd' })).toBe('v1:abcd');
  });

  it('parses a formatted identifier', () => {
    expect(parseIdentifier('v2:00ff')).toEqual({ algorithmVersion: 'v2', digest: '00ff' });
  });

  it('requires the version segment and lowercase hex', () => {
    for (const text of ['abcd', 'v1:', 'v1:ABCD', 'x1:abcd', 'v1:abcd:ef']) {
      try {
        parseIdentifier(text);
        expect.unreachable(`"${text}" should not parse`);
      } catch (err) {
        expect(err).toBeInstanceOf(SchemaIdentityError);
        if (err instanceof SchemaIdentityError) expect(err.code).toBe('INVALID_IDENTIFIER');
      }
    }
  });
});

describe('compareIdentifiers', () => {
  it('compares digests within one version', () => {
    expect(compareIdentifiers('v1:ab12', 'v1:ab12')).toBe('equal');
    expect(compareIdentifiers('v1:ab12', 'v1:cd34')).toBe('unequal');
  });

  it('never calls different versions equal', () => {
    expect(compareIdentifiers('v1:ab12', 'v2:ab12')).toBe('unknown');
    expect(identifiersEqual('v1:ab12', 'v2:ab12')).toBe(false);
  });

  it('accepts identifier objects', () => {
    expect(identifiersEqual({ algorithmVersion: 'v1', digest: 'ab' }, 'v1:ab')).toBe(true);
  });
});

describe('isKnownAlgorithmVersion', () => {
  it('knows v1 and v2 only', () => {
    expect(isKnownAlgorithmVersion('v1')).toBe(true);
    expect(isKnownAlgorithmVersion('v2')).toBe(true);
    expect(isKnownAlgorithmVersion('v3')).toBe(false);
  });
});
