/**
 * Schema Identity Hasher — canonical bytes → versioned identifier
 *
 * Digests are seedless and deterministic across processes and machines.
 * The algorithm version is written into the canonical header AND prefixed to
 * the output, so bumping it is the only way an unchanged schema changes hash.
 */

import { blake3 } from '@noble/hashes/blake3.js';
import { sha256 } from '@noble/hashes/sha2.js';
import { bytesToHex, utf8ToBytes } from '@noble/hashes/utils.js';
import { SchemaIdentityError, invalidConfigError } from './errors.js';
import type { Identifier, IdentifierComparison, KnownAlgorithmVersion } from './types.js';

export const CURRENT_ALGORITHM_VERSION: KnownAlgorithmVersion = 'v1';

/** Hex characters in a full digest, for every known version. */
export const FULL_DIGEST_LENGTH = 64;
export const MIN_DIGEST_LENGTH = 8;

const DIGESTS: Record<KnownAlgorithmVersion, (bytes: Uint8Array) => Uint8Array> = {
  v1: bytes => sha256(bytes),
  v2: bytes => blake3(bytes),
};

const IDENTIFIER_PATTERN = /^(v[0-9]+):([0-9a-f]+)$/;

export function isKnownAlgorithmVersion(value: unknown): value is KnownAlgorithmVersion {
  return value === 'v1' || value === 'v2';
}

export function hashCanonicalForm(
  bytes: Uint8Array,
  version: KnownAlgorithmVersion = CURRENT_ALGORITHM_VERSION,
  digestLength: number = FULL_DIGEST_LENGTH,
): Identifier {
  if (!Number.isInteger(digestLength) || digestLength < MIN_DIGEST_LENGTH || digestLength > FULL_DIGEST_LENGTH) {
    throw invalidConfigError('digestLength', `expected an integer between ${MIN_DIGEST_LENGTH} and ${FULL_DIGEST_LENGTH}, got ${digestLength}`);
  }

  const digest = bytesToHex(DIGESTS[version](bytes)).slice(0, digestLength);
  return Object.freeze({ algorithmVersion: version, digest });
}

/** Hex sha256 of a string. Used for structural labels and behavior source hashes. */
export function sha256Hex(text: string | Uint8Array): string {
  return bytesToHex(sha256(typeof text === 'string' ? utf8ToBytes(text) : text));
}

export function formatIdentifier(id: Identifier): string {
  return `${id.algorithmVersion}:${id.digest}`;
}

export function parseIdentifier(text: string): Identifier {
  const match = IDENTIFIER_PATTERN.exec(text);
  if (!match) {
    throw new SchemaIdentityError({
      code: 'INVALID_IDENTIFIER',
      message: `"${text}" is not a schema identifier.`,
      fix: 'Identifiers look like "v1:<lowercase hex digest>". The version segment is mandatory.',
    });
  }
  const [, algorithmVersion = '', digest = ''] = match;
  return Object.freeze({ algorithmVersion, digest });
}

/**
 * Digests from different algorithm versions are never comparable: the answer
 * is `unknown`, never `equal`.
 */
export function compareIdentifiers(a: Identifier | string, b: Identifier | string): IdentifierComparison {
  const left = typeof a === 'string' ? parseIdentifier(a) : a;
  const right = typeof b === 'string' ? parseIdentifier(b) : b;

  if (left.algorithmVersion !== right.algorithmVersion) return 'unknown';
  return left.digest === right.digest ? 'equal' : 'unequal';
}

export function identifiersEqual(a: Identifier | string, b: Identifier | string): boolean {
  return compareIdentifiers(a, b) === 'equal';
}
