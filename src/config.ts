/**
 * Schema Identity — Configuration
 *
 * Every option is fixed when an engine is created. Settings that change the
 * canonical form are written into its header, so two engines with different
 * settings never produce colliding identifiers.
 */

import { toCanonicalValue } from './encoding.js';
import { invalidConfigError } from './errors.js';
import { DEFAULT_MAX_NODES } from './extract.js';
import {
  CURRENT_ALGORITHM_VERSION,
  FULL_DIGEST_LENGTH,
  MIN_DIGEST_LENGTH,
  isKnownAlgorithmVersion,
} from './hasher.js';
import type { LoggerConfig } from './logger.js';
import { resolveStampConfig, type ResolvedStampConfig } from './stamp.js';
import type { IdentityConfig, IdentitySettings, JsonValue } from './types.js';

export const DEFAULT_SLOW_FINGERPRINT_MS = 50;

export interface ResolvedIdentityConfig {
  settings: IdentitySettings;
  /** Canonical JSON form of `trackedExtraData`, when given. */
  extraData: JsonValue | undefined;
  logger: LoggerConfig;
  stamp: ResolvedStampConfig;
}

function resolveFlag(option: string, value: boolean | undefined): boolean {
  if (value === undefined) return false;
  if (typeof value !== 'boolean') {
    throw invalidConfigError(option, `expected true or false, got ${String(value)}`);
  }
  return value;
}

function resolvePositiveInteger(option: string, value: number | undefined, fallback: number, min: number, max: number): number {
  if (value === undefined) return fallback;
  if (!Number.isInteger(value) || value < min || value > max) {
    throw invalidConfigError(option, `expected an integer between ${min} and ${max}, got ${value}`);
  }
  return value;
}

export function resolveIdentityConfig(config: IdentityConfig = {}): ResolvedIdentityConfig {
  const algorithm = config.algorithm ?? CURRENT_ALGORITHM_VERSION;
  if (!isKnownAlgorithmVersion(algorithm)) {
    throw invalidConfigError('algorithm', `unknown algorithm version "${String(algorithm)}"; known versions are v1 and v2`);
  }

  const settings: IdentitySettings = {
    algorithm,
    digestLength: resolvePositiveInteger('digestLength', config.digestLength, FULL_DIGEST_LENGTH, MIN_DIGEST_LENGTH, FULL_DIGEST_LENGTH),
    trackDescriptions: resolveFlag('trackDescriptions', config.trackDescriptions),
    trackFieldOrder: resolveFlag('trackFieldOrder', config.trackFieldOrder),
    trackTypeOrder: resolveFlag('trackTypeOrder', config.trackTypeOrder),
    trackDefaultValues: resolveFlag('trackDefaultValues', config.trackDefaultValues),
    maxNodes: resolvePositiveInteger('maxNodes', config.maxNodes, DEFAULT_MAX_NODES, 1, Number.MAX_SAFE_INTEGER),
  };

  let extraData: JsonValue | undefined;
  if (config.trackedExtraData !== undefined) {
    try {
      extraData = toCanonicalValue(config.trackedExtraData, 'tracked extra data');
    } catch (err) {
      throw invalidConfigError('trackedExtraData', `the value is not JSON-serializable (${err instanceof Error ? err.message : String(err)})`);
    }
  }

  const logging = config.logging ?? true;
  if (logging !== true && logging !== false && logging !== 'verbose') {
    throw invalidConfigError('logging', `expected true, false or 'verbose', got ${String(logging)}`);
  }

  const slowFingerprintMs = config.slowFingerprintMs ?? DEFAULT_SLOW_FINGERPRINT_MS;
  if (!Number.isFinite(slowFingerprintMs) || slowFingerprintMs < 0) {
    throw invalidConfigError('slowFingerprintMs', `expected a non-negative number, got ${slowFingerprintMs}`);
  }

  return {
    settings,
    extraData,
    logger: { enabled: logging !== false, verbose: logging === 'verbose', slowFingerprintMs },
    stamp: resolveStampConfig(config.stamp),
  };
}
