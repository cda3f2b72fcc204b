/**
 * Schema Identity Reports — what was hashed, how, and with which settings
 *
 * Identifiers are process-wide facts, so every report carries the process
 * start time rather than the moment it was asked for.
 */

import type { BehaviorRef, Fingerprint, IdentitySettings, SchemaIdentityReport } from './types.js';
import { formatIdentifier } from './hasher.js';

export const processStartedAt = new Date(Date.now() - Math.round(process.uptime() * 1000));

export function createIdentityReport(opts: {
  label: string;
  fingerprint: Fingerprint;
  settings: IdentitySettings;
  computedAt?: Date;
}): SchemaIdentityReport {
  const { fingerprint } = opts;
  return {
    label: opts.label,
    identifier: formatIdentifier(fingerprint.identifier),
    algorithmVersion: fingerprint.identifier.algorithmVersion,
    computedAt: opts.computedAt ?? processStartedAt,
    nodeCount: fingerprint.nodeCount,
    classCount: fingerprint.classCount,
    degradedBehaviors: dedupeBehaviors(fingerprint.degradedBehaviors),
    settings: { ...opts.settings },
  };
}

function dedupeBehaviors(refs: BehaviorRef[]): BehaviorRef[] {
  const seen = new Set<string>();
  return refs.filter(ref => {
    const key = `${ref.role}\u0000${ref.strategy}\u0000${ref.payload}`;
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}
