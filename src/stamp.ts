/**
 * Schema Identity — Schema Hash Stamping
 *
 * Pure utility functions for stamping a document with the identifier of the
 * schema it was validated against. Immutable: always returns a new object.
 */

import { invalidConfigError } from './errors.js';
import type { StampFieldConfig } from './types.js';

export const DEFAULT_STAMP_FIELD = 'schemaHash';

export interface ResolvedStampConfig {
  enabled: boolean;
  field: string;
}

/**
 * Resolve user-provided stamp config into a normalized form.
 */
export function resolveStampConfig(config?: boolean | StampFieldConfig): ResolvedStampConfig {
  if (config === false) {
    return { enabled: false, field: DEFAULT_STAMP_FIELD };
  }

  if (config === undefined || config === true) {
    return { enabled: true, field: DEFAULT_STAMP_FIELD };
  }

  const field = config.field ?? DEFAULT_STAMP_FIELD;
  if (field.length === 0) {
    throw invalidConfigError('stamp.field', 'the field name must not be empty');
  }
  return { enabled: true, field };
}

/**
 * Copy `doc` with the schema hash under the configured field.
 * A value the caller already set is preserved (never overwritten).
 */
export function injectSchemaHash<T extends Record<string, unknown>>(
  doc: T,
  hash: string,
  config: ResolvedStampConfig,
): T & Record<string, unknown> {
  if (!config.enabled || config.field in doc) return { ...doc };
  return { ...doc, [config.field]: hash };
}
