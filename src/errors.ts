/**
 * Schema Identity Error System — Normalized errors with fix instructions
 *
 * Everything that prevents an identifier from being produced surfaces as a
 * SchemaIdentityError. There is no partial identifier: a computation either
 * completes and is cached, or throws one of these.
 */

import type { IdentityErrorCode } from './types.js';

// ─── SchemaIdentityError ─────────────────────────────────────────────────────

export class SchemaIdentityError extends Error {
  readonly code: IdentityErrorCode;
  readonly originalError: unknown;
  readonly path?: string;
  readonly timestamp: Date;
  readonly fix: string;
  protected readonly baseMessage: string;

  constructor(opts: {
    code: IdentityErrorCode;
    message: string;
    fix: string;
    path?: string;
    originalError?: unknown;
  }) {
    const where = opts.path ? ` (at ${opts.path})` : '';
    super(`${opts.message}${where} Fix: ${opts.fix}`);
    this.name = 'SchemaIdentityError';
    this.code = opts.code;
    this.originalError = opts.originalError;
    this.path = opts.path;
    this.timestamp = new Date();
    this.fix = opts.fix;
    this.baseMessage = opts.message;
  }

  /** Same error, located at a schema path. */
  atPath(path: string): SchemaIdentityError {
    return new SchemaIdentityError({
      code: this.code,
      message: this.baseMessage,
      fix: this.fix,
      path,
      originalError: this.originalError,
    });
  }
}

/**
 * The describer met a construct this engine version cannot canonicalize.
 * Fatal: skipping it would let two different schemas share an identifier.
 */
export class UnsupportedSchemaNodeError extends SchemaIdentityError {
  readonly construct: string;

  constructor(opts: { construct: string; message?: string; fix?: string; path?: string }) {
    super({
      code: 'UNSUPPORTED_SCHEMA_NODE',
      message: opts.message ?? `Unsupported schema construct "${opts.construct}".`,
      fix: opts.fix ?? 'Remove the construct from the schema, or upgrade to an engine version that models it.',
      path: opts.path,
    });
    this.name = 'UnsupportedSchemaNodeError';
    this.construct = opts.construct;
  }

  override atPath(path: string): UnsupportedSchemaNodeError {
    return new UnsupportedSchemaNodeError({
      construct: this.construct,
      message: this.baseMessage,
      fix: this.fix,
      path,
    });
  }
}

/** The schema graph grew past the configured node bound. */
export class CycleDepthExceededError extends SchemaIdentityError {
  readonly limit: number;

  constructor(limit: number, path?: string) {
    super({
      code: 'CYCLE_DEPTH_EXCEEDED',
      message: `Schema graph exceeded ${limit} nodes.`,
      fix: 'Check the schema description for a malformed self-reference, or raise maxNodes for very large schemas.',
      path,
    });
    this.name = 'CycleDepthExceededError';
    this.limit = limit;
  }

  override atPath(path: string): CycleDepthExceededError {
    return new CycleDepthExceededError(this.limit, path);
  }
}

// ─── Error Helpers ───────────────────────────────────────────────────────────

export function unsupportedNodeError(construct: string, known: readonly string[] = []): UnsupportedSchemaNodeError {
  const suggestion = findClosestMatch(construct, known);
  if (suggestion) {
    return new UnsupportedSchemaNodeError({
      construct,
      fix: `Did you mean "${suggestion}"? Otherwise remove "${construct}" from the schema.`,
    });
  }
  return new UnsupportedSchemaNodeError({ construct });
}

export function serializationError(err: unknown, what: string): SchemaIdentityError {
  const reason = err instanceof Error ? `${err.name}: ${err.message}` : String(err);
  return new SchemaIdentityError({
    code: 'SERIALIZATION_FAILED',
    message: `The ${what} could not be serialized, so the schema identifier can't be computed. Error: ${reason}`,
    fix: 'Use JSON-compatible values (no functions or self-referencing objects) in literals, defaults and tracked extra data.',
    originalError: err,
  });
}

export function invalidConfigError(option: string, reason: string): SchemaIdentityError {
  return new SchemaIdentityError({
    code: 'INVALID_CONFIG',
    message: `Invalid "${option}" option: ${reason}.`,
    fix: `Pass a valid "${option}" value, or omit it to use the default.`,
  });
}

/** Wrap anything thrown during a computation into a SchemaIdentityError. */
export function mapNativeError(err: unknown): SchemaIdentityError {
  if (err instanceof SchemaIdentityError) return err;

  const message = err instanceof Error ? err.message : String(err);
  return new SchemaIdentityError({
    code: 'INTERNAL_ERROR',
    message: `Schema identifier computation failed: ${message}`,
    fix: 'Check the original error for details.',
    originalError: err,
  });
}

// ─── Helpers ─────────────────────────────────────────────────────────────────

function findClosestMatch(input: string, candidates: readonly string[]): string | null {
  if (candidates.length === 0) return null;

  let bestMatch: string | null = null;
  let bestDistance = Infinity;

  for (const candidate of candidates) {
    const dist = levenshtein(input.toLowerCase(), candidate.toLowerCase());
    if (dist < bestDistance && dist <= 2) {
      bestDistance = dist;
      bestMatch = candidate;
    }
  }

  return bestMatch;
}

function levenshtein(a: string, b: string): number {
  let previous = Array.from({ length: b.length + 1 }, (_, j) => j);

  for (let i = 1; i <= a.length; i++) {
    const current = [i];
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      current[j] = Math.min(
        (previous[j] ?? 0) + 1,
        (current[j - 1] ?? 0) + 1,
        (previous[j - 1] ?? 0) + cost,
      );
    }
    previous = current;
  }

  return previous[b.length] ?? 0;
}
