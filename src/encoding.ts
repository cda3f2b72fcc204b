/**
 * Canonical byte encoding primitives.
 *
 * Every primitive has exactly one encoding: integers are uint32 big-endian,
 * strings are uint32 length-prefixed UTF-8, JSON values go through RFC 8785
 * canonicalization first.
 */

import { utf8ToBytes } from '@noble/hashes/utils.js';
import { canonicalize } from 'json-canonicalize';
import { serializationError } from './errors.js';
import type { JsonValue } from './types.js';

export class CanonicalWriter {
  private chunks: Uint8Array[] = [];
  private length = 0;

  uint8(value: number): this {
    return this.push(Uint8Array.of(value & 0xff));
  }

  uint32(value: number): this {
    if (!Number.isInteger(value) || value < 0 || value > 0xffffffff) {
      throw new RangeError(`uint32 out of range: ${value}`);
    }
    const out = new Uint8Array(4);
    new DataView(out.buffer).setUint32(0, value, false);
    return this.push(out);
  }

  bool(value: boolean): this {
    return this.uint8(value ? 1 : 0);
  }

  string(value: string): this {
    const bytes = utf8ToBytes(value);
    this.uint32(bytes.length);
    return this.push(bytes);
  }

  /** Presence flag, then the string when present. */
  optionalString(value: string | undefined): this {
    if (value === undefined) return this.bool(false);
    this.bool(true);
    return this.string(value);
  }

  json(value: JsonValue): this {
    return this.string(canonicalJson(value));
  }

  finish(): Uint8Array {
    const out = new Uint8Array(this.length);
    let offset = 0;
    for (const chunk of this.chunks) {
      out.set(chunk, offset);
      offset += chunk.length;
    }
    return out;
  }

  private push(bytes: Uint8Array): this {
    this.chunks.push(bytes);
    this.length += bytes.length;
    return this;
  }
}

export function canonicalJson(value: JsonValue): string {
  return canonicalize(value);
}

/** Locale-independent string ordering (UTF-16 code units). */
export function compareCodePoints(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/**
 * Convert an arbitrary literal (enum member, check argument, default value)
 * into a JSON value with a single representation.
 *
 * Values JSON has no spelling for are tagged: `{ $bigint: "10" }`,
 * `{ $regexp: { source, flags } }`, `{ $number: "NaN" }` and so on.
 * Functions and self-referencing objects cannot be represented and throw
 * SERIALIZATION_FAILED.
 */
export function toCanonicalValue(value: unknown, what = 'schema value'): JsonValue {
  try {
    return convert(value, new Set<object>());
  } catch (err) {
    throw serializationError(err, what);
  }
}

function convert(value: unknown, seen: Set<object>): JsonValue {
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return value;
    case 'number':
      if (Number.isFinite(value)) return Object.is(value, -0) ? 0 : value;
      return { $number: String(value) };
    case 'bigint':
      return { $bigint: value.toString() };
    case 'undefined':
      return { $undefined: true };
    case 'symbol':
      return { $symbol: value.description ?? '' };
    case 'function':
      throw new TypeError(`functions have no canonical form (${value.name || 'anonymous'})`);
  }

  if (value === null) return null;
  if (typeof value !== 'object') {
    throw new TypeError(`unsupported value type ${typeof value}`);
  }

  if (value instanceof RegExp) {
    return { $regexp: { source: value.source, flags: value.flags } };
  }
  if (value instanceof Date) {
    return { $date: Number.isNaN(value.getTime()) ? 'Invalid Date' : value.toISOString() };
  }

  if (seen.has(value)) {
    throw new TypeError('value references itself');
  }
  seen.add(value);

  let result: JsonValue;
  if (Array.isArray(value)) {
    result = value.map(entry => convert(entry, seen));
  } else if (value instanceof Map) {
    result = { $map: [...value.entries()].map(([k, v]) => [convert(k, seen), convert(v, seen)]) };
  } else if (value instanceof Set) {
    result = { $set: [...value.values()].map(entry => convert(entry, seen)) };
  } else {
    const record: { [key: string]: JsonValue } = {};
    for (const [key, entry] of Object.entries(value)) {
      record[key] = convert(entry, seen);
    }
    result = record;
  }

  seen.delete(value);
  return result;
}
