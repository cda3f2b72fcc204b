/**
 * Schema Identity JSON Schema Describer — JSON Schema documents → schema descriptions
 *
 * Describes schemas inside one document. Local `$ref` pointers resolve to the
 * referenced object itself, so a self-referencing definition is reached again
 * as the same object and the extractor sees the recursion.
 *
 * Schemas mixing several applicators (`$ref`, `allOf`, `anyOf`, `oneOf`,
 * `not`) with plain validation keywords are split into one part per
 * applicator plus the remaining keywords, joined as an intersection.
 *
 * Without `type`, the type is inferred from the keywords. Keywords of one
 * type family are kept on the inferred type; keywords of several families
 * are rejected, since no single type would keep them all.
 */

import { toCanonicalValue } from '../encoding.js';
import { UnsupportedSchemaNodeError, unsupportedNodeError } from '../errors.js';
import type {
  ChildDescription,
  Constraint,
  SchemaDescription,
  StructuralDescription,
} from '../types.js';
import type { SchemaDescriber } from './adapter.js';

export type JsonSchemaObject = { [keyword: string]: unknown };
export type JsonSchema = boolean | JsonSchemaObject;

// ─── Vocabulary ──────────────────────────────────────────────────────────────

const ANNOTATION_KEYWORDS = [
  '$schema', '$id', '$defs', 'definitions', 'title', 'examples',
  'deprecated', 'readOnly', 'writeOnly', '$comment', 'description', 'default',
];

const APPLICATOR_KEYWORDS = ['$ref', 'allOf', 'anyOf', 'oneOf', 'not'] as const;
type Applicator = (typeof APPLICATOR_KEYWORDS)[number];

const STRING_KEYWORDS = ['minLength', 'maxLength', 'pattern'];
const NUMBER_KEYWORDS = ['minimum', 'maximum', 'exclusiveMinimum', 'exclusiveMaximum', 'multipleOf'];
const ARRAY_KEYWORDS = ['items', 'prefixItems', 'minItems', 'maxItems', 'uniqueItems'];
const OBJECT_KEYWORDS = ['properties', 'required', 'additionalProperties', 'minProperties', 'maxProperties'];

/** Keywords that apply to every type (OpenAPI `int32`, `float`, `date-time`, ...). */
const GENERIC_KEYWORDS = ['format'];

const TYPE_FAMILIES: readonly (readonly [string, readonly string[]])[] = [
  ['object', OBJECT_KEYWORDS],
  ['array', ARRAY_KEYWORDS],
  ['string', STRING_KEYWORDS],
  ['number', NUMBER_KEYWORDS],
];

const VALIDATION_KEYWORDS = [
  'type', 'enum', 'const', 'nullable',
  ...STRING_KEYWORDS, ...NUMBER_KEYWORDS, ...ARRAY_KEYWORDS, ...OBJECT_KEYWORDS, ...GENERIC_KEYWORDS,
];

const KNOWN_KEYWORDS = [...ANNOTATION_KEYWORDS, ...APPLICATOR_KEYWORDS, ...VALIDATION_KEYWORDS];

const SIMPLE_TYPES = ['string', 'number', 'integer', 'boolean', 'null', 'array', 'object'];

// ─── Helpers ─────────────────────────────────────────────────────────────────

function isSchemaObject(value: unknown): value is JsonSchemaObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isSchema(value: unknown): value is JsonSchema {
  return typeof value === 'boolean' || isSchemaObject(value);
}

function invalidKeyword(keyword: string, expected: string): UnsupportedSchemaNodeError {
  return new UnsupportedSchemaNodeError({
    construct: keyword,
    message: `Keyword "${keyword}" must be ${expected}.`,
    fix: `Correct the "${keyword}" value.`,
  });
}

function schemaList(schema: JsonSchemaObject, keyword: string): JsonSchema[] {
  const value = schema[keyword];
  if (!Array.isArray(value) || !value.every(isSchema)) {
    throw invalidKeyword(keyword, 'an array of schemas');
  }
  return value;
}

function schemaAt(schema: JsonSchemaObject, keyword: string): JsonSchema {
  const value = schema[keyword];
  if (!isSchema(value)) throw invalidKeyword(keyword, 'a schema');
  return value;
}

function pick(schema: JsonSchemaObject, keywords: readonly string[]): Constraint[] {
  return keywords
    .filter(keyword => keyword in schema)
    .map(keyword => ({ name: keyword, value: toCanonicalValue(schema[keyword], `"${keyword}" keyword`) }));
}

function without(schema: JsonSchemaObject, keywords: readonly string[]): JsonSchemaObject {
  const rest: JsonSchemaObject = {};
  for (const [keyword, value] of Object.entries(schema)) {
    if (!keywords.includes(keyword)) rest[keyword] = value;
  }
  return rest;
}

function hasValidation(schema: JsonSchemaObject): boolean {
  return Object.keys(schema).some(keyword => VALIDATION_KEYWORDS.includes(keyword));
}

function inferType(schema: JsonSchemaObject): string | undefined {
  const families = TYPE_FAMILIES
    .filter(([, keywords]) => keywords.some(keyword => keyword in schema))
    .map(([type]) => type);
  if (families.length > 1) {
    throw new UnsupportedSchemaNodeError({
      construct: 'untyped',
      message: `Schema has no "type" but mixes ${families.join(' and ')} keywords.`,
      fix: `Add "type": ${JSON.stringify(families)} (or a single type) so every keyword applies to a declared type.`,
    });
  }
  return families[0];
}

/** Append the type-independent keywords to a structural description. */
function withGeneric(schema: JsonSchemaObject, described: StructuralDescription<JsonSchema>): StructuralDescription<JsonSchema> {
  const generic = pick(schema, GENERIC_KEYWORDS);
  if (generic.length === 0) return described;
  return { ...described, constraints: [...(described.constraints ?? []), ...generic] };
}

/** RFC 6901 pointer segments of a same-document `$ref`. */
export function parseLocalPointer(ref: string): string[] {
  if (!ref.startsWith('#')) {
    throw new UnsupportedSchemaNodeError({
      construct: '$ref',
      message: `Only same-document references are supported, got "${ref}".`,
      fix: 'Bundle external schemas into the document (e.g. under $defs) and reference them as "#/$defs/Name".',
    });
  }
  const pointer = decodeURIComponent(ref.slice(1));
  if (pointer === '') return [];
  if (!pointer.startsWith('/')) {
    throw new UnsupportedSchemaNodeError({
      construct: '$ref',
      message: `Anchor references are not supported, got "${ref}".`,
      fix: 'Use a JSON pointer such as "#/$defs/Name".',
    });
  }
  return pointer.slice(1).split('/').map(segment => segment.replace(/~1/g, '/').replace(/~0/g, '~'));
}

// ─── Describer ───────────────────────────────────────────────────────────────

/**
 * Create a describer for schemas inside `document`. Pass `document` (or any
 * schema object inside it) to the engine.
 */
export function createJsonSchemaDescriber(document: JsonSchema): SchemaDescriber<JsonSchema> {
  // Derived part-schemas are memoized so the same input always yields the same object.
  const parts = new WeakMap<JsonSchemaObject, Map<string, JsonSchemaObject>>();

  function part(schema: JsonSchemaObject, key: string, build: () => JsonSchemaObject): JsonSchemaObject {
    let byKey = parts.get(schema);
    if (!byKey) {
      byKey = new Map();
      parts.set(schema, byKey);
    }
    let derived = byKey.get(key);
    if (!derived) {
      derived = build();
      byKey.set(key, derived);
    }
    return derived;
  }

  function resolveRef(ref: unknown): JsonSchema {
    if (typeof ref !== 'string') throw invalidKeyword('$ref', 'a string');

    let current: unknown = document;
    for (const segment of parseLocalPointer(ref)) {
      if (Array.isArray(current)) {
        current = current[Number(segment)];
      } else if (isSchemaObject(current)) {
        current = current[segment];
      } else {
        current = undefined;
      }
    }

    if (!isSchema(current)) {
      throw new UnsupportedSchemaNodeError({
        construct: '$ref',
        message: `Reference "${ref}" does not point at a schema in this document.`,
        fix: 'Check the pointer path and its ~0 / ~1 escaping.',
      });
    }
    return current;
  }

  function describeApplicator(schema: JsonSchemaObject, applicator: Applicator): SchemaDescription<JsonSchema> {
    switch (applicator) {
      case '$ref':
        return { kind: 'alias', target: resolveRef(schema['$ref']) };
      case 'anyOf':
      case 'oneOf':
        return {
          kind: 'union',
          type: applicator,
          children: schemaList(schema, applicator).map(option => ({ schema: option })),
        };
      case 'allOf':
        return {
          kind: 'container',
          type: 'allOf',
          childOrder: 'unordered',
          children: schemaList(schema, 'allOf').map(member => ({ schema: member })),
        };
      case 'not':
        return { kind: 'container', type: 'not', children: [{ schema: schemaAt(schema, 'not') }] };
    }
  }

  function describeTyped(schema: JsonSchemaObject, type: string): StructuralDescription<JsonSchema> {
    switch (type) {
      case 'string':
        return { kind: 'scalar', type, constraints: pick(schema, STRING_KEYWORDS) };
      case 'number':
      case 'integer':
        return { kind: 'scalar', type, constraints: pick(schema, NUMBER_KEYWORDS) };
      case 'boolean':
      case 'null':
        return { kind: 'scalar', type };
      case 'array':
        return describeArray(schema);
      case 'object':
        return describeObject(schema);
      default:
        throw unsupportedNodeError(`type:${type}`, SIMPLE_TYPES.map(name => `type:${name}`));
    }
  }

  function describeArray(schema: JsonSchemaObject): StructuralDescription<JsonSchema> {
    const children: ChildDescription<JsonSchema>[] = [];
    const constraints = pick(schema, ['minItems', 'maxItems', 'uniqueItems']);

    // draft-07 tuple form: `items` is an array, `additionalItems` is not modeled.
    const prefix = 'prefixItems' in schema
      ? schemaList(schema, 'prefixItems')
      : Array.isArray(schema['items']) ? schemaList(schema, 'items') : [];
    const rest = 'items' in schema && !Array.isArray(schema['items']) ? schemaAt(schema, 'items') : undefined;

    if (prefix.length > 0) {
      constraints.push({ name: 'prefixItems', value: prefix.length });
      children.push(...prefix.map(item => ({ schema: item })));
    }
    constraints.push({ name: 'items', value: rest !== undefined });
    if (rest !== undefined) children.push({ schema: rest });

    return { kind: 'container', type: prefix.length > 0 ? 'tuple' : 'array', constraints, children };
  }

  function describeObject(schema: JsonSchemaObject): StructuralDescription<JsonSchema> {
    const children: ChildDescription<JsonSchema>[] = [];
    const constraints = pick(schema, ['minProperties', 'maxProperties']);

    if ('properties' in schema) {
      const properties = schema['properties'];
      if (!isSchemaObject(properties)) throw invalidKeyword('properties', 'an object of schemas');
      for (const [fieldName, property] of Object.entries(properties)) {
        if (!isSchema(property)) throw invalidKeyword(`properties.${fieldName}`, 'a schema');
        children.push({ schema: property, fieldName });
      }
    }

    if ('required' in schema) {
      const required = schema['required'];
      if (!Array.isArray(required) || !required.every((name): name is string => typeof name === 'string')) {
        throw invalidKeyword('required', 'an array of property names');
      }
      constraints.push({ name: 'required', value: required, unordered: true });
    }

    const additional = schema['additionalProperties'];
    if (typeof additional === 'boolean') {
      constraints.push({ name: 'additionalProperties', value: additional });
    } else if (additional !== undefined) {
      constraints.push({ name: 'additionalProperties', value: 'schema' });
      children.push({ schema: schemaAt(schema, 'additionalProperties') });
    }

    return { kind: 'model-reference', type: 'object', constraints, children };
  }

  function describeJsonSchema(schema: JsonSchema): SchemaDescription<JsonSchema> {
    if (schema === true) return { kind: 'scalar', type: 'any' };
    if (schema === false) return { kind: 'scalar', type: 'never' };
    if (!isSchemaObject(schema)) {
      throw unsupportedNodeError(Array.isArray(schema) ? 'array' : typeof schema);
    }

    for (const keyword of Object.keys(schema)) {
      if (!KNOWN_KEYWORDS.includes(keyword)) throw unsupportedNodeError(keyword, KNOWN_KEYWORDS);
    }

    const description = typeof schema['description'] === 'string' ? schema['description'] : undefined;
    const base = {
      ...(description !== undefined ? { description } : {}),
      ...('default' in schema ? { default: { value: schema['default'] } } : {}),
    };

    if (schema['nullable'] === true) {
      const inner = part(schema, 'nullable', () => without(schema, ['nullable', 'description', 'default']));
      return { ...base, kind: 'container', type: 'nullable', children: [{ schema: inner }] };
    }

    const applicators = APPLICATOR_KEYWORDS.filter(keyword => keyword in schema);
    const [single] = applicators;
    if (single !== undefined && (applicators.length > 1 || hasValidation(schema))) {
      const plain = without(schema, [...APPLICATOR_KEYWORDS, 'description', 'default']);
      const members: ChildDescription<JsonSchema>[] = applicators.map(applicator => ({
        schema: part(schema, applicator, () => ({ [applicator]: schema[applicator] })),
      }));
      if (hasValidation(plain)) members.push({ schema: part(schema, 'plain', () => plain) });
      return { ...base, kind: 'container', type: 'allOf', childOrder: 'unordered', children: members };
    }
    if (single !== undefined) return { ...base, ...describeApplicator(schema, single) };

    if ('enum' in schema) {
      const values = schema['enum'];
      if (!Array.isArray(values)) throw invalidKeyword('enum', 'an array');
      return {
        ...base,
        kind: 'literal',
        type: 'enum',
        constraints: [
          { name: 'values', value: toCanonicalValue(values, 'enum values'), unordered: true },
          ...pick(schema, ['type', ...GENERIC_KEYWORDS]),
        ],
      };
    }
    if ('const' in schema) {
      return {
        ...base,
        kind: 'literal',
        type: 'const',
        constraints: [
          { name: 'values', value: [toCanonicalValue(schema['const'], 'const value')] },
          ...pick(schema, ['type', ...GENERIC_KEYWORDS]),
        ],
      };
    }

    const type = schema['type'];
    if (Array.isArray(type)) {
      if (!type.every((name): name is string => typeof name === 'string')) throw invalidKeyword('type', 'a type name or an array of them');
      const rest = without(schema, ['type', 'description', 'default']);
      return {
        ...base,
        kind: 'union',
        type: 'type',
        children: type.map(name => ({ schema: part(schema, `type:${name}`, () => ({ ...rest, type: name })) })),
      };
    }
    if (type !== undefined && typeof type !== 'string') throw invalidKeyword('type', 'a type name or an array of them');

    const resolvedType = type ?? inferType(schema);
    if (resolvedType === undefined) return { ...base, ...withGeneric(schema, { kind: 'scalar', type: 'any' }) };
    return { ...base, ...withGeneric(schema, describeTyped(schema, resolvedType)) };
  }

  return {
    name: 'json-schema',
    describe: describeJsonSchema,
    listBehaviors: () => [],
  };
}
