/**
 * Schema Identity Zod Describer — zod `_def` trees → schema descriptions
 *
 * Covers every first-party zod v3 type. Wrappers that do not change the
 * validated shape (lazy, effects, brand, default, catch) are aliases; their
 * behaviors and defaults are collected by the extractor onto the node they
 * wrap.
 */

import { z } from 'zod';
import type { ZodTypeAny } from 'zod';
import { unsupportedNodeError } from '../errors.js';
import { toCanonicalValue } from '../encoding.js';
import type {
  BehaviorFunction,
  BehaviorHandle,
  ChildDescription,
  Constraint,
  SchemaDescription,
} from '../types.js';
import type { SchemaDescriber } from './adapter.js';

const KNOWN_ZOD_TYPES = [
  'ZodString', 'ZodNumber', 'ZodBigInt', 'ZodBoolean', 'ZodDate', 'ZodSymbol',
  'ZodUndefined', 'ZodNull', 'ZodAny', 'ZodUnknown', 'ZodNever', 'ZodVoid', 'ZodNaN',
  'ZodLiteral', 'ZodEnum', 'ZodNativeEnum', 'ZodArray', 'ZodSet', 'ZodRecord', 'ZodMap',
  'ZodTuple', 'ZodOptional', 'ZodNullable', 'ZodPromise', 'ZodReadonly', 'ZodFunction',
  'ZodPipeline', 'ZodIntersection', 'ZodUnion', 'ZodDiscriminatedUnion', 'ZodObject',
  'ZodLazy', 'ZodEffects', 'ZodBranded', 'ZodDefault', 'ZodCatch',
];

// ─── Library Wrapper Detection ───────────────────────────────────────────────
// `.refine()` and `.refinement()` hide the user's predicate inside a zod
// closure, and `.default(v)` / `.catch(v)` wrap plain values as `() => v`.
// Probe schemas give us the source text of those closures.

function sourceOf(fn: BehaviorFunction): string {
  return Function.prototype.toString.call(fn);
}

function refinementSource(schema: ZodTypeAny): string | undefined {
  if (!(schema instanceof z.ZodEffects)) return undefined;
  const effect = schema._def.effect;
  return effect.type === 'refinement' ? sourceOf(effect.refinement) : undefined;
}

const REFINEMENT_WRAPPERS = new Set(
  [
    refinementSource(z.any().refine(() => true)),
    refinementSource(z.any().refinement(() => true, { code: z.ZodIssueCode.custom })),
  ].filter((source): source is string => source !== undefined),
);

const VALUE_WRAPPERS = new Set([
  sourceOf(z.any().default(0)._def.defaultValue),
  sourceOf(z.any().catch(0)._def.catchValue),
]);

function isRefinementWrapper(fn: BehaviorFunction): boolean {
  return REFINEMENT_WRAPPERS.has(sourceOf(fn));
}

function isValueWrapper(fn: BehaviorFunction): boolean {
  return VALUE_WRAPPERS.has(sourceOf(fn));
}

// ─── Constraint Helpers ──────────────────────────────────────────────────────

interface ZodCheckLike {
  kind: string;
  message?: string;
}

function checkConstraints(checks: readonly ZodCheckLike[]): Constraint[] {
  const constraints: Constraint[] = [];
  for (const check of checks) {
    const { kind, message, ...args } = check;
    constraints.push({ name: kind, value: toCanonicalValue(args, `"${kind}" check`) });
    if (message !== undefined) {
      constraints.push({ name: `${kind}:message`, value: message, annotation: true });
    }
  }
  return constraints;
}

function boundConstraints(name: string, bound: { value: number; message?: string } | null): Constraint[] {
  if (!bound) return [];
  const constraints: Constraint[] = [{ name, value: bound.value }];
  if (bound.message !== undefined) {
    constraints.push({ name: `${name}:message`, value: bound.message, annotation: true });
  }
  return constraints;
}

function coerceConstraint(coerce: boolean): Constraint[] {
  return coerce ? [{ name: 'coerce', value: true }] : [];
}

function nativeEnumValues(enumObject: Record<string, string | number>): unknown[] {
  // Numeric TS enums carry reverse mappings (`1 -> "A"`); only forward keys count.
  return Object.keys(enumObject)
    .filter(key => typeof enumObject[enumObject[key] ?? ''] !== 'number')
    .map(key => enumObject[key]);
}

function child(schema: ZodTypeAny, fieldName?: string): ChildDescription<ZodTypeAny> {
  return fieldName === undefined ? { schema } : { schema, fieldName };
}

// ─── Describe ────────────────────────────────────────────────────────────────

export function describeZodSchema(schema: ZodTypeAny): SchemaDescription<ZodTypeAny> {
  const value: unknown = schema;
  if (!(value instanceof z.ZodType)) {
    const construct = typeof value === 'object' && value !== null ? value.constructor.name : typeof value;
    throw unsupportedNodeError(construct);
  }

  const description = schema.description;

  // Scalars
  if (schema instanceof z.ZodString) {
    return {
      kind: 'scalar', type: 'string', description,
      constraints: [...checkConstraints(schema._def.checks), ...coerceConstraint(schema._def.coerce)],
    };
  }
  if (schema instanceof z.ZodNumber) {
    return {
      kind: 'scalar', type: 'number', description,
      constraints: [...checkConstraints(schema._def.checks), ...coerceConstraint(schema._def.coerce)],
    };
  }
  if (schema instanceof z.ZodBigInt) {
    return {
      kind: 'scalar', type: 'bigint', description,
      constraints: [...checkConstraints(schema._def.checks), ...coerceConstraint(schema._def.coerce)],
    };
  }
  if (schema instanceof z.ZodDate) {
    return {
      kind: 'scalar', type: 'date', description,
      constraints: [...checkConstraints(schema._def.checks), ...coerceConstraint(schema._def.coerce)],
    };
  }
  if (schema instanceof z.ZodBoolean) {
    return { kind: 'scalar', type: 'boolean', description, constraints: coerceConstraint(schema._def.coerce) };
  }
  if (schema instanceof z.ZodSymbol) return { kind: 'scalar', type: 'symbol', description };
  if (schema instanceof z.ZodUndefined) return { kind: 'scalar', type: 'undefined', description };
  if (schema instanceof z.ZodNull) return { kind: 'scalar', type: 'null', description };
  if (schema instanceof z.ZodAny) return { kind: 'scalar', type: 'any', description };
  if (schema instanceof z.ZodUnknown) return { kind: 'scalar', type: 'unknown', description };
  if (schema instanceof z.ZodNever) return { kind: 'scalar', type: 'never', description };
  if (schema instanceof z.ZodVoid) return { kind: 'scalar', type: 'void', description };
  if (schema instanceof z.ZodNaN) return { kind: 'scalar', type: 'nan', description };

  // Literals
  if (schema instanceof z.ZodLiteral) {
    const value: unknown = schema.value;
    return {
      kind: 'literal', type: 'literal', description,
      constraints: [{ name: 'values', value: [toCanonicalValue(value, 'literal value')] }],
    };
  }
  if (schema instanceof z.ZodEnum) {
    const options: readonly string[] = schema.options;
    return {
      kind: 'literal', type: 'enum', description,
      constraints: [{ name: 'values', value: [...options], unordered: true }],
    };
  }
  if (schema instanceof z.ZodNativeEnum) {
    const enumObject: Record<string, string | number> = schema.enum;
    return {
      kind: 'literal', type: 'native-enum', description,
      constraints: [{ name: 'values', value: toCanonicalValue(nativeEnumValues(enumObject), 'enum values'), unordered: true }],
    };
  }

  // Containers
  if (schema instanceof z.ZodArray) {
    const element: ZodTypeAny = schema.element;
    return {
      kind: 'container', type: 'array', description,
      children: [child(element)],
      constraints: [
        ...boundConstraints('minLength', schema._def.minLength),
        ...boundConstraints('maxLength', schema._def.maxLength),
        ...boundConstraints('exactLength', schema._def.exactLength),
      ],
    };
  }
  if (schema instanceof z.ZodSet) {
    const valueType: ZodTypeAny = schema._def.valueType;
    return {
      kind: 'container', type: 'set', description,
      children: [child(valueType)],
      constraints: [
        ...boundConstraints('minSize', schema._def.minSize),
        ...boundConstraints('maxSize', schema._def.maxSize),
      ],
    };
  }
  if (schema instanceof z.ZodRecord) {
    const keyType: ZodTypeAny = schema._def.keyType;
    const valueType: ZodTypeAny = schema._def.valueType;
    return { kind: 'container', type: 'record', description, children: [child(keyType), child(valueType)] };
  }
  if (schema instanceof z.ZodMap) {
    const keyType: ZodTypeAny = schema._def.keyType;
    const valueType: ZodTypeAny = schema._def.valueType;
    return { kind: 'container', type: 'map', description, children: [child(keyType), child(valueType)] };
  }
  if (schema instanceof z.ZodTuple) {
    const items: readonly ZodTypeAny[] = schema._def.items;
    const rest: ZodTypeAny | null = schema._def.rest;
    return {
      kind: 'container', type: 'tuple', description,
      children: [...items.map(item => child(item)), ...(rest ? [child(rest)] : [])],
      constraints: rest ? [{ name: 'rest', value: true }] : [],
    };
  }
  if (schema instanceof z.ZodOptional) {
    const inner: ZodTypeAny = schema.unwrap();
    return { kind: 'container', type: 'optional', description, children: [child(inner)] };
  }
  if (schema instanceof z.ZodNullable) {
    const inner: ZodTypeAny = schema.unwrap();
    return { kind: 'container', type: 'nullable', description, children: [child(inner)] };
  }
  if (schema instanceof z.ZodPromise) {
    const inner: ZodTypeAny = schema.unwrap();
    return { kind: 'container', type: 'promise', description, children: [child(inner)] };
  }
  if (schema instanceof z.ZodReadonly) {
    const inner: ZodTypeAny = schema._def.innerType;
    return { kind: 'container', type: 'readonly', description, children: [child(inner)] };
  }
  if (schema instanceof z.ZodFunction) {
    const args: ZodTypeAny = schema._def.args;
    const returns: ZodTypeAny = schema._def.returns;
    return { kind: 'container', type: 'function', description, children: [child(args), child(returns)] };
  }
  if (schema instanceof z.ZodPipeline) {
    const input: ZodTypeAny = schema._def.in;
    const output: ZodTypeAny = schema._def.out;
    return { kind: 'container', type: 'pipeline', description, children: [child(input), child(output)] };
  }
  if (schema instanceof z.ZodIntersection) {
    const left: ZodTypeAny = schema._def.left;
    const right: ZodTypeAny = schema._def.right;
    return {
      kind: 'container', type: 'intersection', description,
      children: [child(left), child(right)],
      childOrder: 'unordered',
    };
  }

  // Unions
  if (schema instanceof z.ZodUnion) {
    const options: readonly ZodTypeAny[] = schema.options;
    return { kind: 'union', type: 'union', description, children: options.map(option => child(option)) };
  }
  if (schema instanceof z.ZodDiscriminatedUnion) {
    const options: readonly ZodTypeAny[] = schema.options;
    const discriminator: string = schema.discriminator;
    return {
      kind: 'union', type: 'discriminated-union', description,
      children: options.map(option => child(option)),
      constraints: [{ name: 'discriminator', value: discriminator }],
    };
  }

  // Models
  if (schema instanceof z.ZodObject) {
    const shape: Record<string, ZodTypeAny> = schema.shape;
    const catchall: ZodTypeAny = schema._def.catchall;
    const unknownKeys: string = schema._def.unknownKeys;
    const hasCatchall = !(catchall instanceof z.ZodNever);
    return {
      kind: 'model-reference', type: 'object', description,
      children: [
        ...Object.entries(shape).map(([name, field]) => child(field, name)),
        ...(hasCatchall ? [child(catchall)] : []),
      ],
      constraints: [
        { name: 'unknownKeys', value: unknownKeys },
        ...(hasCatchall ? [{ name: 'catchall', value: true }] : []),
      ],
    };
  }

  // Aliases
  if (schema instanceof z.ZodLazy) {
    const target: ZodTypeAny = schema.schema;
    return { kind: 'alias', target, description };
  }
  if (schema instanceof z.ZodEffects) {
    const target: ZodTypeAny = schema.innerType();
    return { kind: 'alias', target, description };
  }
  if (schema instanceof z.ZodBranded) {
    const target: ZodTypeAny = schema.unwrap();
    return { kind: 'alias', target, description };
  }
  if (schema instanceof z.ZodDefault) {
    const target: ZodTypeAny = schema.removeDefault();
    const defaultValue: () => unknown = schema._def.defaultValue;
    return {
      kind: 'alias', target, description,
      default: isValueWrapper(defaultValue)
        ? { value: defaultValue() }
        : { factory: { role: 'default-factory', fn: defaultValue } },
    };
  }
  if (schema instanceof z.ZodCatch) {
    const target: ZodTypeAny = schema.removeCatch();
    const catchValue: (ctx: { error: z.ZodError; input: unknown }) => unknown = schema._def.catchValue;
    if (!isValueWrapper(catchValue)) {
      return { kind: 'alias', target, description };
    }
    const value = catchValue({ error: new z.ZodError([]), input: undefined });
    return {
      kind: 'alias', target, description,
      constraints: [{ name: 'catch', value: toCanonicalValue(value, 'catch value') }],
    };
  }

  throw unsupportedNodeError(schema.constructor.name, KNOWN_ZOD_TYPES);
}

// ─── Behaviors ───────────────────────────────────────────────────────────────

export function listZodBehaviors(schema: ZodTypeAny): BehaviorHandle[] {
  if (schema instanceof z.ZodEffects) {
    const effect = schema._def.effect;
    switch (effect.type) {
      case 'refinement':
        return [{ role: 'refinement', fn: effect.refinement, opaque: isRefinementWrapper(effect.refinement) }];
      case 'transform':
        return [{ role: 'transform', fn: effect.transform }];
      case 'preprocess':
        return [{ role: 'preprocess', fn: effect.transform }];
    }
  }

  if (schema instanceof z.ZodCatch) {
    const catchValue: (ctx: { error: z.ZodError; input: unknown }) => unknown = schema._def.catchValue;
    if (!isValueWrapper(catchValue)) {
      return [{ role: 'catch', fn: catchValue }];
    }
  }

  return [];
}

export const zodDescriber: SchemaDescriber<ZodTypeAny> = {
  name: 'zod',
  describe: describeZodSchema,
  listBehaviors: listZodBehaviors,
};
