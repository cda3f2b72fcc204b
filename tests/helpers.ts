/**
 * In-process schema language for exercising the pipeline without a
 * validation library.
 */

import type { SchemaDescriber } from '../src/adapters/adapter.js';
import type {
  BehaviorHandle,
  ChildOrder,
  Constraint,
  DefaultSpec,
  SchemaDescription,
  StructuralKind,
} from '../src/types.js';

export interface TestSchema {
  description: SchemaDescription<TestSchema>;
  behaviors?: BehaviorHandle[];
}

export const testDescriber: SchemaDescriber<TestSchema> = {
  name: 'test',
  describe: schema => schema.description,
  listBehaviors: schema => schema.behaviors ?? [],
};

interface Extras {
  constraints?: Constraint[];
  default?: DefaultSpec;
  description?: string;
  behaviors?: BehaviorHandle[];
}

export function scalar(type: string, extras: Extras = {}): TestSchema {
  const { behaviors, ...rest } = extras;
  return { description: { kind: 'scalar', type, ...rest }, behaviors };
}

export function node(
  kind: StructuralKind,
  type: string,
  children: { schema: TestSchema; fieldName?: string }[],
  extras: Extras & { childOrder?: ChildOrder } = {},
): TestSchema {
  const { behaviors, ...rest } = extras;
  return { description: { kind, type, children, ...rest }, behaviors };
}

export function model(fields: [string, TestSchema][], extras: Extras = {}): TestSchema {
  return node('model-reference', 'object', fields.map(([fieldName, schema]) => ({ schema, fieldName })), extras);
}

export function union(options: TestSchema[], extras: Extras = {}): TestSchema {
  return node('union', 'union', options.map(schema => ({ schema })), extras);
}

export function alias(target: TestSchema, extras: Extras = {}): TestSchema {
  const { behaviors, ...rest } = extras;
  return { description: { kind: 'alias', target, ...rest }, behaviors };
}

/** An alias whose target is filled in later, for building cycles. */
export function forward(): { schema: TestSchema; resolve(target: TestSchema): void } {
  const schema: TestSchema = { description: { kind: 'scalar', type: 'unresolved' } };
  return {
    schema,
    resolve(target) {
      schema.description = { kind: 'alias', target };
    },
  };
}
