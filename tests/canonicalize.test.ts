/**
 * Canonicalizer Tests — labels, dedup, ordering, encoding
 */

import { describe, it, expect } from 'vitest';
import { canonicalize, computeStructuralLabels, type CanonicalizeOptions } from '../src/canonicalize.js';
import { extractSchemaGraph } from '../src/extract.js';
import { resolveGraphBehaviors } from '../src/behaviors.js';
import { SchemaIdentityError } from '../src/errors.js';
import type { SchemaGraph, SchemaNode } from '../src/types.js';
import { alias, forward, model, node, scalar, testDescriber, union, type TestSchema } from './helpers.js';

function graphOf(schema: TestSchema): SchemaGraph {
  return resolveGraphBehaviors(extractSchemaGraph(schema, testDescriber));
}

function bytesOf(schema: TestSchema, options: Partial<CanonicalizeOptions> = {}): Uint8Array {
  return canonicalize(graphOf(schema), options).bytes;
}

function tuple(items: TestSchema[]): TestSchema {
  return node('container', 'tuple', items.map(schema => ({ schema })));
}

function enumOf(values: string[]): TestSchema {
  return { description: { kind: 'literal', type: 'enum', constraints: [{ name: 'values', value: values, unordered: true }] } };
}

function bare(id: number, overrides: Partial<SchemaNode> = {}): SchemaNode {
  return {
    id, kind: 'scalar', type: 'string', constraints: [], children: [],
    childOrder: 'ordered', defaultPresent: false, behaviorRefs: [], ...overrides,
  };
}

describe('computeStructuralLabels', () => {
  it('settles a single node in one round', () => {
    const result = computeStructuralLabels(graphOf(scalar('string')), { trackFieldOrder: false, trackTypeOrder: false });
    expect(result.classCount).toBe(1);
    expect(result.rounds).toBe(1);
    expect(result.reachable).toEqual([0]);
  });

  it('gives structurally equal nodes equal labels', () => {
    const { labels } = computeStructuralLabels(graphOf(model([['a', scalar('string')], ['b', scalar('string')]])));
    expect(labels[1]).toBe(labels[2]);
    expect(labels[0]).not.toBe(labels[1]);
  });

  it('gives a plain reference its target label', () => {
    const self = forward();
    self.resolve(model([['next', node('container', 'optional', [{ schema: self.schema }])]]));

    const { labels } = computeStructuralLabels(graphOf(self.schema));

    expect(labels[2]).toBe(labels[0]);
  });

  it('settles a wide model in two rounds', () => {
    const fields: [string, TestSchema][] = Array.from({ length: 200 }, (_, i) => [
      `f${i}`,
      scalar('string', { constraints: [{ name: 'max', value: i + 1 }] }),
    ]);

    const result = computeStructuralLabels(graphOf(model(fields)));

    expect(result.rounds).toBe(2);
    expect(result.classCount).toBe(201);
  });
});

describe('canonicalize', () => {
  it('encodes a scalar with the fixed layout', () => {
    const form = canonicalize(graphOf(scalar('string')));
    // header 30 + root/count 8 + one class 45
    expect(form.bytes.length).toBe(83);
    expect(form.nodeCount).toBe(1);
    expect(form.classCount).toBe(1);
    expect(new TextDecoder().decode(form.bytes.subarray(4, 19))).toBe('schema-identity');
  });

  it('deduplicates equal subtrees', () => {
    const form = canonicalize(graphOf(model([['a', scalar('string')], ['b', scalar('string')]])));
    expect(form.nodeCount).toBe(3);
    expect(form.classCount).toBe(2);
  });

  it('is deterministic', () => {
    const make = () => model([['id', scalar('number')], ['tags', node('container', 'array', [{ schema: scalar('string') }])]]);
    expect(bytesOf(make())).toEqual(bytesOf(make()));
  });

  describe('field order', () => {
    const ab = () => model([['a', scalar('string')], ['b', scalar('number')]]);
    const ba = () => model([['b', scalar('number')], ['a', scalar('string')]]);

    it('is ignored by default', () => {
      expect(bytesOf(ab())).toEqual(bytesOf(ba()));
    });

    it('counts when tracked', () => {
      expect(bytesOf(ab(), { trackFieldOrder: true })).not.toEqual(bytesOf(ba(), { trackFieldOrder: true }));
    });

    it('never ignores field names', () => {
      expect(bytesOf(model([['a', scalar('string')]]))).not.toEqual(bytesOf(model([['b', scalar('string')]])));
    });
  });

  describe('type order', () => {
    const sn = () => union([scalar('string'), scalar('number')]);
    const ns = () => union([scalar('number'), scalar('string')]);

    it('ignores union member order by default', () => {
      expect(bytesOf(sn())).toEqual(bytesOf(ns()));
    });

    it('counts union member order when tracked', () => {
      expect(bytesOf(sn(), { trackTypeOrder: true })).not.toEqual(bytesOf(ns(), { trackTypeOrder: true }));
    });

    it('ignores enum member order by default', () => {
      expect(bytesOf(enumOf(['a', 'b']))).toEqual(bytesOf(enumOf(['b', 'a'])));
      expect(bytesOf(enumOf(['a', 'b']), { trackTypeOrder: true })).not.toEqual(bytesOf(enumOf(['b', 'a']), { trackTypeOrder: true }));
    });

    it('always keeps tuple order', () => {
      expect(bytesOf(tuple([scalar('string'), scalar('number')]))).not.toEqual(bytesOf(tuple([scalar('number'), scalar('string')])));
    });
  });

  it('ignores constraint declaration order', () => {
    const a = scalar('string', { constraints: [{ name: 'min', value: 1 }, { name: 'max', value: 5 }] });
    const b = scalar('string', { constraints: [{ name: 'max', value: 5 }, { name: 'min', value: 1 }] });
    expect(bytesOf(a)).toEqual(bytesOf(b));
  });

  it('distinguishes constraint values', () => {
    const a = scalar('string', { constraints: [{ name: 'min', value: 1 }] });
    const b = scalar('string', { constraints: [{ name: 'min', value: 2 }] });
    expect(bytesOf(a)).not.toEqual(bytesOf(b));
  });

  it('distinguishes default presence but not default values', () => {
    expect(bytesOf(alias(scalar('number'), { default: { value: 1 } }))).not.toEqual(bytesOf(scalar('number')));
    expect(bytesOf(alias(scalar('number'), { default: { value: 1 } }))).toEqual(bytesOf(alias(scalar('number'), { default: { value: 2 } })));
  });

  it('distinguishes behaviors by name', () => {
    const a = scalar('string', { behaviors: [{ role: 'transform', fn: () => 1, qualifiedName: 'm.a' }] });
    const b = scalar('string', { behaviors: [{ role: 'transform', fn: () => 1, qualifiedName: 'm.b' }] });
    const a2 = scalar('string', { behaviors: [{ role: 'transform', fn: () => 2, qualifiedName: 'm.a' }] });
    expect(bytesOf(a)).not.toEqual(bytesOf(b));
    expect(bytesOf(a)).toEqual(bytesOf(a2));
  });

  it('identifies source-hashed behaviors by their source, not their binding name', () => {
    const withRef = (qualifiedName: string, payload: string): SchemaGraph => ({
      root: 0,
      nodes: [bare(0, { behaviorRefs: [{ role: 'transform', strategy: 'by-source-hash', qualifiedName, payload }] })],
    });

    expect(canonicalize(withRef('isPositive', 'a1')).bytes).toEqual(canonicalize(withRef('<anonymous>', 'a1')).bytes);
    expect(canonicalize(withRef('isPositive', 'a1')).bytes).not.toEqual(canonicalize(withRef('isPositive', 'b2')).bytes);
  });

  describe('recursion', () => {
    function linkedList(): { folded: TestSchema; unrolled: TestSchema } {
      const self = forward();
      const next = (target: TestSchema) => node('container', 'optional', [{ schema: target }]);
      self.resolve(model([['value', scalar('string')], ['next', next(self.schema)]]));
      const unrolled = model([['value', scalar('string')], ['next', next(self.schema)]]);
      return { folded: self.schema, unrolled };
    }

    it('encodes a folded and an unrolled definition identically', () => {
      const { folded, unrolled } = linkedList();
      const a = canonicalize(graphOf(folded));
      const b = canonicalize(graphOf(unrolled));

      expect(a.nodeCount).toBe(4);
      expect(b.nodeCount).toBe(7);
      expect(a.classCount).toBe(3);
      expect(b.classCount).toBe(3);
      expect(a.rounds).toBe(1);
      expect(b.rounds).toBe(1);
      expect(a.bytes).toEqual(b.bytes);
    });

    it('keeps attributes a reference adds', () => {
      const plain = forward();
      plain.resolve(model([['next', plain.schema]]));
      const defaulted = forward();
      defaulted.resolve(model([['next', alias(defaulted.schema, { default: { value: null } })]]));

      expect(bytesOf(plain.schema)).not.toEqual(bytesOf(defaulted.schema));
    });
  });

  describe('header', () => {
    const schema = () => scalar('string');

    it('changes with the algorithm version', () => {
      expect(bytesOf(schema(), { algorithmVersion: 'v1' })).not.toEqual(bytesOf(schema(), { algorithmVersion: 'v2' }));
    });

    it('changes with every tracking flag', () => {
      const base = bytesOf(schema());
      const flags: Partial<CanonicalizeOptions>[] = [
        { trackDescriptions: true },
        { trackFieldOrder: true },
        { trackTypeOrder: true },
        { trackDefaultValues: true },
      ];
      for (const flag of flags) {
        expect(bytesOf(schema(), flag)).not.toEqual(base);
      }
    });

    it('changes with tracked extra data', () => {
      const base = bytesOf(schema());
      expect(bytesOf(schema(), { extraData: { build: 1 } })).not.toEqual(base);
      expect(bytesOf(schema(), { extraData: { b: 1, a: 2 } })).toEqual(bytesOf(schema(), { extraData: { a: 2, b: 1 } }));
    });
  });

  describe('hand-built graphs', () => {
    it('ignores unreachable nodes', () => {
      const small: SchemaGraph = { root: 0, nodes: [bare(0)] };
      const withOrphan: SchemaGraph = { root: 0, nodes: [bare(0), bare(1, { type: 'number' })] };
      expect(canonicalize(withOrphan).bytes).toEqual(canonicalize(small).bytes);
      expect(canonicalize(withOrphan).nodeCount).toBe(1);
    });

    it('rejects references without a target', () => {
      const graph: SchemaGraph = {
        root: 0,
        nodes: [bare(0, { kind: 'container', type: 'array', children: [1] }), bare(1, { kind: 'recursive-reference' })],
      };
      expect(() => canonicalize(graph)).toThrow(SchemaIdentityError);
    });

    it('rejects out-of-range children', () => {
      const graph: SchemaGraph = { root: 0, nodes: [bare(0, { kind: 'container', type: 'array', children: [4] })] };
      expect(() => canonicalize(graph)).toThrow('Schema graph has no node 4.');
    });
  });
});
