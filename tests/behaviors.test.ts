/**
 * Behavior Resolver Tests — by-name → by-source-hash → by-signature
 */

import { afterEach, describe, it, expect, vi } from 'vitest';
import {
  clearBehaviorRegistry,
  getRegisteredBehaviorName,
  readFunctionSource,
  registerBehavior,
  registerBehaviors,
  resolveBehavior,
  resolveGraphBehaviors,
} from '../src/behaviors.js';
import { sha256Hex } from '../src/hasher.js';
import type { ExtractedNode, SchemaGraph } from '../src/types.js';

function trimIt(value: string): string {
  return value.trim();
}

afterEach(() => {
  clearBehaviorRegistry();
});

describe('name registry', () => {
  it('registers single functions', () => {
    registerBehavior(trimIt, 'strings.trimIt');
    expect(getRegisteredBehaviorName(trimIt)).toBe('strings.trimIt');
  });

  it('registers module records as module.key', () => {
    const lower = (value: string): string => value.toLowerCase();
    registerBehaviors('strings', { trimIt, lower });
    expect(getRegisteredBehaviorName(trimIt)).toBe('strings.trimIt');
    expect(getRegisteredBehaviorName(lower)).toBe('strings.lower');
  });

  it('forgets everything on clear', () => {
    registerBehavior(trimIt, 'strings.trimIt');
    clearBehaviorRegistry();
    expect(getRegisteredBehaviorName(trimIt)).toBeUndefined();
  });
});

describe('readFunctionSource', () => {
  it('returns source text for plain functions', () => {
    expect(readFunctionSource(trimIt)).toBe(Function.prototype.toString.call(trimIt));
  });

  it('returns undefined for native and bound functions', () => {
    expect(readFunctionSource(Math.max)).toBeUndefined();
    expect(readFunctionSource(trimIt.bind(null))).toBeUndefined();
  });
});

describe('resolveBehavior', () => {
  it('prefers a registered name', () => {
    registerBehavior(trimIt, 'strings.trimIt');
    const onDegraded = vi.fn();

    const ref = resolveBehavior({ role: 'transform', fn: trimIt }, onDegraded);

    expect(ref).toEqual({ role: 'transform', strategy: 'by-name', qualifiedName: 'strings.trimIt', payload: 'strings.trimIt' });
    expect(onDegraded).not.toHaveBeenCalled();
  });

  it('uses the qualified name a describer supplies', () => {
    const ref = resolveBehavior({ role: 'validator', fn: trimIt, qualifiedName: 'models.User.check' });
    expect(ref.strategy).toBe('by-name');
    expect(ref.payload).toBe('models.User.check');
  });

  it('falls back to the source hash and reports degradation', () => {
    const onDegraded = vi.fn();

    const ref = resolveBehavior({ role: 'transform', fn: trimIt }, onDegraded);

    expect(ref).toEqual({
      role: 'transform',
      strategy: 'by-source-hash',
      qualifiedName: 'trimIt',
      payload: sha256Hex(Function.prototype.toString.call(trimIt)),
    });
    expect(onDegraded).toHaveBeenCalledWith(ref);
  });

  it('gives equal source the same payload', () => {
    const a = resolveBehavior({ role: 'refinement', fn: (value: number) => value > 0 });
    const b = resolveBehavior({ role: 'refinement', fn: (value: number) => value > 0 });
    expect(a.payload).toBe(b.payload);
  });

  it('falls back to the signature without source', () => {
    const onDegraded = vi.fn();

    const ref = resolveBehavior({ role: 'refinement', fn: Math.max }, onDegraded);

    expect(ref).toEqual({ role: 'refinement', strategy: 'by-signature', qualifiedName: 'max', payload: 'max/2' });
    expect(onDegraded).toHaveBeenCalledTimes(1);
  });

  it('uses the signature for bound functions', () => {
    const ref = resolveBehavior({ role: 'transform', fn: trimIt.bind(null) });
    expect(ref.payload).toBe('bound trimIt/1');
  });

  it('ignores the source of opaque library wrappers', () => {
    const ref = resolveBehavior({ role: 'refinement', fn: trimIt, opaque: true });
    expect(ref.strategy).toBe('by-signature');
    expect(ref.payload).toBe('trimIt/1');
  });

  it('still prefers a name for opaque wrappers', () => {
    registerBehavior(trimIt, 'strings.trimIt');
    expect(resolveBehavior({ role: 'refinement', fn: trimIt, opaque: true }).strategy).toBe('by-name');
  });
});

describe('resolveGraphBehaviors', () => {
  it('replaces handles with refs node by node', () => {
    const graph: SchemaGraph<ExtractedNode> = {
      root: 0,
      nodes: [{
        id: 0, kind: 'scalar', type: 'string', constraints: [], children: [],
        childOrder: 'ordered', defaultPresent: false,
        behaviors: [{ role: 'transform', fn: trimIt, qualifiedName: 'strings.trimIt' }],
      }],
    };

    const resolved = resolveGraphBehaviors(graph);

    expect(resolved.root).toBe(0);
    expect(resolved.nodes[0]?.behaviorRefs).toEqual([
      { role: 'transform', strategy: 'by-name', qualifiedName: 'strings.trimIt', payload: 'strings.trimIt' },
    ]);
    expect(resolved.nodes[0]).not.toHaveProperty('behaviors');
  });
});
