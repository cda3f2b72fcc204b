/**
 * Schema Identity Behavior Resolver — validator/serializer functions → symbolic refs
 *
 * Functions are executable, not structural. Each attached behavior is reduced
 * to a BehaviorRef by the first strategy that works:
 *
 *   by-name         registered qualified name (stable while the name is)
 *   by-source-hash  sha256 of the function's source text
 *   by-signature    name and arity only, the weakest guarantee
 *
 * The chosen strategy is part of the ref, so identifiers computed with and
 * without source access never compare equal by accident.
 */

import { sha256Hex } from './hasher.js';
import type {
  BehaviorFunction,
  BehaviorHandle,
  BehaviorRef,
  ExtractedNode,
  SchemaGraph,
  SchemaNode,
} from './types.js';

// ─── Name Registry ───────────────────────────────────────────────────────────

let behaviorNames = new WeakMap<BehaviorFunction, string>();

/**
 * Give a function a stable qualified name. JavaScript functions do not know
 * the module they were declared in, so by-name fingerprints need this.
 */
export function registerBehavior(fn: BehaviorFunction, qualifiedName: string): void {
  behaviorNames.set(fn, qualifiedName);
}

/**
 * Register every function of a module-like record as `<moduleName>.<key>`.
 */
export function registerBehaviors(moduleName: string, fns: Record<string, BehaviorFunction>): void {
  for (const [key, fn] of Object.entries(fns)) {
    registerBehavior(fn, `${moduleName}.${key}`);
  }
}

export function getRegisteredBehaviorName(fn: BehaviorFunction): string | undefined {
  return behaviorNames.get(fn);
}

export function clearBehaviorRegistry(): void {
  behaviorNames = new WeakMap<BehaviorFunction, string>();
}

// ─── Resolution ──────────────────────────────────────────────────────────────

const NATIVE_CODE = /\{\s*\[native code\]\s*\}\s*$/;

/** Source text, or undefined for native and bound functions. */
export function readFunctionSource(fn: BehaviorFunction): string | undefined {
  const source = Function.prototype.toString.call(fn);
  return NATIVE_CODE.test(source) ? undefined : source;
}

function displayName(fn: BehaviorFunction): string {
  return fn.name || '<anonymous>';
}

/**
 * Never throws. `onDegraded` fires whenever the result is weaker than by-name.
 */
export function resolveBehavior(
  handle: BehaviorHandle,
  onDegraded?: (ref: BehaviorRef) => void,
): BehaviorRef {
  const name = getRegisteredBehaviorName(handle.fn) ?? handle.qualifiedName;
  if (name) {
    return { role: handle.role, strategy: 'by-name', qualifiedName: name, payload: name };
  }

  let ref: BehaviorRef;
  const source = handle.opaque ? undefined : readFunctionSource(handle.fn);
  if (source !== undefined) {
    ref = {
      role: handle.role,
      strategy: 'by-source-hash',
      qualifiedName: displayName(handle.fn),
      payload: sha256Hex(source),
    };
  } else {
    ref = {
      role: handle.role,
      strategy: 'by-signature',
      qualifiedName: displayName(handle.fn),
      payload: `${displayName(handle.fn)}/${handle.fn.length}`,
    };
  }

  onDegraded?.(ref);
  return ref;
}

/**
 * Annotate every extracted node with resolved behavior refs.
 */
export function resolveGraphBehaviors(
  graph: SchemaGraph<ExtractedNode>,
  onDegraded?: (ref: BehaviorRef) => void,
): SchemaGraph<SchemaNode> {
  return {
    root: graph.root,
    nodes: graph.nodes.map(({ behaviors, ...node }) => ({
      ...node,
      behaviorRefs: behaviors.map(handle => resolveBehavior(handle, onDegraded)),
    })),
  };
}
