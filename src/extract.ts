/**
 * Schema Identity Extractor — describer → schema graph
 *
 * Walks a schema through its describer and builds the node graph the
 * canonicalizer consumes. Recursion is cut structurally: every schema on
 * the path to a node being expanded sits in an in-progress map, and meeting
 * one again yields a recursive-reference node pointing at the ancestor
 * instead of a second expansion.
 */

import type { SchemaDescriber } from './adapters/adapter.js';
import { toCanonicalValue } from './encoding.js';
import {
  CycleDepthExceededError,
  SchemaIdentityError,
  UnsupportedSchemaNodeError,
  mapNativeError,
} from './errors.js';
import type {
  BehaviorHandle,
  ChildOrder,
  Constraint,
  ExtractedNode,
  SchemaDescription,
  SchemaGraph,
  StructuralKind,
} from './types.js';

export const DEFAULT_MAX_NODES = 10_000;

export interface ExtractOptions {
  trackDescriptions: boolean;
  trackDefaultValues: boolean;
  maxNodes: number;
}

const DEFAULT_EXTRACT_OPTIONS: ExtractOptions = {
  trackDescriptions: false,
  trackDefaultValues: false,
  maxNodes: DEFAULT_MAX_NODES,
};

function defaultChildOrder(kind: StructuralKind): ChildOrder {
  switch (kind) {
    case 'union':
      return 'unordered';
    case 'model-reference':
      return 'by-field-name';
    default:
      return 'ordered';
  }
}

function locate(err: unknown, path: string): SchemaIdentityError {
  const mapped = mapNativeError(err);
  return mapped.path ? mapped : mapped.atPath(path);
}

export function extractSchemaGraph<S>(
  root: S,
  describer: SchemaDescriber<S>,
  options: Partial<ExtractOptions> = {},
): SchemaGraph<ExtractedNode> {
  const opts: ExtractOptions = { ...DEFAULT_EXTRACT_OPTIONS, ...options };
  const nodes: ExtractedNode[] = [];
  const inProgress = new Map<S, number>();

  function allocate(path: string): number {
    if (nodes.length >= opts.maxNodes) {
      throw new CycleDepthExceededError(opts.maxNodes, path);
    }
    return nodes.length;
  }

  function describeAt(schema: S, path: string): SchemaDescription<S> {
    try {
      return describer.describe(schema);
    } catch (err) {
      throw locate(err, path);
    }
  }

  function behaviorsAt(schema: S, path: string): BehaviorHandle[] {
    try {
      return describer.listBehaviors(schema);
    } catch (err) {
      throw locate(err, path);
    }
  }

  function visit(schema: S, path: string, fieldName?: string): number {
    const behaviors: BehaviorHandle[] = [];
    const constraints: Constraint[] = [];
    let defaultPresent = false;
    const chain = new Set<S>();
    let current = schema;

    for (;;) {
      const ancestor = inProgress.get(current);
      if (ancestor !== undefined) {
        const id = allocate(path);
        nodes.push({
          id,
          kind: 'recursive-reference',
          type: nodes[ancestor]?.type ?? '',
          constraints,
          children: [],
          childOrder: 'ordered',
          fieldName,
          defaultPresent,
          behaviors,
          target: ancestor,
        });
        return id;
      }

      if (chain.has(current)) {
        throw new UnsupportedSchemaNodeError({
          construct: 'alias-cycle',
          message: 'Schema resolves to itself without reaching a structural type.',
          fix: 'Make the lazy/reference chain end in an object, array, union or scalar.',
          path,
        });
      }
      chain.add(current);

      behaviors.push(...behaviorsAt(current, path));
      const description = describeAt(current, path);

      if (description.description !== undefined && opts.trackDescriptions) {
        constraints.push({ name: 'description', value: description.description, annotation: true });
      }
      for (const constraint of description.constraints ?? []) {
        if (!constraint.annotation || opts.trackDescriptions) constraints.push(constraint);
      }
      if (description.default) {
        defaultPresent = true;
        if (opts.trackDefaultValues) {
          if ('value' in description.default) {
            constraints.push({ name: 'default', value: toCanonicalValue(description.default.value, 'default value') });
          } else {
            behaviors.push(description.default.factory);
          }
        }
      }

      if (description.kind === 'alias') {
        current = description.target;
        continue;
      }

      const id = allocate(path);
      const node: ExtractedNode = {
        id,
        kind: description.kind,
        type: description.type,
        constraints,
        children: [],
        childOrder: description.childOrder ?? defaultChildOrder(description.kind),
        fieldName,
        defaultPresent,
        behaviors,
      };
      nodes.push(node);

      // Aliases on the way here count too: a lazy getter may build a fresh
      // structural schema on every call, but the lazy wrapper itself is stable.
      for (const member of chain) inProgress.set(member, id);
      (description.children ?? []).forEach((entry, index) => {
        const childPath = entry.fieldName !== undefined ? `${path}.${entry.fieldName}` : `${path}[${index}]`;
        node.children.push(visit(entry.schema, childPath, entry.fieldName));
      });
      for (const member of chain) inProgress.delete(member);

      return id;
    }
  }

  const rootId = visit(root, '$');
  return { root: rootId, nodes };
}
