/**
 * Schema Identity Canonicalizer — schema graph → canonical bytes
 *
 * 1. Structural labels are refined round by round. A node's round-r label
 *    hashes its previous label, its local attributes, and the (fieldName,
 *    label) pairs of its children. Field names are edge attributes, so a node
 *    never hashes its own name.
 * 2. A recursive-reference mirrors its target's label, so a folded recursive
 *    schema and any unrolling of it settle into the same classes.
 * 3. Once the number of distinct labels stops changing the partition is
 *    stable. The stable classes are collapsed into a quotient graph and
 *    refined once more; the quotient is the same for every spelling of a
 *    structure, so its labels are too.
 * 4. Classes are sorted by label and written as a fixed binary layout.
 */

import { CanonicalWriter, canonicalJson, compareCodePoints, toCanonicalValue } from './encoding.js';
import { SchemaIdentityError } from './errors.js';
import { CURRENT_ALGORITHM_VERSION, sha256Hex } from './hasher.js';
import type {
  BehaviorRef,
  CanonicalForm,
  ChildOrder,
  Constraint,
  JsonValue,
  KnownAlgorithmVersion,
  NodeKind,
  SchemaGraph,
  SchemaNode,
} from './types.js';

export const CANONICAL_MAGIC = 'schema-identity';

export interface CanonicalizeOptions {
  algorithmVersion: KnownAlgorithmVersion;
  trackDescriptions: boolean;
  trackFieldOrder: boolean;
  trackTypeOrder: boolean;
  trackDefaultValues: boolean;
  extraData?: unknown;
}

const DEFAULT_CANONICALIZE_OPTIONS: CanonicalizeOptions = {
  algorithmVersion: CURRENT_ALGORITHM_VERSION,
  trackDescriptions: false,
  trackFieldOrder: false,
  trackTypeOrder: false,
  trackDefaultValues: false,
};

export type OrderingOptions = Pick<CanonicalizeOptions, 'trackFieldOrder' | 'trackTypeOrder'>;

export interface StructuralLabels {
  /** Final label per node id. Unreachable nodes have none. */
  labels: (string | undefined)[];
  /** Reachable node ids in ascending order. */
  reachable: number[];
  rounds: number;
  classCount: number;
}

// ─── Graph Checks ────────────────────────────────────────────────────────────

function internalError(message: string): SchemaIdentityError {
  return new SchemaIdentityError({
    code: 'INTERNAL_ERROR',
    message,
    fix: 'Schema graphs come from extractSchemaGraph(). Hand-built graphs must use in-range ids and point references at structural nodes.',
  });
}

function nodeAt(graph: SchemaGraph, id: number): SchemaNode {
  const node = graph.nodes[id];
  if (!node || node.id !== id) throw internalError(`Schema graph has no node ${id}.`);
  return node;
}

function refTarget(graph: SchemaGraph, node: SchemaNode): number {
  if (node.target === undefined) {
    throw internalError(`Recursive reference ${node.id} has no target.`);
  }
  if (nodeAt(graph, node.target).kind === 'recursive-reference') {
    throw internalError(`Recursive reference ${node.id} points at another reference.`);
  }
  return node.target;
}

function reachableFrom(graph: SchemaGraph): number[] {
  const seen = new Set<number>();
  const stack = [graph.root];
  while (stack.length > 0) {
    const id = stack.pop();
    if (id === undefined || seen.has(id)) continue;
    const node = nodeAt(graph, id);
    seen.add(id);
    if (node.kind === 'recursive-reference') {
      stack.push(refTarget(graph, node));
    } else {
      stack.push(...node.children);
    }
  }
  return [...seen].sort((a, b) => a - b);
}

// ─── Local Attributes ────────────────────────────────────────────────────────

function canonicalConstraints(constraints: Constraint[], options: OrderingOptions): [string, JsonValue][] {
  return constraints
    .map((constraint): [string, JsonValue] => {
      const { value } = constraint;
      if (constraint.unordered && Array.isArray(value) && !options.trackTypeOrder) {
        const sorted = [...value].sort((a, b) => compareCodePoints(canonicalJson(a), canonicalJson(b)));
        return [constraint.name, sorted];
      }
      return [constraint.name, value];
    })
    .sort((a, b) => compareCodePoints(a[0], b[0]) || compareCodePoints(canonicalJson(a[1]), canonicalJson(b[1])));
}

/**
 * The parts of a behavior ref that identify it. A source hash already names
 * the code, so the binding it was reached through (`fn.name`) is left out.
 */
function behaviorTuple(ref: BehaviorRef): [string, string, string, string] {
  const name = ref.strategy === 'by-source-hash' ? '' : ref.qualifiedName;
  return [ref.strategy, ref.role, name, ref.payload];
}

function localAttributes(node: SchemaNode, options: OrderingOptions): JsonValue {
  return [
    node.kind,
    node.type,
    node.childOrder,
    node.defaultPresent,
    canonicalConstraints(node.constraints, options),
    node.behaviorRefs.map(behaviorTuple),
  ];
}

/** Attributes a reference adds on top of its target, or null when it adds none. */
function referenceAttributes(node: SchemaNode, options: OrderingOptions): JsonValue {
  if (node.constraints.length === 0 && node.behaviorRefs.length === 0 && !node.defaultPresent) return null;
  return [node.defaultPresent, canonicalConstraints(node.constraints, options), node.behaviorRefs.map(behaviorTuple)];
}

// ─── Child Ordering ──────────────────────────────────────────────────────────

export interface LabeledChild {
  id: number;
  fieldName: string | undefined;
  label: string;
}

function orderLabeled(children: LabeledChild[], childOrder: ChildOrder, options: OrderingOptions): LabeledChild[] {
  switch (childOrder) {
    case 'unordered':
      if (options.trackTypeOrder) return children;
      return children.sort((a, b) =>
        compareCodePoints(a.label, b.label) || compareCodePoints(a.fieldName ?? '', b.fieldName ?? ''));
    case 'by-field-name':
      if (options.trackFieldOrder) return children;
      return children.sort((a, b) =>
        compareCodePoints(a.fieldName ?? '', b.fieldName ?? '') || compareCodePoints(a.label, b.label));
    case 'ordered':
      return children;
  }
}

export function orderChildren(
  graph: SchemaGraph,
  node: SchemaNode,
  labels: (string | undefined)[],
  options: OrderingOptions,
): LabeledChild[] {
  const children = node.children.map(id => ({
    id,
    fieldName: nodeAt(graph, id).fieldName,
    label: labels[id] ?? '',
  }));
  return orderLabeled(children, node.childOrder, options);
}

// ─── Label Refinement ────────────────────────────────────────────────────────
// Refinement runs over a plain labelling graph: field names live on edges so
// that a quotient graph, where one node stands for many, can carry them.

interface LabelEdge {
  fieldName: string | undefined;
  to: number;
}

interface LabelNode {
  kind: NodeKind;
  /** Local attributes; null for a reference that adds nothing to its target. */
  local: JsonValue;
  childOrder: ChildOrder;
  edges: LabelEdge[];
  target?: number;
}

interface Refinement {
  labels: (string | undefined)[];
  rounds: number;
  classCount: number;
}

function hashLabel(value: JsonValue): string {
  return sha256Hex(canonicalJson(value));
}

function distinctCount(labels: (string | undefined)[], ids: number[]): number {
  return new Set(ids.map(id => labels[id])).size;
}

function labelNodeAt(nodes: LabelNode[], id: number): LabelNode {
  const node = nodes[id];
  if (!node) throw internalError(`Labelling graph has no node ${id}.`);
  return node;
}

/**
 * Refine until the number of distinct labels stops changing. Labels only
 * ever split, so an unchanged count means an unchanged partition.
 */
function refine(nodes: LabelNode[], ids: number[], options: OrderingOptions): Refinement {
  const structural = ids.filter(id => labelNodeAt(nodes, id).kind !== 'recursive-reference');
  const references = ids.filter(id => labelNodeAt(nodes, id).kind === 'recursive-reference');

  const mirror = (labels: (string | undefined)[]): void => {
    for (const id of references) {
      const node = labelNodeAt(nodes, id);
      const targetLabel = node.target === undefined ? '' : labels[node.target] ?? '';
      labels[id] = node.local === null ? targetLabel : hashLabel(['ref', node.local, targetLabel]);
    }
  };

  const step = (previous: (string | undefined)[]): (string | undefined)[] => {
    const next = new Array<string | undefined>(nodes.length);
    for (const id of structural) {
      const node = labelNodeAt(nodes, id);
      const children = orderLabeled(
        node.edges.map(edge => ({ id: edge.to, fieldName: edge.fieldName, label: previous[edge.to] ?? '' })),
        node.childOrder,
        options,
      ).map(child => [child.fieldName ?? null, child.label]);
      next[id] = hashLabel([previous[id] ?? '', node.local, children]);
    }
    mirror(next);
    return next;
  };

  let labels = new Array<string | undefined>(nodes.length);
  for (const id of structural) labels[id] = hashLabel([labelNodeAt(nodes, id).kind]);
  mirror(labels);

  let rounds = 0;
  let count = distinctCount(labels, ids);
  for (;;) {
    labels = step(labels);
    rounds++;
    const next = distinctCount(labels, ids);
    if (next === count) break;
    count = next;
  }

  return { labels, rounds, classCount: count };
}

function labellingGraph(graph: SchemaGraph, reachable: number[], options: OrderingOptions): LabelNode[] {
  const nodes = new Array<LabelNode>(graph.nodes.length);
  for (const id of reachable) {
    const node = nodeAt(graph, id);
    const isReference = node.kind === 'recursive-reference';
    nodes[id] = {
      kind: node.kind,
      local: isReference ? referenceAttributes(node, options) : localAttributes(node, options),
      childOrder: node.childOrder,
      edges: isReference ? [] : node.children.map(to => ({ fieldName: nodeAt(graph, to).fieldName, to })),
      target: isReference ? refTarget(graph, node) : undefined,
    };
  }
  return nodes;
}

/**
 * Collapse every class of a stable partition into one node. Members of a
 * class agree on local attributes and on their (fieldName, child class)
 * edges, so any structural member can stand for the class.
 */
function quotientGraph(
  nodes: LabelNode[],
  ids: number[],
  labels: (string | undefined)[],
): { nodes: LabelNode[]; classOf: (id: number) => number } {
  const index = new Map<string, number>();
  const representatives: LabelNode[] = [];
  for (const id of ids) {
    const label = labels[id] ?? '';
    const node = labelNodeAt(nodes, id);
    const existing = index.get(label);
    if (existing === undefined) {
      index.set(label, representatives.length);
      representatives.push(node);
    } else if (representatives[existing]?.kind === 'recursive-reference' && node.kind !== 'recursive-reference') {
      representatives[existing] = node;
    }
  }

  const classOf = (id: number): number => {
    const found = index.get(labels[id] ?? '');
    if (found === undefined) throw internalError(`Node ${id} has no class.`);
    return found;
  };

  return {
    nodes: representatives.map(node => ({
      ...node,
      edges: node.edges.map(edge => ({ fieldName: edge.fieldName, to: classOf(edge.to) })),
      target: node.target === undefined ? undefined : classOf(node.target),
    })),
    classOf,
  };
}

export function computeStructuralLabels(
  graph: SchemaGraph,
  options: OrderingOptions = DEFAULT_CANONICALIZE_OPTIONS,
): StructuralLabels {
  const reachable = reachableFrom(graph);
  const nodes = labellingGraph(graph, reachable, options);
  const settled = refine(nodes, reachable, options);

  // Labels of the settled partition still depend on how many rounds this
  // spelling needed. Refining the quotient again gives labels that depend on
  // the structure alone: a folded schema and its unrolling share a quotient.
  const quotient = quotientGraph(nodes, reachable, settled.labels);
  const classIds = quotient.nodes.map((_, id) => id);
  const final = refine(quotient.nodes, classIds, options);

  const labels = new Array<string | undefined>(graph.nodes.length);
  for (const id of reachable) labels[id] = final.labels[quotient.classOf(id)];

  return { labels, reachable, rounds: final.rounds, classCount: distinctCount(labels, reachable) };
}

// ─── Encoding ────────────────────────────────────────────────────────────────

function writeHeader(writer: CanonicalWriter, options: CanonicalizeOptions): void {
  writer
    .string(CANONICAL_MAGIC)
    .string(options.algorithmVersion)
    .bool(options.trackDescriptions)
    .bool(options.trackFieldOrder)
    .bool(options.trackTypeOrder)
    .bool(options.trackDefaultValues);

  if (options.extraData === undefined) {
    writer.bool(false);
  } else {
    writer.bool(true).json(toCanonicalValue(options.extraData, 'tracked extra data'));
  }
}

function writeLocal(writer: CanonicalWriter, node: SchemaNode, options: OrderingOptions): void {
  writer.string(node.kind).string(node.type).string(node.childOrder).bool(node.defaultPresent);

  const constraints = canonicalConstraints(node.constraints, options);
  writer.uint32(constraints.length);
  for (const [name, value] of constraints) writer.string(name).json(value);

  writer.uint32(node.behaviorRefs.length);
  for (const ref of node.behaviorRefs) {
    const [strategy, role, name, payload] = behaviorTuple(ref);
    writer.string(strategy).string(role).string(name).string(payload);
  }
}

/**
 * Produce the canonical byte form of a schema graph. Two graphs get equal
 * bytes exactly when they describe the same structure under `options`.
 */
export function canonicalize(graph: SchemaGraph, options: Partial<CanonicalizeOptions> = {}): CanonicalForm {
  const opts: CanonicalizeOptions = { ...DEFAULT_CANONICALIZE_OPTIONS, ...options };
  const { labels, reachable, rounds, classCount } = computeStructuralLabels(graph, opts);

  // Representative per class: the first structural member, else the first member.
  const representatives = new Map<string, SchemaNode>();
  for (const id of reachable) {
    const node = nodeAt(graph, id);
    const label = labels[id] ?? '';
    const current = representatives.get(label);
    if (!current || (current.kind === 'recursive-reference' && node.kind !== 'recursive-reference')) {
      representatives.set(label, node);
    }
  }

  const classLabels = [...representatives.keys()].sort(compareCodePoints);
  const classIndex = new Map(classLabels.map((label, index) => [label, index]));
  const indexOf = (id: number): number => {
    const index = classIndex.get(labels[id] ?? '');
    if (index === undefined) throw internalError(`Node ${id} has no class.`);
    return index;
  };

  const writer = new CanonicalWriter();
  writeHeader(writer, opts);
  writer.uint32(indexOf(graph.root)).uint32(classLabels.length);

  for (const label of classLabels) {
    const node = representatives.get(label);
    if (!node) throw internalError(`Class ${label} has no representative.`);

    writeLocal(writer, node, opts);
    if (node.kind === 'recursive-reference') {
      writer.bool(true).uint32(indexOf(refTarget(graph, node)));
      continue;
    }

    writer.bool(false);
    const children = orderChildren(graph, node, labels, opts);
    writer.uint32(children.length);
    for (const child of children) {
      writer.optionalString(child.fieldName).uint32(indexOf(child.id));
    }
  }

  return { bytes: writer.finish(), nodeCount: reachable.length, classCount, rounds };
}
