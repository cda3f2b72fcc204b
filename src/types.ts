/**
 * Schema Identity — All shared types and interfaces
 *
 * Imports nothing. Describers, the pipeline and the engine all meet here.
 */

// ─── JSON Values ─────────────────────────────────────────────────────────────

export type JsonValue =
  | null
  | boolean
  | number
  | string
  | JsonValue[]
  | { [key: string]: JsonValue };

// ─── Schema Graph ────────────────────────────────────────────────────────────

export type NodeKind =
  | 'scalar'
  | 'container'
  | 'union'
  | 'literal'
  | 'model-reference'
  | 'recursive-reference';

export type StructuralKind = Exclude<NodeKind, 'recursive-reference'>;

/**
 * How a node's children relate to each other.
 * - `ordered`: position is meaningful (tuple items, pipeline in/out, record key/value)
 * - `unordered`: members of a set (union options, intersection sides)
 * - `by-field-name`: model fields, keyed by their name
 */
export type ChildOrder = 'ordered' | 'unordered' | 'by-field-name';

export interface Constraint {
  name: string;
  value: JsonValue;
  /** Array value whose element order is incidental (enum members, required lists). */
  unordered?: boolean;
  /** Documentation only (check messages). Kept when descriptions are tracked. */
  annotation?: boolean;
}

export interface SchemaNode {
  id: number;
  kind: NodeKind;
  type: string;
  constraints: Constraint[];
  children: number[];
  childOrder: ChildOrder;
  fieldName?: string;
  defaultPresent: boolean;
  behaviorRefs: BehaviorRef[];
  /** Ancestor node id. Only set on `recursive-reference` nodes. */
  target?: number;
}

/** A node as produced by extraction, before behaviors are resolved. */
export interface ExtractedNode extends Omit<SchemaNode, 'behaviorRefs'> {
  behaviors: BehaviorHandle[];
}

export interface SchemaGraph<N = SchemaNode> {
  root: number;
  nodes: N[];
}

// ─── Behaviors (validators / serializers) ───────────────────────────────────

export type BehaviorRole =
  | 'refinement'
  | 'transform'
  | 'preprocess'
  | 'catch'
  | 'default-factory'
  | 'validator'
  | 'serializer';

export type BehaviorFunction = (...args: never[]) => unknown;

export interface BehaviorHandle {
  role: BehaviorRole;
  fn: BehaviorFunction;
  /** Stable declared name supplied by the describer, if it knows one. */
  qualifiedName?: string;
  /** The function is a library wrapper; its source says nothing about the user's code. */
  opaque?: boolean;
}

export type FingerprintStrategy = 'by-name' | 'by-source-hash' | 'by-signature';

interface BehaviorRefBase {
  role: BehaviorRole;
  qualifiedName: string;
}

export interface ByNameRef extends BehaviorRefBase {
  strategy: 'by-name';
  /** The qualified name itself. */
  payload: string;
}

export interface BySourceHashRef extends BehaviorRefBase {
  strategy: 'by-source-hash';
  /** Hex sha256 of the function source text. */
  payload: string;
}

export interface BySignatureRef extends BehaviorRefBase {
  strategy: 'by-signature';
  /** `name/arity` */
  payload: string;
}

export type BehaviorRef = ByNameRef | BySourceHashRef | BySignatureRef;

// ─── Describer Output ────────────────────────────────────────────────────────

export type DefaultSpec =
  | { value: unknown }
  | { factory: BehaviorHandle };

interface DescriptionBase {
  description?: string;
  default?: DefaultSpec;
  constraints?: Constraint[];
}

export interface AliasDescription<S> extends DescriptionBase {
  kind: 'alias';
  target: S;
}

export interface ChildDescription<S> {
  schema: S;
  fieldName?: string;
}

export interface StructuralDescription<S> extends DescriptionBase {
  kind: StructuralKind;
  type: string;
  children?: ChildDescription<S>[];
  childOrder?: ChildOrder;
}

export type SchemaDescription<S> = AliasDescription<S> | StructuralDescription<S>;

// ─── Canonical Form & Identifier ────────────────────────────────────────────

export type KnownAlgorithmVersion = 'v1' | 'v2';

export interface CanonicalForm {
  bytes: Uint8Array;
  nodeCount: number;
  classCount: number;
  rounds: number;
}

export interface Identifier {
  readonly algorithmVersion: string;
  readonly digest: string;
}

export type IdentifierComparison = 'equal' | 'unequal' | 'unknown';

export interface Fingerprint {
  identifier: Identifier;
  nodeCount: number;
  classCount: number;
  rounds: number;
  degradedBehaviors: BehaviorRef[];
}

// ─── Configuration ───────────────────────────────────────────────────────────

export interface StampFieldConfig {
  field?: string;
}

export interface IdentityConfig {
  algorithm?: KnownAlgorithmVersion;
  /** Hex characters kept from the digest. Omit for the full digest. */
  digestLength?: number;
  trackDescriptions?: boolean;
  trackFieldOrder?: boolean;
  trackTypeOrder?: boolean;
  trackDefaultValues?: boolean;
  /** Any JSON-serializable data known at startup that should move the identifier. */
  trackedExtraData?: unknown;
  maxNodes?: number;
  logging?: boolean | 'verbose';
  slowFingerprintMs?: number;
  stamp?: boolean | StampFieldConfig;
}

// ─── Identity Report ─────────────────────────────────────────────────────────

export interface IdentitySettings {
  algorithm: KnownAlgorithmVersion;
  digestLength: number;
  trackDescriptions: boolean;
  trackFieldOrder: boolean;
  trackTypeOrder: boolean;
  trackDefaultValues: boolean;
  maxNodes: number;
}

export interface SchemaIdentityReport {
  label: string;
  identifier: string;
  algorithmVersion: string;
  computedAt: Date;
  nodeCount: number;
  classCount: number;
  degradedBehaviors: BehaviorRef[];
  settings: IdentitySettings;
}

// ─── Error Codes ─────────────────────────────────────────────────────────────

export type IdentityErrorCode =
  | 'UNSUPPORTED_SCHEMA_NODE'
  | 'CYCLE_DEPTH_EXCEEDED'
  | 'SERIALIZATION_FAILED'
  | 'INVALID_IDENTIFIER'
  | 'INVALID_CONFIG'
  | 'INTERNAL_ERROR';

// ─── Event Types ─────────────────────────────────────────────────────────────

export interface IdentityEvents {
  computed: { identifier: string; nodeCount: number; classCount: number; rounds: number; durationMs: number };
  'slow-fingerprint': { identifier: string; durationMs: number; threshold: number };
  'cache-hit': { identifier: string };
  'cache-invalidated': { identifier: string };
  'behavior-degraded': { role: BehaviorRole; qualifiedName: string; strategy: FingerprintStrategy };
  failed: { code: IdentityErrorCode; message: string; fix: string };
}
