/**
 * Schema Identity — Public API Entry Point
 *
 * Stable, content-addressed identifiers for validation schemas.
 */

// Main class
export {
  SchemaIdentity,
  getDefaultSchemaIdentity,
  identifierFor,
  sameSchema,
  schemaHash,
} from './identity.js';
export type { SchemaIdentityOptions } from './identity.js';

// Describers
export type { SchemaDescriber } from './adapters/adapter.js';
export { zodDescriber, describeZodSchema, listZodBehaviors } from './adapters/zod-adapter.js';
export { createJsonSchemaDescriber } from './adapters/json-schema-adapter.js';
export type { JsonSchema, JsonSchemaObject } from './adapters/json-schema-adapter.js';

// Pipeline stages
export { extractSchemaGraph } from './extract.js';
export { canonicalize, computeStructuralLabels } from './canonicalize.js';
export {
  clearBehaviorRegistry,
  getRegisteredBehaviorName,
  registerBehavior,
  registerBehaviors,
  resolveBehavior,
} from './behaviors.js';
export {
  CURRENT_ALGORITHM_VERSION,
  compareIdentifiers,
  formatIdentifier,
  hashCanonicalForm,
  identifiersEqual,
  parseIdentifier,
} from './hasher.js';
export { IdentityCache } from './cache.js';

// Error classes
export {
  CycleDepthExceededError,
  SchemaIdentityError,
  UnsupportedSchemaNodeError,
} from './errors.js';

// Types
export type {
  BehaviorFunction,
  BehaviorHandle,
  BehaviorRef,
  BehaviorRole,
  CanonicalForm,
  ChildOrder,
  Constraint,
  Fingerprint,
  FingerprintStrategy,
  Identifier,
  IdentifierComparison,
  IdentityConfig,
  IdentityErrorCode,
  IdentityEvents,
  IdentitySettings,
  JsonValue,
  KnownAlgorithmVersion,
  NodeKind,
  SchemaDescription,
  SchemaGraph,
  SchemaIdentityReport,
  SchemaNode,
  StampFieldConfig,
} from './types.js';
