/**
 * Schema Identity Describer Interface
 *
 * Every model-validation library is wired in through a describer. The
 * extractor asks it about one schema position at a time and never looks at
 * library internals itself.
 */

import type { BehaviorHandle, SchemaDescription } from '../types.js';

export interface SchemaDescriber<S> {
  readonly name: string;

  // ─── Structure ────────────────────────────────────────────────────
  /**
   * Describe one level of `schema`. Children are returned as references for
   * the extractor to visit. Throws UnsupportedSchemaNodeError for constructs
   * the describer does not model.
   */
  describe(schema: S): SchemaDescription<S>;

  // ─── Behaviors ────────────────────────────────────────────────────
  /** Validators/serializers attached at exactly this position. */
  listBehaviors(schema: S): BehaviorHandle[];
}
