/**
 * Schema Identity — Main Engine
 *
 * Ties the pipeline together: describer → extractor → behavior resolver →
 * canonicalizer → hasher, with a per-engine cache in front. Every settings
 * choice is fixed at create() time.
 */

import type { ZodTypeAny } from 'zod';
import type { SchemaDescriber } from './adapters/adapter.js';
import { zodDescriber } from './adapters/zod-adapter.js';
import { resolveGraphBehaviors } from './behaviors.js';
import { IdentityCache } from './cache.js';
import { canonicalize } from './canonicalize.js';
import { resolveIdentityConfig, type ResolvedIdentityConfig } from './config.js';
import { mapNativeError } from './errors.js';
import { extractSchemaGraph } from './extract.js';
import { formatIdentifier, hashCanonicalForm, identifiersEqual } from './hasher.js';
import { IdentityLogger, type IdentityListener } from './logger.js';
import { createIdentityReport } from './report.js';
import { injectSchemaHash } from './stamp.js';
import type {
  BehaviorRef,
  CanonicalForm,
  Fingerprint,
  Identifier,
  IdentityConfig,
  IdentityEvents,
  IdentitySettings,
  SchemaIdentityReport,
} from './types.js';

export type SchemaIdentityOptions<S> = IdentityConfig & { describer: SchemaDescriber<S> };

export class SchemaIdentity<S> {
  private describer: SchemaDescriber<S>;
  private config: ResolvedIdentityConfig;
  private logger: IdentityLogger;
  private cache = new IdentityCache<Fingerprint>();

  private constructor(
    describer: SchemaDescriber<S>,
    config: ResolvedIdentityConfig,
    logger: IdentityLogger,
  ) {
    this.describer = describer;
    this.config = config;
    this.logger = logger;
  }

  /**
   * Create an engine. Zod schemas are understood out of the box; pass a
   * `describer` for any other schema library.
   */
  static create(config?: IdentityConfig): SchemaIdentity<ZodTypeAny>;
  static create<S>(config: SchemaIdentityOptions<S>): SchemaIdentity<S>;
  static create<S>(
    config: IdentityConfig & { describer?: SchemaDescriber<S> } = {},
  ): SchemaIdentity<S> | SchemaIdentity<ZodTypeAny> {
    const { describer, ...rest } = config;
    const resolved = resolveIdentityConfig(rest);
    const logger = new IdentityLogger(resolved.logger);

    if (describer) return new SchemaIdentity(describer, resolved, logger);
    return new SchemaIdentity(zodDescriber, resolved, logger);
  }

  get settings(): IdentitySettings {
    return { ...this.config.settings };
  }

  get describerName(): string {
    return this.describer.name;
  }

  // ─── Identifiers ───────────────────────────────────────────────────────────

  /**
   * Stable identifier of `schema`'s structure. Computed once per schema
   * object; later calls are served from the cache.
   */
  identifierFor(schema: S): Identifier {
    return this.fingerprint(schema).identifier;
  }

  /** `identifierFor` formatted as `"<version>:<hex digest>"`. */
  schemaHash(schema: S): string {
    return formatIdentifier(this.identifierFor(schema));
  }

  sameSchema(a: S, b: S): boolean {
    return identifiersEqual(this.identifierFor(a), this.identifierFor(b));
  }

  fingerprint(schema: S): Fingerprint {
    const { value, cached } = this.cache.getOrCompute(schema, () => this.compute(schema));
    if (cached) this.logger.logCacheHit(formatIdentifier(value.identifier));
    return value;
  }

  /** The bytes that get hashed. Never cached. */
  canonicalForm(schema: S): CanonicalForm {
    return this.guard(() => this.canonicalFormWith(schema, () => undefined));
  }

  /**
   * Drop the cached identifier for `schema` and compute it again. Needed only
   * after mutating a schema object in place.
   */
  rebuild(schema: S): Identifier {
    const dropped = this.cache.invalidate(schema);
    if (dropped) this.logger.logInvalidated(formatIdentifier(dropped.identifier));
    return this.identifierFor(schema);
  }

  // ─── Reports & Stamping ────────────────────────────────────────────────────

  report(schema: S, label = `${this.describer.name} schema`): SchemaIdentityReport {
    return createIdentityReport({
      label,
      fingerprint: this.fingerprint(schema),
      settings: this.settings,
    });
  }

  /**
   * Copy `doc` with the schema hash under the configured stamp field.
   * A value already present is kept.
   */
  stamp<T extends Record<string, unknown>>(doc: T, schema: S): T & Record<string, unknown> {
    if (!this.config.stamp.enabled) return { ...doc };
    return injectSchemaHash(doc, this.schemaHash(schema), this.config.stamp);
  }

  // ─── Events ────────────────────────────────────────────────────────────────

  on<E extends keyof IdentityEvents>(event: E, listener: IdentityListener<E>): this {
    this.logger.on(event, listener);
    return this;
  }

  once<E extends keyof IdentityEvents>(event: E, listener: IdentityListener<E>): this {
    this.logger.once(event, listener);
    return this;
  }

  off<E extends keyof IdentityEvents>(event: E, listener: IdentityListener<E>): this {
    this.logger.off(event, listener);
    return this;
  }

  // ─── Pipeline ──────────────────────────────────────────────────────────────

  private compute(schema: S): Fingerprint {
    return this.guard(() => {
      const startTime = Date.now();
      const degradedBehaviors: BehaviorRef[] = [];
      const form = this.canonicalFormWith(schema, ref => {
        degradedBehaviors.push(ref);
        this.logger.logDegraded(ref);
      });

      const identifier = hashCanonicalForm(form.bytes, this.config.settings.algorithm, this.config.settings.digestLength);
      const fingerprint: Fingerprint = {
        identifier,
        nodeCount: form.nodeCount,
        classCount: form.classCount,
        rounds: form.rounds,
        degradedBehaviors,
      };

      this.logger.logComputed({
        identifier: formatIdentifier(identifier),
        nodeCount: form.nodeCount,
        classCount: form.classCount,
        rounds: form.rounds,
        durationMs: Date.now() - startTime,
      });
      return fingerprint;
    });
  }

  private canonicalFormWith(schema: S, onDegraded: (ref: BehaviorRef) => void): CanonicalForm {
    const { settings, extraData } = this.config;
    const extracted = extractSchemaGraph(schema, this.describer, {
      trackDescriptions: settings.trackDescriptions,
      trackDefaultValues: settings.trackDefaultValues,
      maxNodes: settings.maxNodes,
    });
    const graph = resolveGraphBehaviors(extracted, onDegraded);

    return canonicalize(graph, {
      algorithmVersion: settings.algorithm,
      trackDescriptions: settings.trackDescriptions,
      trackFieldOrder: settings.trackFieldOrder,
      trackTypeOrder: settings.trackTypeOrder,
      trackDefaultValues: settings.trackDefaultValues,
      extraData,
    });
  }

  private guard<T>(run: () => T): T {
    try {
      return run();
    } catch (err) {
      const error = mapNativeError(err);
      this.logger.logFailure(error);
      throw error;
    }
  }
}

// ─── Process-wide Zod Engine ─────────────────────────────────────────────────

let defaultIdentity: SchemaIdentity<ZodTypeAny> | undefined;

export function getDefaultSchemaIdentity(): SchemaIdentity<ZodTypeAny> {
  defaultIdentity ??= SchemaIdentity.create({ logging: false });
  return defaultIdentity;
}

export function identifierFor(schema: ZodTypeAny): Identifier {
  return getDefaultSchemaIdentity().identifierFor(schema);
}

export function schemaHash(schema: ZodTypeAny): string {
  return getDefaultSchemaIdentity().schemaHash(schema);
}

export function sameSchema(a: ZodTypeAny, b: ZodTypeAny): boolean {
  return getDefaultSchemaIdentity().sameSchema(a, b);
}
