/**
 * Schema Identity Logger — Structured computation logging
 *
 * Emits events with timing, cache activity and degraded behavior fingerprints.
 * The logger owns the engine's event channel; listeners subscribe through it.
 */

import { EventEmitter } from 'events';
import type { SchemaIdentityError } from './errors.js';
import type { BehaviorRef, IdentityEvents } from './types.js';

export interface LoggerConfig {
  enabled: boolean;
  verbose: boolean;
  slowFingerprintMs: number;
}

export type IdentityListener<E extends keyof IdentityEvents> = (payload: IdentityEvents[E]) => void;

export class IdentityLogger {
  private config: LoggerConfig;
  private emitter = new EventEmitter();

  constructor(config: LoggerConfig) {
    this.config = config;
  }

  // ─── Subscription ──────────────────────────────────────────────────────────

  on<E extends keyof IdentityEvents>(event: E, listener: IdentityListener<E>): this {
    this.emitter.on(event, listener);
    return this;
  }

  once<E extends keyof IdentityEvents>(event: E, listener: IdentityListener<E>): this {
    this.emitter.once(event, listener);
    return this;
  }

  off<E extends keyof IdentityEvents>(event: E, listener: IdentityListener<E>): this {
    this.emitter.off(event, listener);
    return this;
  }

  // ─── Log Points ────────────────────────────────────────────────────────────

  /**
   * Log a freshly computed identifier.
   */
  logComputed(details: IdentityEvents['computed']): void {
    this.emit('computed', details);

    if (details.durationMs >= this.config.slowFingerprintMs) {
      this.emit('slow-fingerprint', {
        identifier: details.identifier,
        durationMs: details.durationMs,
        threshold: this.config.slowFingerprintMs,
      });
    }
  }

  /** Cache hits are only interesting when tracing. */
  logCacheHit(identifier: string): void {
    if (!this.config.verbose) return;
    this.emit('cache-hit', { identifier });
  }

  logInvalidated(identifier: string): void {
    this.emit('cache-invalidated', { identifier });
  }

  /**
   * BehaviorResolutionDegraded: a behavior was fingerprinted by something
   * weaker than its declared name. Computation continues.
   */
  logDegraded(ref: BehaviorRef): void {
    this.emit('behavior-degraded', {
      role: ref.role,
      qualifiedName: ref.qualifiedName,
      strategy: ref.strategy,
    });
  }

  logFailure(err: SchemaIdentityError): void {
    this.emit('failed', { code: err.code, message: err.message, fix: err.fix });
  }

  private emit<E extends keyof IdentityEvents>(event: E, payload: IdentityEvents[E]): void {
    if (!this.config.enabled) return;
    this.emitter.emit(event, payload);
  }
}
