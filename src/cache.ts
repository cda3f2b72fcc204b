/**
 * Schema Identity Cache — schema object → computed value
 *
 * Object keys live in a WeakMap so a cached schema never outlives its last
 * user. Primitive keys (schema names, JSON pointers) use a plain Map.
 * The first stored value wins: concurrent computations for the same key are
 * deterministic, so a later write would store the same value anyway.
 */

export interface CacheLookup<V> {
  value: V;
  cached: boolean;
}

function isObjectKey(key: unknown): key is object {
  return (typeof key === 'object' && key !== null) || typeof key === 'function';
}

export class IdentityCache<V> {
  private objects = new WeakMap<object, V>();
  private primitives = new Map<unknown, V>();

  getOrCompute(key: unknown, compute: () => V): CacheLookup<V> {
    const existing = this.peek(key);
    if (existing !== undefined) return { value: existing, cached: true };

    const value = compute();
    const stored = this.peek(key);
    if (stored !== undefined) return { value: stored, cached: true };

    this.store(key, value);
    return { value, cached: false };
  }

  peek(key: unknown): V | undefined {
    return isObjectKey(key) ? this.objects.get(key) : this.primitives.get(key);
  }

  has(key: unknown): boolean {
    return this.peek(key) !== undefined;
  }

  /** Returns the dropped value, if there was one. */
  invalidate(key: unknown): V | undefined {
    const existing = this.peek(key);
    if (isObjectKey(key)) {
      this.objects.delete(key);
    } else {
      this.primitives.delete(key);
    }
    return existing;
  }

  clear(): void {
    this.objects = new WeakMap<object, V>();
    this.primitives.clear();
  }

  private store(key: unknown, value: V): void {
    if (isObjectKey(key)) {
      this.objects.set(key, value);
    } else {
      this.primitives.set(key, value);
    }
  }
}
